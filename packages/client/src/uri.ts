/**
 * Endpoint resolution for `ws://` and `wss://` URIs.
 */

import { InvalidURIError } from "@dvara/core";

/**
 * Where to connect and what to ask for. Produced once per `connect` call
 * and frozen.
 */
export interface EndpointDescriptor {
	/** Host name or IP literal, without IPv6 brackets. */
	readonly host: string;
	readonly port: number;
	/** `true` for `wss://`. */
	readonly secure: boolean;
	/** Path plus query string, as sent on the request line. */
	readonly resourceName: string;
}

/** Port implied by the scheme when the URI names none. */
export function defaultPort(secure: boolean): number {
	return secure ? 443 : 80;
}

/**
 * Parse and validate a WebSocket URI.
 *
 * @throws {InvalidURIError} On unparseable input, a scheme other than
 * ws/wss, user info, or a fragment.
 */
export function parseUri(uri: string): EndpointDescriptor {
	let url: URL;
	try {
		url = new URL(uri);
	} catch {
		throw new InvalidURIError(uri, "not an absolute URI");
	}

	if (url.protocol !== "ws:" && url.protocol !== "wss:") {
		throw new InvalidURIError(uri, `scheme ${url.protocol.slice(0, -1)} isn't ws or wss`);
	}
	if (url.hostname === "") {
		throw new InvalidURIError(uri, "missing host");
	}
	if (url.username !== "" || url.password !== "") {
		throw new InvalidURIError(uri, "user info isn't allowed");
	}
	if (url.hash !== "" || uri.includes("#")) {
		throw new InvalidURIError(uri, "fragments aren't allowed");
	}

	const secure = url.protocol === "wss:";
	const host = url.hostname.startsWith("[") ? url.hostname.slice(1, -1) : url.hostname;

	return Object.freeze({
		host,
		port: url.port === "" ? defaultPort(secure) : Number(url.port),
		secure,
		resourceName: (url.pathname || "/") + url.search,
	});
}
