/**
 * Handshake request builder.
 *
 * Produces the ordered request header set and the fresh key the response
 * must answer. Pure construction: nothing is written anywhere.
 */

import { type Header, type HeaderSet, type ExtraHeaders, assertHeaderValue, normalizeExtraHeaders } from "./headers.js";
import { type HandshakeKey, generateHandshakeKey } from "./handshake-key.js";
import { type EndpointDescriptor, defaultPort } from "./uri.js";

export const CLIENT_VERSION = "0.1.0";

/** Identifying User-Agent sent unless the caller overrides it. */
export const USER_AGENT = `dvara/${CLIENT_VERSION} node/${process.versions.node}`;

export interface RequestOptions {
	/** Value of the Origin header. Omitted when undefined. */
	origin?: string;
	/** Extensions to offer, most preferred first. */
	extensions?: readonly string[];
	/** Subprotocols to offer, most preferred first. */
	subprotocols?: readonly string[];
	extraHeaders?: ExtraHeaders;
	userAgent?: string;
}

export interface HandshakeRequest {
	readonly headers: HeaderSet;
	readonly key: HandshakeKey;
}

/** Host header value: the port is left out when it is the scheme default. */
export function formatHost(endpoint: EndpointDescriptor): string {
	const host = endpoint.host.includes(":") ? `[${endpoint.host}]` : endpoint.host;
	return endpoint.port === defaultPort(endpoint.secure) ? host : `${host}:${endpoint.port}`;
}

/**
 * Build the opening handshake request headers.
 *
 * Order: Host, Origin, Sec-WebSocket-Extensions, Sec-WebSocket-Protocol,
 * caller headers, User-Agent, Upgrade, Connection, Sec-WebSocket-Key,
 * Sec-WebSocket-Version.
 *
 * @param newKey - Key source; tests pass a fixed key.
 * @throws {ConfigurationError} If `extraHeaders` is malformed, or any
 * header value contains CR, LF or NUL.
 */
export function buildRequest(
	endpoint: EndpointDescriptor,
	options: RequestOptions = {},
	newKey: () => HandshakeKey = generateHandshakeKey,
): HandshakeRequest {
	const headers: Header[] = [["Host", formatHost(endpoint)]];

	if (options.origin !== undefined) {
		assertHeaderValue("origin", "Origin", options.origin);
		headers.push(["Origin", options.origin]);
	}
	if (options.extensions && options.extensions.length > 0) {
		headers.push(["Sec-WebSocket-Extensions", options.extensions.join(", ")]);
	}
	if (options.subprotocols && options.subprotocols.length > 0) {
		headers.push(["Sec-WebSocket-Protocol", options.subprotocols.join(", ")]);
	}
	if (options.extraHeaders !== undefined) {
		headers.push(...normalizeExtraHeaders(options.extraHeaders));
	}
	if (options.userAgent !== undefined) {
		assertHeaderValue("userAgent", "User-Agent", options.userAgent);
	}
	headers.push(["User-Agent", options.userAgent ?? USER_AGENT]);

	const key = newKey();
	headers.push(
		["Upgrade", "websocket"],
		["Connection", "Upgrade"],
		["Sec-WebSocket-Key", key.encoded],
		["Sec-WebSocket-Version", "13"],
	);

	return Object.freeze({ headers: Object.freeze(headers), key });
}
