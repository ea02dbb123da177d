import { isIP } from "node:net";
import type { ConnectionOptions } from "node:tls";
import { ConfigurationError } from "@dvara/core";
import type { EndpointDescriptor } from "./uri.js";

/** How the transport should be opened. */
export type TlsPolicy =
	| { readonly secure: false }
	| { readonly secure: true; readonly options: ConnectionOptions };

/**
 * Decide the TLS policy for an endpoint.
 *
 * A `wss://` endpoint without explicit options gets full certificate
 * verification against the system trust store; verification is only
 * turned off by passing `{ rejectUnauthorized: false }` explicitly.
 *
 * @throws {ConfigurationError} If TLS options are given for a `ws://`
 * endpoint, or are not an object.
 */
export function resolveTlsPolicy(endpoint: EndpointDescriptor, tlsOptions?: ConnectionOptions): TlsPolicy {
	if (tlsOptions !== undefined && (typeof tlsOptions !== "object" || tlsOptions === null)) {
		throw new ConfigurationError("tls must be an object of TLS connection options");
	}

	if (!endpoint.secure) {
		if (tlsOptions !== undefined) {
			throw new ConfigurationError(
				"connect() received TLS options for a ws:// URI. Use a wss:// URI to enable TLS.",
			);
		}
		return { secure: false };
	}

	return {
		secure: true,
		options: {
			...(isIP(endpoint.host) === 0 ? { servername: endpoint.host } : {}),
			rejectUnauthorized: true,
			...tlsOptions,
		},
	};
}
