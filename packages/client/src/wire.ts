/**
 * Handshake wire exchange: put the request on the transport, take the
 * response head off it.
 */

import { HandshakeError } from "@dvara/core";
import type { HeaderSet } from "./headers.js";
import { type ReadLimits, type ResponseHead, MalformedMessageError, readResponseHead } from "./http-reader.js";
import type { Transport } from "./transport.js";

/** `GET {resource} HTTP/1.1`, one line per header, blank line. */
export function serializeRequest(resourceName: string, headers: HeaderSet): string {
	const lines = [`GET ${resourceName} HTTP/1.1`];
	for (const [name, value] of headers) {
		lines.push(`${name}: ${value}`);
	}
	lines.push("", "");
	return lines.join("\r\n");
}

export async function sendRequest(transport: Transport, resourceName: string, headers: HeaderSet): Promise<void> {
	await transport.write(Buffer.from(serializeRequest(resourceName, headers), "latin1"));
}

/**
 * Read the handshake response head.
 *
 * @throws {HandshakeError} "Malformed HTTP message", with the parse
 * failure as `cause`.
 * @throws {TransportError} If the connection closes first.
 */
export async function receiveResponse(transport: Transport, limits: ReadLimits): Promise<ResponseHead> {
	try {
		return await readResponseHead(transport, limits);
	} catch (err) {
		if (err instanceof MalformedMessageError) {
			throw new HandshakeError("Malformed HTTP message", { cause: err });
		}
		throw err;
	}
}
