/**
 * Handshake response validator.
 *
 * Checks run in a fixed order and the first failure wins. Nothing is
 * negotiated unless every check passes.
 */

import { HandshakeError } from "@dvara/core";
import { type HeaderSet, getHeader, getHeaderValues } from "./headers.js";
import { type HandshakeKey, acceptMatches } from "./handshake-key.js";

/** What the server agreed to. Frozen; produced only by {@link validateResponse}. */
export interface HandshakeResult {
	/** Subset of the offered extensions, in the order the server listed them. */
	readonly negotiatedExtensions: readonly string[];
	readonly negotiatedSubprotocol: string | undefined;
	readonly responseHeaders: HeaderSet;
}

function splitTokens(values: string[]): string[] {
	return values
		.flatMap((value) => value.split(","))
		.map((token) => token.trim())
		.filter((token) => token !== "");
}

function hasToken(value: string, token: string): boolean {
	return splitTokens([value]).some((t) => t.toLowerCase() === token);
}

/**
 * Validate the server's handshake response.
 *
 * @throws {HandshakeError} On a non-101 status, wrong Upgrade/Connection
 * headers, a missing or wrong accept key, or a selected extension or
 * subprotocol that was never offered.
 */
export function validateResponse(
	statusCode: number,
	responseHeaders: HeaderSet,
	key: HandshakeKey,
	offeredExtensions: readonly string[] = [],
	offeredSubprotocols: readonly string[] = [],
): HandshakeResult {
	if (statusCode !== 101) {
		throw new HandshakeError(`Bad status code: ${statusCode}`, { statusCode });
	}

	const upgrade = getHeader(responseHeaders, "Upgrade");
	if (upgrade === undefined || upgrade.toLowerCase() !== "websocket") {
		throw new HandshakeError(`Invalid Upgrade header: ${upgrade ?? "(missing)"}`);
	}
	const connection = getHeader(responseHeaders, "Connection");
	if (connection === undefined || !hasToken(connection, "upgrade")) {
		throw new HandshakeError(`Invalid Connection header: ${connection ?? "(missing)"}`);
	}

	const accept = getHeader(responseHeaders, "Sec-WebSocket-Accept");
	if (accept === undefined) {
		throw new HandshakeError("Missing Sec-WebSocket-Accept header");
	}
	if (!acceptMatches(key, accept)) {
		throw new HandshakeError("Invalid Sec-WebSocket-Accept header");
	}

	const negotiatedExtensions = splitTokens(getHeaderValues(responseHeaders, "Sec-WebSocket-Extensions"));
	for (const extension of negotiatedExtensions) {
		if (!offeredExtensions.includes(extension)) {
			throw new HandshakeError(`Unknown extension: ${extension}`);
		}
	}

	const protocolValues = getHeaderValues(responseHeaders, "Sec-WebSocket-Protocol");
	let negotiatedSubprotocol: string | undefined;
	if (protocolValues.length > 0) {
		const selected = protocolValues.map((value) => value.trim()).join(", ");
		if (!offeredSubprotocols.includes(selected)) {
			throw new HandshakeError(`Unknown subprotocol: ${selected}`);
		}
		negotiatedSubprotocol = selected;
	}

	return Object.freeze({
		negotiatedExtensions: Object.freeze(negotiatedExtensions),
		negotiatedSubprotocol,
		responseHeaders,
	});
}
