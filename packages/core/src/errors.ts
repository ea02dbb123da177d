/**
 * Typed error hierarchy for Dvara.
 *
 * Every error raised by the client extends {@link DvaraError} and carries a
 * machine-readable `code` string for programmatic handling.
 */

/**
 * Base error class for all Dvara errors.
 *
 * Carries a machine-readable `code` field (e.g. `"HANDSHAKE_ERROR"`) in
 * addition to the human-readable `message`, and an optional `cause`.
 */
export class DvaraError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "DvaraError";
		this.code = code;
	}
}

/**
 * Caller misuse: conflicting TLS settings, malformed extra headers,
 * invalid option values. Always raised before any network activity.
 */
export class ConfigurationError extends DvaraError {
	constructor(message: string, cause?: unknown) {
		super(message, "CONFIGURATION_ERROR", cause);
		this.name = "ConfigurationError";
	}
}

/**
 * The endpoint URI could not be resolved.
 */
export class InvalidURIError extends DvaraError {
	readonly uri: string;

	constructor(uri: string, reason: string) {
		super(`${uri} isn't a valid URI: ${reason}`, "INVALID_URI");
		this.name = "InvalidURIError";
		this.uri = uri;
	}
}

/**
 * DNS, TCP or TLS failure, or a connection closed by the peer before the
 * expected data arrived. The underlying socket error is kept as `cause`.
 */
export class TransportError extends DvaraError {
	constructor(message: string, cause?: unknown) {
		super(message, "TRANSPORT_ERROR", cause);
		this.name = "TransportError";
	}
}

/**
 * The server's answer to the opening handshake was rejected.
 *
 * `statusCode` is set when the failure is a non-101 response.
 */
export class HandshakeError extends DvaraError {
	readonly statusCode?: number;

	constructor(message: string, opts?: { statusCode?: number; cause?: unknown }) {
		super(message, "HANDSHAKE_ERROR", opts?.cause);
		this.name = "HandshakeError";
		this.statusCode = opts?.statusCode;
	}
}

/**
 * Frame-level protocol violation on an open connection.
 *
 * `closeCode` is the RFC 6455 status code sent to the peer.
 */
export class ProtocolError extends DvaraError {
	readonly closeCode: number;

	constructor(message: string, closeCode = 1002) {
		super(message, "PROTOCOL_ERROR");
		this.name = "ProtocolError";
		this.closeCode = closeCode;
	}
}

/**
 * Error indicating the operation was explicitly aborted (e.g. via AbortSignal).
 */
export class AbortError extends DvaraError {
	constructor(message = "Operation aborted", cause?: unknown) {
		super(message, "ABORT_ERROR", cause);
		this.name = "AbortError";
	}
}
