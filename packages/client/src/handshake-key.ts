import { createHash, randomBytes, timingSafeEqual } from "node:crypto";

/** The GUID appended to the key before hashing (RFC 6455 section 1.3). */
export const WS_GUID = "258EAFA5-E914-47DA-95CA-C5AB0DC85B11";

/**
 * A handshake nonce. `encoded` goes on the wire; `raw` is kept so the
 * caller can inspect what was sent.
 */
export interface HandshakeKey {
	readonly raw: Buffer;
	readonly encoded: string;
}

/** Fresh 16-byte key. Never reuse one across attempts. */
export function generateHandshakeKey(): HandshakeKey {
	const raw = randomBytes(16);
	return Object.freeze({ raw, encoded: raw.toString("base64") });
}

/** Wrap a known base64 key, e.g. for replaying a captured exchange. */
export function handshakeKeyFrom(encoded: string): HandshakeKey {
	return Object.freeze({ raw: Buffer.from(encoded, "base64"), encoded });
}

/** base64(SHA-1(key ‖ GUID)) */
export function computeAccept(encodedKey: string): string {
	return createHash("sha1").update(encodedKey + WS_GUID).digest("base64");
}

/**
 * Compare a received Sec-WebSocket-Accept against the value expected for
 * `key`, in constant time for equal lengths.
 */
export function acceptMatches(key: HandshakeKey, received: string): boolean {
	const expected = Buffer.from(computeAccept(key.encoded), "latin1");
	const actual = Buffer.from(received, "latin1");
	return expected.length === actual.length && timingSafeEqual(expected, actual);
}
