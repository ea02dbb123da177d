/**
 * RFC 6455 frame encoding and decoding for the client side.
 *
 * Client-to-server frames are always masked; server-to-client frames must
 * not be (section 5.1).
 */

import { randomBytes } from "node:crypto";
import { ProtocolError } from "@dvara/core";

export enum Opcode {
	Continuation = 0x0,
	Text = 0x1,
	Binary = 0x2,
	Close = 0x8,
	Ping = 0x9,
	Pong = 0xa,
}

const KNOWN_OPCODES = new Set<number>([
	Opcode.Continuation,
	Opcode.Text,
	Opcode.Binary,
	Opcode.Close,
	Opcode.Ping,
	Opcode.Pong,
]);

/** Close status codes used by the client. */
export const CloseCode = {
	Normal: 1000,
	ProtocolError: 1002,
	InvalidPayload: 1007,
	MessageTooBig: 1009,
} as const;

/**
 * Result of parsing a single frame from a buffer.
 */
export interface ParsedFrame {
	/** FIN bit (final fragment). */
	fin: boolean;
	opcode: Opcode;
	payload: Buffer;
	/** Total bytes consumed from the buffer. */
	bytesConsumed: number;
}

function isOpcode(value: number): value is Opcode {
	return KNOWN_OPCODES.has(value);
}

function isControl(opcode: Opcode): boolean {
	return (opcode & 0x08) !== 0;
}

/**
 * Encode a masked client frame.
 *
 * @param maskKey - 4 bytes; a fresh random key when omitted.
 */
export function encodeFrame(opcode: Opcode, payload: Uint8Array, fin = true, maskKey: Buffer = randomBytes(4)): Buffer {
	const len = payload.length;
	let headerLen: number;

	if (len < 126) {
		headerLen = 6; // 2 header + 4 mask
	} else if (len < 65536) {
		headerLen = 8; // 2 header + 2 ext + 4 mask
	} else {
		headerLen = 14; // 2 header + 8 ext + 4 mask
	}

	const frame = Buffer.alloc(headerLen + len);
	frame[0] = (fin ? 0x80 : 0) | opcode;

	if (len < 126) {
		frame[1] = 0x80 | len;
	} else if (len < 65536) {
		frame[1] = 0x80 | 126;
		frame.writeUInt16BE(len, 2);
	} else {
		frame[1] = 0x80 | 127;
		frame.writeBigUInt64BE(BigInt(len), 2);
	}
	maskKey.copy(frame, headerLen - 4);

	for (let i = 0; i < len; i++) {
		frame[headerLen + i] = payload[i] ^ maskKey[i & 3];
	}
	return frame;
}

/** Close frame payload: 2-byte status code followed by a UTF-8 reason. */
export function encodeClosePayload(code: number, reason = ""): Buffer {
	const reasonBuf = Buffer.from(reason, "utf-8");
	if (reasonBuf.length > 123) {
		throw new RangeError("Close reason must fit in 123 bytes");
	}
	const payload = Buffer.alloc(2 + reasonBuf.length);
	payload.writeUInt16BE(code, 0);
	reasonBuf.copy(payload, 2);
	return payload;
}

/**
 * Whether `code` may appear in a close frame on the wire. 1005 and 1006
 * are reserved for local reporting; 1015 is TLS-only.
 */
export function isValidCloseCode(code: number): boolean {
	return (code >= 1000 && code <= 1014 && code !== 1004 && code !== 1005 && code !== 1006)
		|| (code >= 3000 && code <= 4999);
}

const closeReasonDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * @throws {ProtocolError} On a 1-byte payload or a code that must not be
 * sent (1002), or a reason that is not valid UTF-8 (1007).
 */
export function decodeClosePayload(payload: Buffer): { code: number | undefined; reason: string } {
	if (payload.length === 0) return { code: undefined, reason: "" };
	if (payload.length === 1) {
		throw new ProtocolError("Close frame payload of 1 byte");
	}
	const code = payload.readUInt16BE(0);
	if (!isValidCloseCode(code)) {
		throw new ProtocolError(`Invalid close code ${code}`);
	}
	let reason: string;
	try {
		reason = closeReasonDecoder.decode(payload.subarray(2));
	} catch {
		throw new ProtocolError("Close reason is not valid UTF-8", CloseCode.InvalidPayload);
	}
	return { code, reason };
}

/**
 * Try to parse one server frame from the start of `buffer`.
 *
 * Returns `null` when the buffer does not yet hold a complete frame.
 *
 * @throws {ProtocolError} On reserved bits, unknown opcodes, masked server
 * frames, malformed control frames, or a payload above `maxPayload`
 * (close code 1009).
 */
export function parseFrame(buffer: Buffer, maxPayload: number): ParsedFrame | null {
	if (buffer.length < 2) return null;

	const byte0 = buffer[0];
	const byte1 = buffer[1];
	const fin = (byte0 & 0x80) !== 0;
	const opcode = byte0 & 0x0f;

	if ((byte0 & 0x70) !== 0) {
		throw new ProtocolError("Reserved bits must be 0");
	}
	if (!isOpcode(opcode)) {
		throw new ProtocolError(`Unknown opcode 0x${opcode.toString(16)}`);
	}
	if ((byte1 & 0x80) !== 0) {
		throw new ProtocolError("Server frames must not be masked");
	}

	let payloadLen = byte1 & 0x7f;
	let headerLen = 2;

	if (isControl(opcode) && (!fin || payloadLen > 125)) {
		throw new ProtocolError("Control frames must be final and at most 125 bytes");
	}

	if (payloadLen === 126) {
		if (buffer.length < 4) return null;
		payloadLen = buffer.readUInt16BE(2);
		headerLen = 4;
	} else if (payloadLen === 127) {
		if (buffer.length < 10) return null;
		const big = buffer.readBigUInt64BE(2);
		if (big > BigInt(maxPayload)) {
			throw new ProtocolError("Frame exceeds the message size limit", CloseCode.MessageTooBig);
		}
		payloadLen = Number(big);
		headerLen = 10;
	}

	if (payloadLen > maxPayload) {
		throw new ProtocolError("Frame exceeds the message size limit", CloseCode.MessageTooBig);
	}

	const totalLen = headerLen + payloadLen;
	if (buffer.length < totalLen) return null;

	return {
		fin,
		opcode,
		payload: Buffer.from(buffer.subarray(headerLen, totalLen)),
		bytesConsumed: totalLen,
	};
}
