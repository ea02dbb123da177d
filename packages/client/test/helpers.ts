import { LogLevel, Logger, TransportError } from "@dvara/core";
import type { LogEntry, LogTransport } from "@dvara/core";
import { computeAccept } from "../src/handshake-key.js";
import { BufferedTransport } from "../src/transport.js";

/** RFC 6455 section 1.3 sample nonce and its accept value. */
export const SAMPLE_KEY = "dGhlIHNhbXBsZSBub25jZQ==";
export const SAMPLE_ACCEPT = "s3pPLMBiTxaQ9kYGzzhZRbK+xOo=";

export class MemoryLogTransport implements LogTransport {
	entries: LogEntry[] = [];
	write(entry: LogEntry): void {
		this.entries.push(entry);
	}
}

/** Logger that records instead of printing. */
export function testLogger(sink: MemoryLogTransport = new MemoryLogTransport()): Logger {
	return new Logger("test", { level: LogLevel.DEBUG, transports: [sink] });
}

/**
 * In-memory transport. Everything written is recorded; `onWrite` plays the
 * server and may feed bytes back.
 */
export class ScriptedTransport extends BufferedTransport {
	written: Buffer[] = [];
	aborted = false;
	gracefullyClosed = false;

	constructor(private readonly onWrite?: (data: Buffer, transport: ScriptedTransport) => void) {
		super();
	}

	get closed(): boolean {
		return this.aborted || this.gracefullyClosed;
	}

	get abortedWith(): Error | undefined {
		return this.aborted ? this.failure : undefined;
	}

	get requestText(): string {
		return Buffer.concat(this.written).toString("latin1");
	}

	async write(data: string | Uint8Array): Promise<void> {
		if (this.closed) {
			throw this.failure ?? new TransportError("Cannot write to a closed transport");
		}
		const buf = typeof data === "string" ? Buffer.from(data, "latin1") : Buffer.from(data);
		this.written.push(buf);
		this.onWrite?.(buf, this);
	}

	async close(): Promise<void> {
		this.gracefullyClosed = true;
	}

	feed(data: string | Buffer): void {
		this.push(typeof data === "string" ? Buffer.from(data, "latin1") : data);
	}

	endStream(): void {
		this.pushEnd();
	}

	protected destroy(): void {
		this.aborted = true;
	}
}

/** Raw 101 response for `key`, with optional extra header lines. */
export function upgradeResponse(key: string, extraLines: string[] = []): string {
	return [
		"HTTP/1.1 101 Switching Protocols",
		"Upgrade: websocket",
		"Connection: Upgrade",
		`Sec-WebSocket-Accept: ${computeAccept(key)}`,
		...extraLines,
		"",
		"",
	].join("\r\n");
}

/**
 * A transport whose server answers the first complete request with
 * `response`.
 */
export function respondingTransport(response: string | Buffer): ScriptedTransport {
	let answered = false;
	return new ScriptedTransport((_data, transport) => {
		if (!answered && transport.requestText.includes("\r\n\r\n")) {
			answered = true;
			transport.feed(response);
		}
	});
}

/** Unmasked server-to-client frame. */
export function serverFrame(opcode: number, payload: Buffer | string, fin = true): Buffer {
	const body = typeof payload === "string" ? Buffer.from(payload, "utf-8") : payload;
	const len = body.length;
	let header: Buffer;
	if (len < 126) {
		header = Buffer.from([(fin ? 0x80 : 0) | opcode, len]);
	} else if (len < 65536) {
		header = Buffer.alloc(4);
		header[0] = (fin ? 0x80 : 0) | opcode;
		header[1] = 126;
		header.writeUInt16BE(len, 2);
	} else {
		header = Buffer.alloc(10);
		header[0] = (fin ? 0x80 : 0) | opcode;
		header[1] = 127;
		header.writeBigUInt64BE(BigInt(len), 2);
	}
	return Buffer.concat([header, body]);
}

/** Decode a masked client frame written by the code under test. */
export function decodeClientFrame(frame: Buffer): { fin: boolean; opcode: number; masked: boolean; payload: Buffer } {
	const fin = (frame[0] & 0x80) !== 0;
	const opcode = frame[0] & 0x0f;
	const masked = (frame[1] & 0x80) !== 0;
	let len = frame[1] & 0x7f;
	let offset = 2;
	if (len === 126) {
		len = frame.readUInt16BE(2);
		offset = 4;
	} else if (len === 127) {
		len = Number(frame.readBigUInt64BE(2));
		offset = 10;
	}
	const mask = masked ? frame.subarray(offset, offset + 4) : Buffer.alloc(4);
	if (masked) offset += 4;
	const payload = Buffer.alloc(len);
	for (let i = 0; i < len; i++) {
		payload[i] = frame[offset + i] ^ mask[i & 3];
	}
	return { fin, opcode, masked, payload };
}
