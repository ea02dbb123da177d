/**
 * Built-in frame engine: turns an upgraded transport into a message
 * connection. Handles masking, fragment reassembly, ping/pong and the
 * close frame. Negotiated extensions are reported, never applied.
 */

import { DEFAULT_CLIENT_SETTINGS, DvaraError, LogLevel, ProtocolError, type Logger, createLogger } from "@dvara/core";
import {
	type CompletedHandshake,
	type ConnectionHandle,
	type FrameEngine,
	type Message,
	ConnectionState,
} from "./connection.js";
import type { HeaderSet } from "./headers.js";
import {
	type ParsedFrame,
	CloseCode,
	Opcode,
	decodeClosePayload,
	encodeClosePayload,
	encodeFrame,
	parseFrame,
} from "./frames.js";
import type { Transport } from "./transport.js";

const EMPTY = Buffer.alloc(0);
const CLOSED = Symbol("closed");

export interface FrameEngineOptions {
	/** Largest reassembled message. Defaults to 16 MiB. */
	maxMessageBytes?: number;
	logger?: Logger;
}

/**
 * Open connection over an upgraded transport.
 *
 * `receive()` calls must not overlap; `send()` may be called at any time
 * while the connection is open.
 */
export class FrameConnection implements ConnectionHandle {
	readonly negotiatedExtensions: readonly string[];
	readonly negotiatedSubprotocol: string | undefined;
	readonly requestHeaders: HeaderSet;
	readonly responseHeaders: HeaderSet;

	private _state = ConnectionState.OPEN;
	private buffer: Buffer = EMPTY;
	private fragments: Buffer[] = [];
	private fragmentBytes = 0;
	private fragmentOpcode?: Opcode.Text | Opcode.Binary;
	private closeSent = false;
	private readonly decoder = new TextDecoder("utf-8", { fatal: true });

	constructor(
		private readonly transport: Transport,
		handshake: CompletedHandshake,
		private readonly maxMessageBytes: number,
		private readonly log: Logger,
	) {
		this.negotiatedExtensions = handshake.negotiatedExtensions;
		this.negotiatedSubprotocol = handshake.negotiatedSubprotocol;
		this.requestHeaders = handshake.requestHeaders;
		this.responseHeaders = handshake.responseHeaders;
	}

	get state(): ConnectionState {
		return this._state;
	}

	async send(data: string | Uint8Array): Promise<void> {
		if (this._state !== ConnectionState.OPEN) {
			throw new DvaraError("Cannot send on a closed connection", "CONNECTION_CLOSED");
		}
		if (typeof data === "string") {
			await this.transport.write(encodeFrame(Opcode.Text, Buffer.from(data, "utf-8")));
		} else {
			await this.transport.write(encodeFrame(Opcode.Binary, data));
		}
	}

	async receive(): Promise<Message | null> {
		while (this._state === ConnectionState.OPEN) {
			let frame: ParsedFrame | null;
			let result: Message | typeof CLOSED | undefined;
			try {
				frame = await this.nextFrame();
				if (frame === null) {
					this.log.debug("Transport ended without a close frame");
					this._state = ConnectionState.CLOSED;
					return null;
				}
				result = await this.handleFrame(frame);
			} catch (err) {
				if (err instanceof ProtocolError) {
					await this.failConnection(err);
				} else {
					this._state = ConnectionState.CLOSED;
					this.transport.abort();
				}
				throw err;
			}
			if (result === CLOSED) return null;
			if (result !== undefined) return result;
		}
		return null;
	}

	/**
	 * Send a close frame and end the transport. Safe to call more than once.
	 */
	async close(code: number = CloseCode.Normal, reason = ""): Promise<void> {
		if (this._state === ConnectionState.CLOSED) return;
		this._state = ConnectionState.CLOSED;
		try {
			await this.sendClose(code, reason);
			await this.transport.close();
		} catch (err) {
			this.transport.abort();
			throw err;
		}
	}

	// ─── Internal ────────────────────────────────────────────────────────

	private async nextFrame(): Promise<ParsedFrame | null> {
		for (;;) {
			const frame = parseFrame(this.buffer, this.maxMessageBytes);
			if (frame) {
				this.buffer = this.buffer.subarray(frame.bytesConsumed);
				return frame;
			}
			const chunk = await this.transport.read();
			if (chunk === null) return null;
			this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
		}
	}

	private async handleFrame(frame: ParsedFrame): Promise<Message | typeof CLOSED | undefined> {
		switch (frame.opcode) {
			case Opcode.Ping:
				await this.transport.write(encodeFrame(Opcode.Pong, frame.payload));
				return undefined;
			case Opcode.Pong:
				return undefined;
			case Opcode.Close: {
				const { code, reason } = decodeClosePayload(frame.payload);
				this.log.debug("Close frame received", { code, reason });
				this._state = ConnectionState.CLOSED;
				try {
					await this.sendClose(code ?? CloseCode.Normal, "");
					await this.transport.close();
				} catch (err) {
					// Peer already hung up; the close it sent still counts.
					this.log.debug("Close reply not delivered", { error: String(err) });
					this.transport.abort();
				}
				return CLOSED;
			}
			case Opcode.Text:
			case Opcode.Binary:
				if (this.fragmentOpcode !== undefined) {
					throw new ProtocolError("Expected a continuation frame");
				}
				if (frame.fin) {
					return this.toMessage(frame.opcode, frame.payload);
				}
				this.fragmentOpcode = frame.opcode;
				this.fragments = [frame.payload];
				this.fragmentBytes = frame.payload.length;
				return undefined;
			case Opcode.Continuation: {
				const opcode = this.fragmentOpcode;
				if (opcode === undefined) {
					throw new ProtocolError("Continuation frame without a message in progress");
				}
				this.fragmentBytes += frame.payload.length;
				if (this.fragmentBytes > this.maxMessageBytes) {
					throw new ProtocolError("Message exceeds the size limit", CloseCode.MessageTooBig);
				}
				this.fragments.push(frame.payload);
				if (!frame.fin) return undefined;

				const payload = Buffer.concat(this.fragments);
				this.fragments = [];
				this.fragmentBytes = 0;
				this.fragmentOpcode = undefined;
				return this.toMessage(opcode, payload);
			}
		}
	}

	private toMessage(opcode: Opcode.Text | Opcode.Binary, payload: Buffer): Message {
		if (opcode === Opcode.Binary) {
			return { type: "binary", data: payload };
		}
		try {
			return { type: "text", data: this.decoder.decode(payload) };
		} catch {
			throw new ProtocolError("Text message is not valid UTF-8", CloseCode.InvalidPayload);
		}
	}

	private async sendClose(code: number, reason: string): Promise<void> {
		if (this.closeSent) return;
		this.closeSent = true;
		await this.transport.write(encodeFrame(Opcode.Close, encodeClosePayload(code, reason)));
	}

	private async failConnection(error: ProtocolError): Promise<void> {
		this.log.warn("Failing connection", error, { closeCode: error.closeCode });
		this._state = ConnectionState.CLOSED;
		try {
			await this.sendClose(error.closeCode, "");
		} catch (writeErr) {
			this.log.debug("Close frame not delivered", { error: String(writeErr) });
		}
		this.transport.abort(error);
	}
}

/**
 * The default {@link FrameEngine}.
 */
export class DefaultFrameEngine implements FrameEngine {
	private readonly maxMessageBytes: number;
	private readonly log: Logger;

	constructor(opts: FrameEngineOptions = {}) {
		this.maxMessageBytes = opts.maxMessageBytes ?? DEFAULT_CLIENT_SETTINGS.maxMessageBytes;
		this.log = opts.logger ?? createLogger("client:frames", LogLevel.WARN);
	}

	start(transport: Transport, handshake: CompletedHandshake): ConnectionHandle {
		return new FrameConnection(transport, handshake, this.maxMessageBytes, this.log);
	}

	forceClose(transport: Transport): void {
		transport.abort();
	}
}
