/**
 * Byte transports for the handshake and the frame engine.
 *
 * The handshake pulls lines, the frame engine pulls chunks; both read from
 * the same buffer, so bytes that arrive right after the response head are
 * handed to the frame engine untouched.
 */

import net from "node:net";
import tls from "node:tls";
import { AbortError, DEFAULT_CLIENT_SETTINGS, TransportError } from "@dvara/core";
import type { TlsPolicy } from "./tls-policy.js";

export interface Transport {
	/** `true` once the underlying connection is gone. */
	readonly closed: boolean;
	/** Resolves once the bytes are handed to the OS. */
	write(data: string | Uint8Array): Promise<void>;
	/**
	 * Read through the next LF. Returns at most `maxBytes`; a result that
	 * doesn't end in LF means the line was longer than that.
	 */
	readLine(maxBytes: number): Promise<Buffer>;
	/** Next buffered or incoming bytes, `null` at end of stream. */
	read(): Promise<Buffer | null>;
	/** Tear down immediately; pending and later reads reject with `reason`. */
	abort(reason?: Error): void;
	/** Finish writing, then close. */
	close(): Promise<void>;
}

export interface TransportTarget {
	host: string;
	port: number;
	tls: TlsPolicy;
	/** Buffered unread bytes above which the socket stops reading. */
	highWaterMark?: number;
}

export type OpenTransport = (target: TransportTarget, signal?: AbortSignal) => Promise<Transport>;

const EMPTY = Buffer.alloc(0);

/** Largest frame header (14 bytes) on top of the largest message. */
export const DEFAULT_HIGH_WATER_MARK = DEFAULT_CLIENT_SETTINGS.maxMessageBytes + 14;

/**
 * Pull-based read buffer shared by every transport. Subclasses feed it
 * with {@link push}, {@link pushEnd} and {@link fail}.
 *
 * Reads are sequential: one pending read at a time. Once more than
 * `highWaterMark` unread bytes are held, {@link pauseSource} is called;
 * {@link resumeSource} follows when reads drain the buffer below it.
 */
export abstract class BufferedTransport implements Transport {
	protected failure?: Error;
	private buffer: Buffer = EMPTY;
	private ended = false;
	private waiter?: () => void;
	private _paused = false;

	constructor(protected readonly highWaterMark: number = DEFAULT_HIGH_WATER_MARK) {}

	/** `true` while the source is held back by a full buffer. */
	get paused(): boolean {
		return this._paused;
	}

	abstract readonly closed: boolean;
	abstract write(data: string | Uint8Array): Promise<void>;
	abstract close(): Promise<void>;
	protected abstract destroy(): void;

	async readLine(maxBytes: number): Promise<Buffer> {
		for (;;) {
			if (this.failure) throw this.failure;

			const lf = this.buffer.indexOf(0x0a);
			if (lf !== -1 && lf < maxBytes) {
				return this.take(lf + 1);
			}
			if (this.buffer.length >= maxBytes) {
				return this.take(maxBytes);
			}
			if (this.ended) {
				throw new TransportError("Connection closed before the response was complete");
			}
			await this.nextEvent();
		}
	}

	async read(): Promise<Buffer | null> {
		for (;;) {
			if (this.failure) throw this.failure;
			if (this.buffer.length > 0) {
				return this.take(this.buffer.length);
			}
			if (this.ended) return null;
			await this.nextEvent();
		}
	}

	abort(reason?: Error): void {
		this.fail(reason ?? new TransportError("Transport aborted"));
		this.destroy();
	}

	protected push(chunk: Buffer): void {
		this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
		if (!this._paused && this.buffer.length > this.highWaterMark) {
			this._paused = true;
			this.pauseSource();
		}
		this.wake();
	}

	/** Stop the source from delivering more bytes. */
	protected pauseSource(): void {}

	/** Let the source deliver bytes again. */
	protected resumeSource(): void {}

	protected pushEnd(): void {
		this.ended = true;
		this.wake();
	}

	protected fail(error: Error): void {
		this.failure ??= error;
		this.wake();
	}

	private take(n: number): Buffer {
		const out = this.buffer.subarray(0, n);
		this.buffer = n === this.buffer.length ? EMPTY : this.buffer.subarray(n);
		if (this._paused && this.buffer.length <= this.highWaterMark) {
			this._paused = false;
			this.resumeSource();
		}
		return out;
	}

	private nextEvent(): Promise<void> {
		if (this.waiter) {
			return Promise.reject(new TransportError("Concurrent reads on one transport"));
		}
		return new Promise<void>((resolve) => {
			this.waiter = resolve;
		});
	}

	private wake(): void {
		const waiter = this.waiter;
		this.waiter = undefined;
		waiter?.();
	}
}

/**
 * Transport over a connected `net.Socket` or `tls.TLSSocket`.
 */
export class SocketTransport extends BufferedTransport {
	private readonly socket: net.Socket;

	constructor(socket: net.Socket, highWaterMark?: number) {
		super(highWaterMark);
		this.socket = socket;
		socket.on("data", (chunk: Buffer) => this.push(chunk));
		socket.on("end", () => this.pushEnd());
		socket.on("close", () => this.pushEnd());
		socket.on("error", (err: Error) => this.fail(new TransportError(`Socket error: ${err.message}`, err)));
	}

	get closed(): boolean {
		return this.socket.destroyed;
	}

	write(data: string | Uint8Array): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			if (this.socket.destroyed || this.socket.writableEnded) {
				reject(this.failure ?? new TransportError("Cannot write to a closed transport"));
				return;
			}
			this.socket.write(data, (err) => {
				if (err) reject(this.failure ?? new TransportError(`Write failed: ${err.message}`, err));
				else resolve();
			});
		});
	}

	close(): Promise<void> {
		return new Promise<void>((resolve) => {
			if (this.socket.destroyed || this.socket.writableEnded) {
				resolve();
				return;
			}
			this.socket.end(() => resolve());
		});
	}

	protected destroy(): void {
		this.socket.destroy();
	}

	protected pauseSource(): void {
		this.socket.pause();
	}

	protected resumeSource(): void {
		this.socket.resume();
	}
}

/** The error an aborted signal carries, or a generic {@link AbortError}. */
export function abortReason(signal: AbortSignal): Error {
	return signal.reason instanceof Error ? signal.reason : new AbortError();
}

/**
 * Open a TCP (or TLS, per `target.tls`) connection and wrap it.
 *
 * Rejects with {@link TransportError} on DNS/TCP/TLS failure; rejects with
 * the signal's reason if `signal` fires first. The socket is destroyed in
 * both cases.
 */
export const openSocketTransport: OpenTransport = (target, signal) => {
	return new Promise<Transport>((resolve, reject) => {
		if (signal?.aborted) {
			reject(abortReason(signal));
			return;
		}

		const socket = target.tls.secure
			? tls.connect({ ...target.tls.options, host: target.host, port: target.port })
			: net.connect({ host: target.host, port: target.port });
		const readyEvent = target.tls.secure ? "secureConnect" : "connect";

		const cleanup = (): void => {
			socket.off(readyEvent, onReady);
			socket.off("error", onError);
			signal?.removeEventListener("abort", onAbort);
		};
		const onReady = (): void => {
			cleanup();
			resolve(new SocketTransport(socket, target.highWaterMark));
		};
		const onError = (err: Error): void => {
			cleanup();
			socket.destroy();
			reject(new TransportError(`Failed to connect to ${target.host}:${target.port}: ${err.message}`, err));
		};
		const onAbort = (): void => {
			cleanup();
			socket.destroy();
			reject(signal ? abortReason(signal) : new AbortError());
		};

		socket.once(readyEvent, onReady);
		socket.once("error", onError);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
};
