/**
 * Sandhi — the client connection state machine.
 * Sanskrit: Sandhi (सन्धि) = joining, junction.
 *
 * A {@link ClientConnection} owns a transport from the moment it is opened
 * until the handshake either succeeds (the transport then moves to the
 * frame engine) or fails (the transport is force-closed). The handshake
 * itself is a {@link HandshakeStrategy} composed in, so a server-side
 * handshake could drive the same machine.
 */

import { DvaraError, LogLevel, type Logger, createLogger } from "@dvara/core";
import type { HeaderSet } from "./headers.js";
import type { HandshakeResult } from "./response.js";
import type { Transport } from "./transport.js";

export enum ConnectionState {
	CONNECTING = "CONNECTING",
	OPEN = "OPEN",
	CLOSED = "CLOSED",
}

/** A message received on an open connection. */
export type Message =
	| { type: "text"; data: string }
	| { type: "binary"; data: Buffer };

/** Handshake outcome plus the request headers that were actually sent. */
export interface CompletedHandshake extends HandshakeResult {
	readonly requestHeaders: HeaderSet;
}

/**
 * One side's opening handshake, run over a freshly opened transport.
 */
export interface HandshakeStrategy {
	perform(transport: Transport): Promise<CompletedHandshake>;
}

/**
 * An open connection, as returned by `connect`.
 */
export interface ConnectionHandle {
	readonly state: ConnectionState;
	readonly negotiatedExtensions: readonly string[];
	readonly negotiatedSubprotocol: string | undefined;
	readonly requestHeaders: HeaderSet;
	readonly responseHeaders: HeaderSet;
	/** Send a text (string) or binary message. */
	send(data: string | Uint8Array): Promise<void>;
	/** Next message, or `null` once the connection has closed. */
	receive(): Promise<Message | null>;
	close(code?: number, reason?: string): Promise<void>;
}

/**
 * Message engine that takes over a transport once the handshake is done.
 */
export interface FrameEngine {
	start(transport: Transport, handshake: CompletedHandshake): ConnectionHandle;
	/** Abort the transport without a closing handshake. */
	forceClose(transport: Transport): void;
}

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
	[ConnectionState.CONNECTING]: [ConnectionState.OPEN, ConnectionState.CLOSED],
	[ConnectionState.OPEN]: [ConnectionState.CLOSED],
	[ConnectionState.CLOSED]: [],
};

export class ClientConnection {
	private _state = ConnectionState.CONNECTING;
	private readonly transport: Transport;
	private readonly handshake: HandshakeStrategy;
	private readonly engine: FrameEngine;
	private readonly log: Logger;

	constructor(transport: Transport, handshake: HandshakeStrategy, engine: FrameEngine, log?: Logger) {
		this.transport = transport;
		this.handshake = handshake;
		this.engine = engine;
		this.log = log ?? createLogger("client:connection", LogLevel.WARN);
	}

	get state(): ConnectionState {
		return this._state;
	}

	/**
	 * Run the handshake and hand the transport to the frame engine.
	 *
	 * On failure the transport is force-closed and the original error is
	 * re-thrown; the state ends CLOSED.
	 */
	async establish(): Promise<ConnectionHandle> {
		if (this._state !== ConnectionState.CONNECTING) {
			throw new DvaraError(`Cannot establish a connection in state ${this._state}`, "INVALID_STATE");
		}

		let completed: CompletedHandshake;
		try {
			completed = await this.handshake.perform(this.transport);
		} catch (err) {
			this.transition(ConnectionState.CLOSED);
			this.engine.forceClose(this.transport);
			this.log.debug("Transport force-closed after failed handshake");
			throw err;
		}

		this.transition(ConnectionState.OPEN);
		return this.engine.start(this.transport, completed);
	}

	private transition(next: ConnectionState): void {
		if (!TRANSITIONS[this._state].includes(next)) {
			throw new DvaraError(`Illegal state transition ${this._state} -> ${next}`, "INVALID_STATE");
		}
		this._state = next;
	}
}
