/**
 * Open a WebSocket client connection with `connect`.
 *
 * Sequencing: resolve the URI, validate options, pick the TLS policy, open
 * the transport, run the handshake, hand off to the frame engine. Every
 * failure before the last step leaves no open transport behind.
 */

import type { ConnectionOptions } from "node:tls";
import {
	AbortError,
	type ClientSettings,
	DvaraError,
	HandshakeError,
	type Logger,
	LogLevel,
	TransportError,
	assertValid,
	createLogger,
	resolveClientSettings,
	v,
} from "@dvara/core";
import { ClientHandshake } from "./client-handshake.js";
import { type ConnectionHandle, type FrameEngine, ClientConnection } from "./connection.js";
import { DefaultFrameEngine } from "./frame-engine.js";
import type { HandshakeKey } from "./handshake-key.js";
import { assertHeaderValue, normalizeExtraHeaders } from "./headers.js";
import type { RequestOptions } from "./request.js";
import { resolveTlsPolicy } from "./tls-policy.js";
import {
	type OpenTransport,
	type Transport,
	type TransportTarget,
	abortReason,
	openSocketTransport,
} from "./transport.js";
import { parseUri } from "./uri.js";

export interface ConnectOptions extends RequestOptions, Partial<ClientSettings> {
	/** TLS options for `wss://`; rejected for `ws://`. */
	tls?: ConnectionOptions;
	/** Aborting it cancels the attempt and closes the transport. */
	signal?: AbortSignal;
}

/** Replaceable collaborators. */
export interface ConnectDeps {
	openTransport?: OpenTransport;
	frameEngine?: FrameEngine;
	logger?: Logger;
	/** Handshake key source. */
	newKey?: () => HandshakeKey;
	/** Environment consulted for settings. Defaults to `process.env`. */
	env?: NodeJS.ProcessEnv;
}

const tokenList = v.optional(v.array(v.string().min(1).pattern(/^[^,\r\n]+$/).validate).validate).validate;

const offersValidator = v.object({
	origin: v.optional(v.string().validate).validate,
	extensions: tokenList,
	subprotocols: tokenList,
	userAgent: v.optional(v.string().min(1).validate).validate,
}).validate;

/**
 * Open `target` under `signal`. A transport that arrives after the signal
 * fired is aborted rather than leaked.
 */
function openUnderSignal(open: OpenTransport, target: TransportTarget, signal: AbortSignal): Promise<Transport> {
	return new Promise<Transport>((resolve, reject) => {
		if (signal.aborted) {
			reject(abortReason(signal));
			return;
		}
		const onAbort = (): void => reject(abortReason(signal));
		signal.addEventListener("abort", onAbort, { once: true });

		open(target, signal).then(
			(transport) => {
				signal.removeEventListener("abort", onAbort);
				if (signal.aborted) {
					transport.abort(abortReason(signal));
					return;
				}
				resolve(transport);
			},
			(err: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(err instanceof DvaraError
					? err
					: new TransportError(`Failed to connect to ${target.host}:${target.port}`, err));
			},
		);
	});
}

/**
 * Connect to a WebSocket server and complete the opening handshake.
 *
 * Resolves only with an OPEN handle. Rejects with `InvalidURIError` or
 * `ConfigurationError` before any network activity, `TransportError` if
 * the connection cannot be opened, `HandshakeError` if the server's answer
 * is rejected, or `AbortError` if `options.signal` fires.
 *
 * @example
 * ```ts
 * const ws = await connect("wss://example.com/chat", { subprotocols: ["chat.v2"] });
 * await ws.send("hello");
 * const reply = await ws.receive();
 * await ws.close();
 * ```
 */
export async function connect(
	uri: string,
	options: ConnectOptions = {},
	deps: ConnectDeps = {},
): Promise<ConnectionHandle> {
	const endpoint = parseUri(uri);

	const offers = assertValid(options, offersValidator, "connect options");
	if (offers.origin !== undefined) assertHeaderValue("origin", "Origin", offers.origin);
	if (offers.userAgent !== undefined) assertHeaderValue("userAgent", "User-Agent", offers.userAgent);
	const extraHeaders = options.extraHeaders === undefined ? undefined : normalizeExtraHeaders(options.extraHeaders);
	const settings = resolveClientSettings({
		handshakeTimeoutMs: options.handshakeTimeoutMs,
		maxHeaderLineBytes: options.maxHeaderLineBytes,
		maxHeaders: options.maxHeaders,
		maxMessageBytes: options.maxMessageBytes,
	}, deps.env);
	const tls = resolveTlsPolicy(endpoint, options.tls);

	const log = (deps.logger ?? createLogger("client", LogLevel.WARN)).withContext({ host: endpoint.host, port: endpoint.port });
	const engine = deps.frameEngine ?? new DefaultFrameEngine({
		maxMessageBytes: settings.maxMessageBytes,
		logger: log.child("frames"),
	});

	const controller = new AbortController();
	const { signal } = controller;
	let stage: "transport" | "handshake" = "transport";

	const onCallerAbort = (): void => {
		controller.abort(new AbortError("connect() was aborted", options.signal?.reason));
	};
	if (options.signal?.aborted) onCallerAbort();
	else options.signal?.addEventListener("abort", onCallerAbort, { once: true });

	const timeoutMs = settings.handshakeTimeoutMs;
	const timer = timeoutMs > 0
		? setTimeout(() => {
			controller.abort(stage === "transport"
				? new TransportError(`Timed out opening connection to ${endpoint.host}:${endpoint.port} after ${timeoutMs}ms`)
				: new HandshakeError(`Opening handshake timed out after ${timeoutMs}ms`));
		}, timeoutMs)
		: undefined;

	try {
		log.debug("Opening transport", { secure: endpoint.secure });
		let transport: Transport;
		try {
			transport = await openUnderSignal(deps.openTransport ?? openSocketTransport, {
				host: endpoint.host,
				port: endpoint.port,
				tls,
				highWaterMark: settings.maxMessageBytes + 14,
			}, signal);
		} catch (err) {
			log.warn("Could not open transport", err);
			throw err;
		}

		stage = "handshake";
		const abortTransport = (): void => transport.abort(abortReason(signal));
		if (signal.aborted) abortTransport();
		else signal.addEventListener("abort", abortTransport, { once: true });

		const handshake = new ClientHandshake(
			endpoint,
			{
				origin: offers.origin,
				extensions: Object.freeze(offers.extensions ?? []),
				subprotocols: Object.freeze(offers.subprotocols ?? []),
				extraHeaders,
				userAgent: offers.userAgent,
			},
			{ maxLineBytes: settings.maxHeaderLineBytes, maxHeaders: settings.maxHeaders },
			log.child("handshake"),
			deps.newKey,
		);
		const connection = new ClientConnection(transport, handshake, engine, log.child("connection"));

		try {
			const handle = await connection.establish();
			log.info("Connection open", {
				extensions: handle.negotiatedExtensions,
				subprotocol: handle.negotiatedSubprotocol ?? null,
			});
			return handle;
		} catch (err) {
			log.warn("Opening handshake failed", err);
			throw err;
		} finally {
			signal.removeEventListener("abort", abortTransport);
		}
	} finally {
		clearTimeout(timer);
		options.signal?.removeEventListener("abort", onCallerAbort);
	}
}
