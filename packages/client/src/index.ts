// @dvara/client: WebSocket client opening handshake
export { connect } from "./client.js";
export type { ConnectOptions, ConnectDeps } from "./client.js";

export { ClientConnection, ConnectionState } from "./connection.js";
export type {
	CompletedHandshake,
	ConnectionHandle,
	FrameEngine,
	HandshakeStrategy,
	Message,
} from "./connection.js";
export { ClientHandshake } from "./client-handshake.js";

export { parseUri, defaultPort } from "./uri.js";
export type { EndpointDescriptor } from "./uri.js";

export { buildRequest, formatHost, USER_AGENT, CLIENT_VERSION } from "./request.js";
export type { RequestOptions, HandshakeRequest } from "./request.js";
export { assertHeaderValue, getHeader, getHeaderValues, normalizeExtraHeaders } from "./headers.js";
export type { Header, HeaderSet, ExtraHeaders } from "./headers.js";
export { WS_GUID, computeAccept, acceptMatches, generateHandshakeKey, handshakeKeyFrom } from "./handshake-key.js";
export type { HandshakeKey } from "./handshake-key.js";

export { serializeRequest, sendRequest, receiveResponse } from "./wire.js";
export { readResponseHead, MalformedMessageError } from "./http-reader.js";
export type { ResponseHead, ReadLimits, LineSource } from "./http-reader.js";
export { validateResponse } from "./response.js";
export type { HandshakeResult } from "./response.js";

export { resolveTlsPolicy } from "./tls-policy.js";
export type { TlsPolicy } from "./tls-policy.js";
export { BufferedTransport, SocketTransport, openSocketTransport } from "./transport.js";
export type { Transport, TransportTarget, OpenTransport } from "./transport.js";

export { DefaultFrameEngine, FrameConnection } from "./frame-engine.js";
export type { FrameEngineOptions } from "./frame-engine.js";
export { Opcode, CloseCode, encodeFrame, parseFrame, isValidCloseCode } from "./frames.js";
