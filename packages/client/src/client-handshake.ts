import type { Logger } from "@dvara/core";
import type { CompletedHandshake, HandshakeStrategy } from "./connection.js";
import type { HandshakeKey } from "./handshake-key.js";
import type { ReadLimits } from "./http-reader.js";
import { type RequestOptions, buildRequest } from "./request.js";
import { validateResponse } from "./response.js";
import type { Transport } from "./transport.js";
import type { EndpointDescriptor } from "./uri.js";
import { receiveResponse, sendRequest } from "./wire.js";

/**
 * Client side of the opening handshake: build, send, receive, validate.
 */
export class ClientHandshake implements HandshakeStrategy {
	constructor(
		private readonly endpoint: EndpointDescriptor,
		private readonly offers: RequestOptions,
		private readonly limits: ReadLimits,
		private readonly log: Logger,
		private readonly newKey?: () => HandshakeKey,
	) {}

	async perform(transport: Transport): Promise<CompletedHandshake> {
		const request = buildRequest(this.endpoint, this.offers, this.newKey);

		await sendRequest(transport, this.endpoint.resourceName, request.headers);
		this.log.debug("Handshake request sent", { resource: this.endpoint.resourceName });

		const response = await receiveResponse(transport, this.limits);
		this.log.debug("Handshake response received", { status: response.statusCode, reason: response.reason });

		const result = validateResponse(
			response.statusCode,
			response.headers,
			request.key,
			this.offers.extensions,
			this.offers.subprotocols,
		);
		return Object.freeze({ ...result, requestHeaders: request.headers });
	}
}
