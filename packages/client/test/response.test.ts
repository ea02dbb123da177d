import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { HandshakeError } from "@dvara/core";
import { computeAccept, handshakeKeyFrom } from "../src/handshake-key.js";
import type { Header } from "../src/headers.js";
import { validateResponse } from "../src/response.js";
import { SAMPLE_ACCEPT, SAMPLE_KEY } from "./helpers.js";

const key = handshakeKeyFrom(SAMPLE_KEY);

function okHeaders(...extra: Header[]): Header[] {
	return [
		["Upgrade", "websocket"],
		["Connection", "Upgrade"],
		["Sec-WebSocket-Accept", SAMPLE_ACCEPT],
		...extra,
	];
}

function failure(fn: () => unknown): HandshakeError {
	try {
		fn();
	} catch (err) {
		if (err instanceof HandshakeError) return err;
		throw err;
	}
	throw new Error("expected a HandshakeError");
}

describe("validateResponse", () => {
	it("should accept a minimal valid response", () => {
		const result = validateResponse(101, okHeaders(), key);
		expect(result.negotiatedExtensions).toEqual([]);
		expect(result.negotiatedSubprotocol).toBeUndefined();
		expect(result.responseHeaders).toEqual(okHeaders());
		expect(Object.isFrozen(result)).toBe(true);
	});

	it("should reject a non-101 status first", () => {
		const err = failure(() => validateResponse(200, [], key));
		expect(err.message).toBe("Bad status code: 200");
		expect(err.statusCode).toBe(200);
	});

	it("should match Upgrade and Connection case-insensitively", () => {
		const headers: Header[] = [
			["upgrade", "WebSocket"],
			["connection", "keep-alive, UPGRADE"],
			["sec-websocket-accept", SAMPLE_ACCEPT],
		];
		expect(validateResponse(101, headers, key).negotiatedExtensions).toEqual([]);
	});

	it("should reject a wrong Upgrade header", () => {
		const headers: Header[] = [["Upgrade", "h2c"], ["Connection", "Upgrade"], ["Sec-WebSocket-Accept", SAMPLE_ACCEPT]];
		expect(failure(() => validateResponse(101, headers, key)).message).toBe("Invalid Upgrade header: h2c");
	});

	it("should reject a Connection header without the upgrade token", () => {
		const headers: Header[] = [["Upgrade", "websocket"], ["Sec-WebSocket-Accept", SAMPLE_ACCEPT]];
		expect(failure(() => validateResponse(101, headers, key)).message).toBe("Invalid Connection header: (missing)");
	});

	it("should reject a missing accept header", () => {
		const headers: Header[] = [["Upgrade", "websocket"], ["Connection", "Upgrade"]];
		expect(failure(() => validateResponse(101, headers, key)).message).toBe("Missing Sec-WebSocket-Accept header");
	});

	it("should reject SHA-1 of the key without the GUID", () => {
		const wrong = createHash("sha1").update(SAMPLE_KEY).digest("base64");
		const headers: Header[] = [["Upgrade", "websocket"], ["Connection", "Upgrade"], ["Sec-WebSocket-Accept", wrong]];
		expect(failure(() => validateResponse(101, headers, key)).message).toBe("Invalid Sec-WebSocket-Accept header");
	});

	it("should reject the accept value computed from another key", () => {
		const other = computeAccept("AAAAAAAAAAAAAAAAAAAAAA==");
		const headers: Header[] = [["Upgrade", "websocket"], ["Connection", "Upgrade"], ["Sec-WebSocket-Accept", other]];
		expect(failure(() => validateResponse(101, headers, key)).message).toBe("Invalid Sec-WebSocket-Accept header");
	});

	it("should negotiate offered extensions in server order", () => {
		const result = validateResponse(
			101,
			okHeaders(["Sec-WebSocket-Extensions", " x-b ,x-a"]),
			key,
			["x-a", "x-b"],
		);
		expect(result.negotiatedExtensions).toEqual(["x-b", "x-a"]);
	});

	it("should join repeated extension headers", () => {
		const result = validateResponse(
			101,
			okHeaders(["Sec-WebSocket-Extensions", "x-a"], ["Sec-WebSocket-Extensions", "x-b"]),
			key,
			["x-a", "x-b"],
		);
		expect(result.negotiatedExtensions).toEqual(["x-a", "x-b"]);
	});

	it("should reject an extension that was not offered", () => {
		const err = failure(() =>
			validateResponse(101, okHeaders(["Sec-WebSocket-Extensions", "foo"]), key, ["permessage-deflate"]),
		);
		expect(err.message).toBe("Unknown extension: foo");
	});

	it("should reject the whole set when one extension is unknown", () => {
		const err = failure(() =>
			validateResponse(101, okHeaders(["Sec-WebSocket-Extensions", "x-a, x-z"]), key, ["x-a"]),
		);
		expect(err.message).toBe("Unknown extension: x-z");
	});

	it("should reject any extension when none was offered", () => {
		const err = failure(() => validateResponse(101, okHeaders(["Sec-WebSocket-Extensions", "x-a"]), key));
		expect(err.message).toBe("Unknown extension: x-a");
	});

	it("should ignore an empty extensions header", () => {
		expect(validateResponse(101, okHeaders(["Sec-WebSocket-Extensions", ""]), key).negotiatedExtensions).toEqual([]);
	});

	it("should negotiate an offered subprotocol", () => {
		const result = validateResponse(
			101,
			okHeaders(["Sec-WebSocket-Protocol", "chat.v1"]),
			key,
			[],
			["chat.v2", "chat.v1"],
		);
		expect(result.negotiatedSubprotocol).toBe("chat.v1");
	});

	it("should reject a subprotocol that was not offered", () => {
		const err = failure(() =>
			validateResponse(101, okHeaders(["Sec-WebSocket-Protocol", "superchat"]), key, [], ["chat"]),
		);
		expect(err.message).toBe("Unknown subprotocol: superchat");
	});

	it("should reject several selected subprotocols", () => {
		const err = failure(() =>
			validateResponse(
				101,
				okHeaders(["Sec-WebSocket-Protocol", "a"], ["Sec-WebSocket-Protocol", "b"]),
				key,
				[],
				["a", "b"],
			),
		);
		expect(err.message).toBe("Unknown subprotocol: a, b");
	});

	it("should not mutate the offer lists", () => {
		const offered = ["x-a"];
		validateResponse(101, okHeaders(["Sec-WebSocket-Extensions", "x-a"]), key, offered);
		expect(offered).toEqual(["x-a"]);
	});
});
