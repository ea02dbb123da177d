import { describe, it, expect } from "vitest";
import { HandshakeError, TransportError } from "@dvara/core";
import { MalformedMessageError, readResponseHead } from "../src/http-reader.js";
import { receiveResponse, sendRequest, serializeRequest } from "../src/wire.js";
import { ScriptedTransport } from "./helpers.js";

const limits = { maxLineBytes: 4096, maxHeaders: 256 };

function transportWith(raw: string, end = false): ScriptedTransport {
	const transport = new ScriptedTransport();
	transport.feed(raw);
	if (end) transport.endStream();
	return transport;
}

describe("serializeRequest", () => {
	it("should write a GET request line, header lines and a blank line", () => {
		const text = serializeRequest("/chat?room=1", [["Host", "example.com"], ["X-A", "1"], ["X-A", "2"]]);
		expect(text).toBe("GET /chat?room=1 HTTP/1.1\r\nHost: example.com\r\nX-A: 1\r\nX-A: 2\r\n\r\n");
	});
});

describe("sendRequest", () => {
	it("should write the serialized request to the transport", async () => {
		const transport = new ScriptedTransport();
		await sendRequest(transport, "/", [["Host", "h"]]);
		expect(transport.requestText).toBe("GET / HTTP/1.1\r\nHost: h\r\n\r\n");
	});
});

describe("readResponseHead", () => {
	it("should parse the status line and headers in order", async () => {
		const head = await readResponseHead(
			transportWith("HTTP/1.1 101 Switching Protocols\r\nUpgrade: websocket\r\nX-Dup: a\r\nX-Dup:b \r\n\r\n"),
			limits,
		);
		expect(head.statusCode).toBe(101);
		expect(head.reason).toBe("Switching Protocols");
		expect(head.headers).toEqual([["Upgrade", "websocket"], ["X-Dup", "a"], ["X-Dup", "b"]]);
	});

	it("should accept a status line without a reason phrase", async () => {
		const head = await readResponseHead(transportWith("HTTP/1.1 404\r\n\r\n"), limits);
		expect(head.statusCode).toBe(404);
		expect(head.reason).toBe("");
	});

	it("should leave bytes after the blank line in the transport", async () => {
		const transport = transportWith("HTTP/1.1 101 OK\r\n\r\n\x81\x02hi");
		await readResponseHead(transport, limits);
		const rest = await transport.read();
		expect(rest?.toString("latin1")).toBe("\x81\x02hi");
	});

	it("should assemble lines split across chunks", async () => {
		const transport = new ScriptedTransport();
		const pending = readResponseHead(transport, limits);
		transport.feed("HTTP/1.1 10");
		transport.feed("1 Switching\r\nUpg");
		transport.feed("rade: websocket\r\n\r\n");
		const head = await pending;
		expect(head.statusCode).toBe(101);
		expect(head.headers).toEqual([["Upgrade", "websocket"]]);
	});

	it.each([
		["HTTP/1.0 101 OK\r\n\r\n", "Invalid status line: \"HTTP/1.0 101 OK\""],
		["HTTP/1.1 1O1 OK\r\n\r\n", "Invalid status line: \"HTTP/1.1 1O1 OK\""],
		["HTTP/1.1 101 OK\r\nno colon here\r\n\r\n", "Invalid header line: \"no colon here\""],
		["HTTP/1.1 101 OK\r\nBad Name: x\r\n\r\n", "Invalid header line: \"Bad Name: x\""],
		["HTTP/1.1 101 OK\r\nA: 1\r\n continued\r\n\r\n", "Obsolete line folding isn't supported"],
		["HTTP/1.1 101 OK\nA: 1\r\n\r\n", "Line doesn't end with CRLF"],
	])("should reject %j", async (raw, message) => {
		await expect(readResponseHead(transportWith(raw), limits)).rejects.toThrow(new MalformedMessageError(message));
	});

	it("should reject lines longer than the limit", async () => {
		const raw = `HTTP/1.1 101 OK\r\nX-Long: ${"a".repeat(100)}\r\n\r\n`;
		await expect(readResponseHead(transportWith(raw), { maxLineBytes: 64, maxHeaders: 10 }))
			.rejects.toThrow("Line exceeds 64 bytes");
	});

	it("should reject more headers than the limit", async () => {
		const raw = "HTTP/1.1 101 OK\r\nA: 1\r\nB: 2\r\nC: 3\r\n\r\n";
		await expect(readResponseHead(transportWith(raw), { maxLineBytes: 4096, maxHeaders: 2 }))
			.rejects.toThrow("Too many headers (limit 2)");
	});
});

describe("receiveResponse", () => {
	it("should wrap parse failures as a malformed-message HandshakeError", async () => {
		const err = await receiveResponse(transportWith("garbage\r\n\r\n"), limits).catch((e: unknown) => e);
		expect(err).toBeInstanceOf(HandshakeError);
		if (err instanceof HandshakeError) {
			expect(err.message).toBe("Malformed HTTP message");
			expect(err.cause).toBeInstanceOf(MalformedMessageError);
		}
	});

	it("should surface a premature close as TransportError", async () => {
		const err = await receiveResponse(transportWith("HTTP/1.1 101 OK\r\nUpgr", true), limits)
			.catch((e: unknown) => e);
		expect(err).toBeInstanceOf(TransportError);
		expect(err).not.toBeInstanceOf(HandshakeError);
	});

	it("should surface an aborted transport's reason unchanged", async () => {
		const transport = new ScriptedTransport();
		const pending = receiveResponse(transport, limits);
		const reason = new HandshakeError("Opening handshake timed out after 5ms");
		transport.abort(reason);
		await expect(pending).rejects.toBe(reason);
		expect(transport.aborted).toBe(true);
	});
});
