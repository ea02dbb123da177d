import { describe, it, expect } from "vitest";
import {
	DvaraError,
	ConfigurationError,
	InvalidURIError,
	TransportError,
	HandshakeError,
	ProtocolError,
	AbortError,
} from "../src/errors.js";

// ═══════════════════════════════════════════════════════════════════════════
// DVARA ERROR (Base)
// ═══════════════════════════════════════════════════════════════════════════

describe("DvaraError", () => {
	it("should store message, code and name", () => {
		const err = new DvaraError("something broke", "MY_CODE");
		expect(err.message).toBe("something broke");
		expect(err.code).toBe("MY_CODE");
		expect(err.name).toBe("DvaraError");
	});

	it("should be an instance of Error", () => {
		expect(new DvaraError("msg", "C")).toBeInstanceOf(Error);
	});

	it("should support cause chaining", () => {
		const cause = new Error("root cause");
		const err = new DvaraError("wrapper", "WRAP", cause);
		expect(err.cause).toBe(cause);
	});

	it("should have undefined cause when not provided", () => {
		const err = new DvaraError("msg", "C");
		expect(err.cause).toBeUndefined();
		expect("cause" in err).toBe(false);
	});
});

// ═══════════════════════════════════════════════════════════════════════════
// SUBCLASSES
// ═══════════════════════════════════════════════════════════════════════════

describe("error subclasses", () => {
	const cases: Array<[string, DvaraError, string]> = [
		["ConfigurationError", new ConfigurationError("bad option"), "CONFIGURATION_ERROR"],
		["InvalidURIError", new InvalidURIError("http://x", "scheme http isn't ws or wss"), "INVALID_URI"],
		["TransportError", new TransportError("refused"), "TRANSPORT_ERROR"],
		["HandshakeError", new HandshakeError("rejected"), "HANDSHAKE_ERROR"],
		["ProtocolError", new ProtocolError("bad frame"), "PROTOCOL_ERROR"],
		["AbortError", new AbortError(), "ABORT_ERROR"],
	];

	for (const [name, err, code] of cases) {
		it(`${name} should carry name ${name} and code ${code}`, () => {
			expect(err).toBeInstanceOf(DvaraError);
			expect(err.name).toBe(name);
			expect(err.code).toBe(code);
		});
	}
});

describe("InvalidURIError", () => {
	it("should name the URI and the reason", () => {
		const err = new InvalidURIError("ftp://example.com", "scheme ftp isn't ws or wss");
		expect(err.message).toBe("ftp://example.com isn't a valid URI: scheme ftp isn't ws or wss");
		expect(err.uri).toBe("ftp://example.com");
	});
});

describe("TransportError", () => {
	it("should keep the socket error as cause", () => {
		const cause = new Error("ECONNREFUSED");
		expect(new TransportError("Failed to connect", cause).cause).toBe(cause);
	});
});

describe("HandshakeError", () => {
	it("should carry the status code of a rejected response", () => {
		const err = new HandshakeError("Bad status code: 403", { statusCode: 403 });
		expect(err.statusCode).toBe(403);
	});

	it("should leave statusCode undefined for other failures", () => {
		expect(new HandshakeError("Invalid Upgrade header: h2c").statusCode).toBeUndefined();
	});
});

describe("ProtocolError", () => {
	it("should default to close code 1002", () => {
		expect(new ProtocolError("bad frame").closeCode).toBe(1002);
	});

	it("should accept another close code", () => {
		expect(new ProtocolError("too big", 1009).closeCode).toBe(1009);
	});
});

describe("AbortError", () => {
	it("should have a default message", () => {
		expect(new AbortError().message).toBe("Operation aborted");
	});

	it("should accept a custom message and cause", () => {
		const err = new AbortError("connect() was aborted", "user");
		expect(err.message).toBe("connect() was aborted");
		expect(err.cause).toBe("user");
	});
});
