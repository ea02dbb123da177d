/**
 * HTTP/1.1 response head reader: status line and header block, nothing
 * more. The body, if any, stays in the transport buffer.
 */

import { DvaraError } from "@dvara/core";
import { type Header, type HeaderSet, isHeaderName } from "./headers.js";

export interface ResponseHead {
	statusCode: number;
	reason: string;
	headers: HeaderSet;
}

export interface ReadLimits {
	/** Longest accepted line, CRLF included. */
	maxLineBytes: number;
	/** Most accepted header lines. */
	maxHeaders: number;
}

/** Anything pull-readable line by line, such as a {@link Transport}. */
export interface LineSource {
	readLine(maxBytes: number): Promise<Buffer>;
}

/**
 * The peer sent bytes that are not a valid HTTP/1.1 response head.
 */
export class MalformedMessageError extends DvaraError {
	constructor(message: string) {
		super(message, "MALFORMED_HTTP_MESSAGE");
		this.name = "MalformedMessageError";
	}
}

const STATUS_LINE_RE = /^HTTP\/1\.1 ([1-9]\d{2})(?: (.*))?$/;

async function readLine(source: LineSource, limits: ReadLimits): Promise<string> {
	const raw = await source.readLine(limits.maxLineBytes);
	const length = raw.length;
	if (length < 2 || raw[length - 2] !== 0x0d || raw[length - 1] !== 0x0a) {
		if (raw[length - 1] === 0x0a) {
			throw new MalformedMessageError("Line doesn't end with CRLF");
		}
		throw new MalformedMessageError(`Line exceeds ${limits.maxLineBytes} bytes`);
	}
	return raw.toString("latin1", 0, length - 2);
}

/**
 * Read a status line and headers up to and including the blank line.
 *
 * @throws {MalformedMessageError} On anything that is not a well-formed
 * HTTP/1.1 response head, or exceeds `limits`.
 * @throws {TransportError} If the stream ends first (from the source).
 */
export async function readResponseHead(source: LineSource, limits: ReadLimits): Promise<ResponseHead> {
	const statusLine = await readLine(source, limits);
	const match = STATUS_LINE_RE.exec(statusLine);
	if (!match) {
		throw new MalformedMessageError(`Invalid status line: ${JSON.stringify(statusLine)}`);
	}

	const headers: Header[] = [];
	for (;;) {
		const line = await readLine(source, limits);
		if (line === "") break;

		if (headers.length >= limits.maxHeaders) {
			throw new MalformedMessageError(`Too many headers (limit ${limits.maxHeaders})`);
		}
		if (line.startsWith(" ") || line.startsWith("\t")) {
			throw new MalformedMessageError("Obsolete line folding isn't supported");
		}

		const colon = line.indexOf(":");
		const name = colon === -1 ? "" : line.slice(0, colon);
		if (!isHeaderName(name)) {
			throw new MalformedMessageError(`Invalid header line: ${JSON.stringify(line)}`);
		}
		headers.push([name, line.slice(colon + 1).replace(/^[ \t]+|[ \t]+$/g, "")]);
	}

	return {
		statusCode: Number(match[1]),
		reason: match[2] ?? "",
		headers: Object.freeze(headers),
	};
}
