/**
 * Ordered HTTP header sets.
 *
 * Headers are kept as `[name, value]` pairs so that order and repeated
 * names survive from the caller all the way to the wire.
 */

import { ConfigurationError } from "@dvara/core";

export type Header = readonly [name: string, value: string];

export type HeaderSet = ReadonlyArray<Header>;

/**
 * Additional request headers: a mapping (each key sent once) or an
 * iterable of pairs (repeated names allowed, order kept).
 */
export type ExtraHeaders =
	| Readonly<Record<string, string>>
	| ReadonlyMap<string, string>
	| Iterable<readonly [string, string]>;

/** RFC 7230 `token`. */
const TOKEN_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const FORBIDDEN_VALUE_RE = /[\r\n\0]/;

export function isHeaderName(name: string): boolean {
	return TOKEN_RE.test(name);
}

/**
 * Reject a header value that would split the request: CR, LF or NUL.
 *
 * @param label - Where the value came from, for the error message.
 * @throws {ConfigurationError}
 */
export function assertHeaderValue(label: string, name: string, value: string): void {
	if (FORBIDDEN_VALUE_RE.test(value)) {
		throw new ConfigurationError(`${label}: value of ${name} contains a line break`);
	}
}

function checkHeader(name: unknown, value: unknown, index: number): Header {
	if (typeof name !== "string" || !isHeaderName(name)) {
		throw new ConfigurationError(`extraHeaders[${index}]: invalid header name ${JSON.stringify(name)}`);
	}
	if (typeof value !== "string") {
		throw new ConfigurationError(`extraHeaders[${index}]: value of ${name} must be a string`);
	}
	assertHeaderValue(`extraHeaders[${index}]`, name, value);
	return [name, value];
}

function isPlainObject(value: object): boolean {
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function isIterable(value: object): value is Iterable<unknown> {
	return Symbol.iterator in value && typeof Reflect.get(value, Symbol.iterator) === "function";
}

/**
 * Flatten caller-supplied extra headers into pairs.
 *
 * Accepts untyped input because options may come from plain JavaScript.
 *
 * @throws {ConfigurationError} If the input is neither a mapping nor an
 * iterable of `[name, value]` pairs, or a pair is not a valid header.
 */
export function normalizeExtraHeaders(extra: unknown): Header[] {
	if (typeof extra !== "object" || extra === null) {
		throw new ConfigurationError("extraHeaders must be a mapping or an iterable of [name, value] pairs");
	}

	if (!(extra instanceof Map) && isPlainObject(extra)) {
		return Object.entries(extra).map(([name, value], i) => checkHeader(name, value, i));
	}

	if (!isIterable(extra)) {
		throw new ConfigurationError("extraHeaders must be a mapping or an iterable of [name, value] pairs");
	}

	const headers: Header[] = [];
	let i = 0;
	for (const pair of extra) {
		if (!Array.isArray(pair) || pair.length !== 2) {
			throw new ConfigurationError(`extraHeaders[${i}]: expected a [name, value] pair`);
		}
		headers.push(checkHeader(pair[0], pair[1], i));
		i++;
	}
	return headers;
}

/** All values of `name`, compared case-insensitively, in order. */
export function getHeaderValues(headers: HeaderSet, name: string): string[] {
	const wanted = name.toLowerCase();
	return headers.filter(([n]) => n.toLowerCase() === wanted).map(([, value]) => value);
}

/** First value of `name`, or `undefined` when absent. */
export function getHeader(headers: HeaderSet, name: string): string | undefined {
	return getHeaderValues(headers, name)[0];
}
