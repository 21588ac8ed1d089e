/**
 * Connection Targets
 *
 * Parsing and formatting of the addresses a connection may be attempted
 * against.
 */

import { InvalidTargetError } from "./errors.js";

/**
 * A network address: host, optional port, optional scheme
 */
export interface ConnectionTarget {
	readonly scheme?: string;
	readonly host: string;
	readonly port?: number;
}

const DEFAULT_HOST = "localhost";

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//;

function parsePort(input: string, raw: string): number {
	if (!/^\d+$/.test(raw)) {
		throw new InvalidTargetError(input, `port '${raw}' is not a number`);
	}
	const port = Number(raw);
	if (port > 65535) {
		throw new InvalidTargetError(input, `port ${port} is out of range`);
	}
	return port;
}

/**
 * Parse an address string into a frozen target
 *
 * Accepts `host`, `host:port`, `scheme://host:port/path`, `//:port`
 * and IPv6 hosts. An IPv6 host takes a port only when bracketed. A path,
 * query or credentials are dropped.
 *
 * @param url - Address to parse
 * @returns The parsed target
 * @throws InvalidTargetError if the address is empty or has a bad port
 *
 * @example
 * ```ts
 * parseTarget("amqp://broker:5672"); // { scheme: "amqp", host: "broker", port: 5672 }
 * parseTarget("//:5672");            // { host: "localhost", port: 5672 }
 * ```
 */
export function parseTarget(url: string): ConnectionTarget {
	const input = url.trim();
	if (input === "") {
		throw new InvalidTargetError(url, "address is empty");
	}

	let rest = input;
	let scheme: string | undefined;
	const schemeMatch = SCHEME_PATTERN.exec(rest);
	if (schemeMatch?.[1]) {
		scheme = schemeMatch[1].toLowerCase();
		rest = rest.slice(schemeMatch[0].length);
	} else if (rest.startsWith("//")) {
		rest = rest.slice(2);
	}

	// Strip path, query and fragment, then any userinfo
	rest = rest.split(/[/?#]/, 1)[0] ?? "";
	const at = rest.lastIndexOf("@");
	if (at !== -1) rest = rest.slice(at + 1);

	let host = rest;
	let portText: string | undefined;
	if (rest.startsWith("[")) {
		const close = rest.indexOf("]");
		if (close === -1) {
			throw new InvalidTargetError(url, "unterminated IPv6 address");
		}
		host = rest.slice(1, close);
		const after = rest.slice(close + 1);
		if (after.startsWith(":")) portText = after.slice(1);
		else if (after !== "") {
			throw new InvalidTargetError(url, `unexpected '${after}'`);
		}
	} else {
		// More than one colon: a bare IPv6 literal, which cannot carry a port
		const first = rest.indexOf(":");
		const colon = first === rest.lastIndexOf(":") ? first : -1;
		if (colon !== -1) {
			host = rest.slice(0, colon);
			portText = rest.slice(colon + 1);
		}
	}

	if (rest === "") {
		throw new InvalidTargetError(url, "address has no host");
	}
	if (host === "") host = DEFAULT_HOST;

	return Object.freeze({
		...(scheme !== undefined && { scheme }),
		host,
		...(portText !== undefined && { port: parsePort(url, portText) }),
	});
}

/**
 * Render a target as `scheme://host:port`, omitting absent parts
 */
export function formatTarget(target: ConnectionTarget): string {
	const host = target.host.includes(":") ? `[${target.host}]` : target.host;
	const prefix = target.scheme !== undefined ? `${target.scheme}://` : "";
	const suffix = target.port !== undefined ? `:${target.port}` : "";
	return `${prefix}${host}${suffix}`;
}

/**
 * Value equality for targets
 */
export function sameTarget(a: ConnectionTarget, b: ConnectionTarget): boolean {
	return a.scheme === b.scheme && a.host === b.host && a.port === b.port;
}
