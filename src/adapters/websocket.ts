/**
 * WebSocket Transport Adapter
 *
 * Runs connection attempts over WebSocket using `ws` (or any compatible
 * constructor) and reports their lifecycle to the reconnect engine.
 */

import type { Constructor } from "type-fest";
import { WebSocket as NodeWebSocket } from "ws";
import {
	AddressUnreachableError,
	AuthenticationError,
	type LinkError,
	PeerRefusedError,
	ProtocolNegotiationError,
} from "../errors.js";
import type { ConnectionTarget } from "../target.js";
import {
	type ITransport,
	type IWebSocket,
	type TransportFactory,
	type TransportSettings,
	type TransportSink,
	type WebSocketOptions,
	WebSocketReadyState,
} from "../types.js";

/**
 * Options for the WebSocket transport
 */
export interface WebSocketTransportOptions {
	/** Request path appended to every address (default: "/") */
	path?: string;
	/** WebSocket subprotocols (default: "amqp") */
	protocols?: string | string[];
	/** Handshake timeout in ms */
	handshakeTimeout?: number;
	/** Custom WebSocket constructor (defaults to `ws`) */
	WebSocket?: Constructor<
		IWebSocket,
		[url: string, protocols?: string | string[], options?: WebSocketOptions]
	>;
}

const UNREACHABLE_CODES = new Set([
	"ENOTFOUND",
	"EAI_AGAIN",
	"EHOSTUNREACH",
	"ENETUNREACH",
	"ETIMEDOUT",
]);
const REFUSED_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "EPIPE"]);

/**
 * Close codes at or above this carry an application error condition
 */
const APPLICATION_CLOSE_CODE = 4000;
const NORMAL_CLOSE_CODE = 1000;

function readString(value: unknown, key: string): string | undefined {
	if (typeof value === "object" && value != null && key in value) {
		const field: unknown = Reflect.get(value, key);
		return typeof field === "string" ? field : undefined;
	}
	return undefined;
}

function readNumber(value: unknown, key: string): number | undefined {
	if (typeof value === "object" && value != null && key in value) {
		const field: unknown = Reflect.get(value, key);
		return typeof field === "number" ? field : undefined;
	}
	return undefined;
}

/**
 * Map a WebSocket error event (or the Error inside it) onto the link
 * error taxonomy
 */
export function classifyWebSocketError(
	target: ConnectionTarget,
	event: unknown,
): LinkError {
	const inner: unknown =
		typeof event === "object" && event != null && "error" in event
			? Reflect.get(event, "error")
			: event;
	const code = readString(inner, "code");
	const message =
		readString(inner, "message") ??
		readString(event, "message") ??
		"WebSocket error";

	if (code && UNREACHABLE_CODES.has(code)) {
		return new AddressUnreachableError(target, message, inner);
	}
	if (code && REFUSED_CODES.has(code)) {
		return new PeerRefusedError(target, message);
	}

	const status = /Unexpected server response: (\d{3})/.exec(message)?.[1];
	if (status === "401" || status === "403") {
		return new AuthenticationError(target, message, inner);
	}
	if (status !== undefined || /subprotocol|Sec-WebSocket/i.test(message)) {
		return new ProtocolNegotiationError(target, message, inner);
	}
	return new AddressUnreachableError(target, message, inner);
}

/**
 * Build the WebSocket URL for a target
 */
export function toWebSocketUrl(target: ConnectionTarget, path = "/"): string {
	const secure =
		target.scheme === "wss" ||
		target.scheme === "amqps" ||
		target.scheme === "https";
	const host = target.host.includes(":") ? `[${target.host}]` : target.host;
	const port = target.port !== undefined ? `:${target.port}` : "";
	const suffix = path.startsWith("/") ? path : `/${path}`;
	return `${secure ? "wss" : "ws"}://${host}${port}${suffix}`;
}

/**
 * Handshake headers for one attempt
 */
export function handshakeHeaders(
	settings: TransportSettings,
): Record<string, string> {
	const headers: Record<string, string> = { ...settings.headers };
	if (settings.user !== undefined) {
		const credentials = `${settings.user}:${settings.password ?? ""}`;
		headers.Authorization = `Basic ${Buffer.from(credentials).toString("base64")}`;
	}
	if (settings.virtualHost !== undefined) headers.Host = settings.virtualHost;
	if (settings.saslAllowedMechs !== undefined) {
		headers["x-sasl-mechanisms"] = settings.saslAllowedMechs;
	}
	headers["x-container-id"] = settings.containerId;
	return headers;
}

/**
 * One connection attempt over a WebSocket
 */
class WebSocketTransport implements ITransport {
	private readonly ws: IWebSocket;
	private readonly sink: TransportSink;
	private readonly target: ConnectionTarget;
	private readonly idleTimeout: number;
	private idleTimer: ReturnType<typeof setTimeout> | null = null;
	private done = false;
	private closing = false;

	constructor(
		ws: IWebSocket,
		target: ConnectionTarget,
		sink: TransportSink,
		idleTimeout = 0,
	) {
		this.ws = ws;
		this.target = target;
		this.sink = sink;
		this.idleTimeout = idleTimeout;

		ws.addEventListener("open", this.onOpen);
		ws.addEventListener("error", this.onError);
		ws.addEventListener("close", this.onClose);
		ws.addEventListener("message", this.onMessage);
	}

	close(): void {
		if (this.done) return;
		this.closing = true;
		if (this.ws.readyState === WebSocketReadyState.CLOSED) {
			this.finish();
			this.sink.closed(true);
			return;
		}
		this.ws.close(NORMAL_CLOSE_CODE, "Client close");
	}

	destroy(): void {
		if (this.done) return;
		this.finish();
		if (this.ws.terminate) this.ws.terminate();
		else if (this.ws.readyState !== WebSocketReadyState.CLOSED) this.ws.close();
	}

	private readonly onOpen = (): void => {
		if (this.done) return;
		this.armIdleTimer();
		this.sink.opened();
	};

	private readonly onMessage = (): void => {
		if (!this.done) this.armIdleTimer();
	};

	/**
	 * Fail the attempt when nothing arrives from the peer for `idleTimeout` ms
	 */
	private armIdleTimer(): void {
		if (this.idleTimeout <= 0) return;
		if (this.idleTimer) clearTimeout(this.idleTimer);
		this.idleTimer = setTimeout(() => {
			this.idleTimer = null;
			if (this.done) return;
			this.destroy();
			this.sink.failed(
				new PeerRefusedError(
					this.target,
					`idle timeout expired (${this.idleTimeout}ms)`,
				),
			);
		}, this.idleTimeout);
	}

	private readonly onError = (event: unknown): void => {
		if (this.done) return;
		this.finish();
		this.sink.failed(classifyWebSocketError(this.target, event));
	};

	private readonly onClose = (event: unknown): void => {
		if (this.done) return;
		this.finish();

		const code = readNumber(event, "code") ?? 1006;
		const reason = readString(event, "reason") ?? "";
		if (this.closing) {
			this.sink.closed(code === NORMAL_CLOSE_CODE);
			return;
		}
		if (code >= APPLICATION_CLOSE_CODE) {
			this.sink.remoteError({
				name: `ws:${code}`,
				...(reason !== "" && { description: reason }),
			});
			return;
		}
		if (code === NORMAL_CLOSE_CODE) {
			this.sink.closed(false);
			return;
		}
		this.sink.failed(
			new PeerRefusedError(
				this.target,
				`connection lost (${code}${reason ? ` ${reason}` : ""})`,
			),
		);
	};

	// The error listener stays attached: `ws` emits a late error when a
	// socket is terminated mid-handshake, and an unhandled one would throw
	private finish(): void {
		this.done = true;
		if (this.idleTimer) {
			clearTimeout(this.idleTimer);
			this.idleTimer = null;
		}
		this.ws.removeEventListener("open", this.onOpen);
		this.ws.removeEventListener("close", this.onClose);
		this.ws.removeEventListener("message", this.onMessage);
	}
}

/**
 * Create a transport factory that connects over WebSocket
 *
 * @example
 * ```ts
 * const container = new Container({
 *   transport: createWebSocketTransport({ path: "/amqp" }),
 * });
 * ```
 */
export function createWebSocketTransport(
	options: WebSocketTransportOptions = {},
): TransportFactory {
	const path = options.path ?? "/";
	const protocols = options.protocols ?? "amqp";

	return (settings, sink) => {
		const url = toWebSocketUrl(settings.target, path);
		const wsOptions: WebSocketOptions = {
			headers: handshakeHeaders(settings),
			...(options.handshakeTimeout !== undefined && {
				handshakeTimeout: options.handshakeTimeout,
			}),
			...(settings.maxFrameSize !== undefined && {
				maxPayload: settings.maxFrameSize,
			}),
		};
		const ws: IWebSocket = options.WebSocket
			? new options.WebSocket(url, protocols, wsOptions)
			: new NodeWebSocket(url, protocols, wsOptions);
		return new WebSocketTransport(
			ws,
			settings.target,
			sink,
			settings.idleTimeout,
		);
	};
}
