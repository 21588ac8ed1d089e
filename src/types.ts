/**
 * Core Type Definitions
 *
 * Transport collaborator interfaces, notification hooks and the
 * platform-agnostic WebSocket abstraction used by the bundled adapter.
 */

import type { Connection } from "./connection/connection.js";
import type { Container } from "./container.js";
import type { LinkError, RemoteCondition } from "./errors.js";
import type { ConnectionTarget } from "./target.js";

// =============================================================================
// WebSocket Interfaces (Platform-Agnostic)
// =============================================================================

/**
 * WebSocket ready state constants type
 */
export interface WebSocketReadyState {
	CONNECTING: 0;
	OPEN: 1;
	CLOSING: 2;
	CLOSED: 3;
}

/**
 * WebSocket ready states
 */
export const WebSocketReadyState: WebSocketReadyState = {
	CONNECTING: 0,
	OPEN: 1,
	CLOSING: 2,
	CLOSED: 3,
} as const;

/**
 * The parts of a WebSocket the transport adapter drives
 */
export interface IWebSocket {
	readonly readyState: number;
	close(code?: number, reason?: string): void;
	terminate?(): void;
	addEventListener(
		type: "open" | "close" | "error" | "message",
		listener: (event: unknown) => void,
	): void;
	removeEventListener(
		type: "open" | "close" | "error" | "message",
		listener: (event: unknown) => void,
	): void;
}

/**
 * WebSocket constructor options (subset understood by `ws`)
 */
export interface WebSocketOptions {
	headers?: Record<string, string>;
	handshakeTimeout?: number;
	maxPayload?: number;
}

// =============================================================================
// Transport Collaborator
// =============================================================================

/**
 * Everything a transport needs to open one connection attempt
 */
export interface TransportSettings {
	readonly target: ConnectionTarget;
	readonly containerId: string;
	readonly virtualHost?: string;
	readonly user?: string;
	readonly password?: string;
	readonly saslAllowedMechs?: string;
	readonly idleTimeout?: number;
	readonly maxFrameSize?: number;
	readonly headers?: Readonly<Record<string, string>>;
}

/**
 * Lifecycle events a transport reports for one attempt
 *
 * A transport reports at most one terminal event: `failed` or `closed`.
 */
export interface TransportSink {
	/** Handshake with the peer completed */
	opened(): void;
	/** The attempt failed or an established transport was lost */
	failed(error: LinkError): void;
	/**
	 * The transport closed. `clean` is true when a close handshake the
	 * local side asked for has completed.
	 */
	closed(clean: boolean): void;
	/** The peer closed the connection with an error condition */
	remoteError(condition: RemoteCondition): void;
}

/**
 * One live transport attempt
 */
export interface ITransport {
	/** Begin a clean closing handshake */
	close(): void;
	/** Abort without a handshake. No further sink events are expected. */
	destroy(): void;
}

export type TransportFactory = (
	settings: TransportSettings,
	sink: TransportSink,
) => ITransport;

// =============================================================================
// Notification Hooks
// =============================================================================

/**
 * Application callbacks for connection lifecycle events
 *
 * `onTransportError` may call `connection.close()` to abort reconnection,
 * or `connection.updateOptions()` to change where and how the next attempt
 * is made.
 */
export interface ConnectionHooks {
	/** Called on every transition to open */
	onOpen?(connection: Connection, reconnected: boolean): void;

	/** Called when the peer closes the connection with an error condition */
	onConnectionError?(connection: Connection, error: LinkError): void;

	/** Called for every failed attempt or lost transport */
	onTransportError?(connection: Connection, error: LinkError): void;

	/** Called once when the connection reaches the closed state */
	onTransportClose?(connection: Connection): void;

	/** Called after a clean, locally requested close handshake */
	onConnectionClose?(connection: Connection): void;

	/** Called when a reconnect attempt is scheduled */
	onReconnect?(connection: Connection, attempt: number, delay: number): void;

	/** Called when the reconnect policy runs out of attempts */
	onReconnectFailed?(connection: Connection, error: LinkError): void;
}

/**
 * Container-level callbacks, also used as defaults for every connection
 */
export interface ContainerHooks extends ConnectionHooks {
	/** Called when `run()` starts */
	onStart?(container: Container): void;

	/** Called when the container stops */
	onStop?(container: Container): void;
}
