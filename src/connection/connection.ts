/**
 * Connection Handle
 *
 * The application's view of one logical connection. The reconnect engine
 * behind it may go through many transports; the handle stays the same.
 */

import type { Container } from "../container.js";
import type { LinkError } from "../errors.js";
import type {
	ConnectionOptions,
	ConnectionOptionsInit,
} from "../options.js";
import type { ConnectionTarget } from "../target.js";
import type { EngineState, ReconnectEngine } from "./engine.js";

export class Connection {
	private readonly engine: ReconnectEngine;

	constructor(engine: ReconnectEngine) {
		this.engine = engine;
	}

	get id(): string {
		return this.engine.id;
	}

	get container(): Container {
		return this.engine.container;
	}

	get state(): EngineState {
		return this.engine.state;
	}

	/**
	 * Whether the connection is open on a live transport
	 */
	get isOpen(): boolean {
		return this.engine.state === "open";
	}

	/**
	 * True once the connection has started reconnecting
	 */
	get reconnected(): boolean {
		return this.engine.reconnected;
	}

	/**
	 * Reconnect attempts since the last successful open
	 */
	get attempts(): number {
		return this.engine.attempts;
	}

	/**
	 * Most recent failure, or the reason the connection closed
	 */
	get error(): LinkError | null {
		return this.engine.error;
	}

	/**
	 * Address of the current (or last) attempt
	 */
	get target(): ConnectionTarget | null {
		return this.engine.target;
	}

	/**
	 * Address of the established transport
	 *
	 * @throws NotConnectedError if no transport has been established yet
	 */
	get url(): string {
		return this.engine.url;
	}

	/**
	 * Snapshot of the effective options
	 */
	get options(): ConnectionOptions {
		return this.engine.options;
	}

	get user(): string | undefined {
		return this.engine.option("user");
	}

	get virtualHost(): string | undefined {
		return this.engine.option("virtualHost");
	}

	get containerId(): string {
		return this.engine.option("containerId") ?? this.engine.container.id;
	}

	/**
	 * Close the connection
	 *
	 * When open, performs a clean close handshake and then notifies
	 * `onConnectionClose`. Otherwise, including from inside
	 * `onTransportError`, aborts reconnection without that notification.
	 */
	close(): void {
		this.engine.close();
	}

	/**
	 * Merge options onto the connection; only the given fields change
	 *
	 * @example
	 * ```ts
	 * hooks: {
	 *   onTransportError(connection) {
	 *     connection.updateOptions({ reconnectUrl: "standby:5672" });
	 *   },
	 * }
	 * ```
	 */
	updateOptions(delta: ConnectionOptions | ConnectionOptionsInit): void {
		this.engine.updateOptions(delta);
	}
}
