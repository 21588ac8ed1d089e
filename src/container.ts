/**
 * Container
 *
 * Host loop for connections: creates them, runs their scheduled work and
 * transport callbacks one at a time, and stops them all at once.
 */

import { v7 as uuidv7 } from "uuid";
import { createWebSocketTransport } from "./adapters/websocket.js";
import type { Connection } from "./connection/connection.js";
import { ReconnectEngine } from "./connection/engine.js";
import { ContainerStoppedError } from "./errors.js";
import { ConnectionOptions, type ConnectionOptionsInit } from "./options.js";
import {
	type IScheduler,
	type ScheduledTask,
	TimerScheduler,
} from "./scheduler.js";
import { parseTarget } from "./target.js";
import type { ContainerHooks, TransportFactory } from "./types.js";
import { createLogger, type Logger } from "./utils/logger.js";

/**
 * Options for creating a Container
 */
export interface ContainerOptions {
	/** Container id, sent as the default container id of every connection */
	id?: string;
	/** Transport used for every attempt (default: WebSocket via `ws`) */
	transport?: TransportFactory;
	/** Timer source (default: setTimeout) */
	scheduler?: IScheduler;
	logger?: Logger;
	/** Default handlers for every connection, plus start/stop */
	hooks?: ContainerHooks;
}

const CANCELLED: ScheduledTask = Object.freeze({
	cancel() {},
	cancelled: true,
});

/**
 * Connection container
 *
 * @example
 * ```ts
 * const container = new Container({
 *   hooks: {
 *     onStart: (c) => {
 *       c.connect("amqp://primary:5672", {
 *         failoverUrls: ["amqp://backup:5672"],
 *         reconnect: { initialDelay: 100, maxAttempts: 10 },
 *       });
 *     },
 *     onOpen: (conn, reconnected) => console.log("open", conn.url, reconnected),
 *     onTransportError: (conn, error) => console.warn(error.message),
 *   },
 * });
 *
 * await container.run();
 * ```
 */
export class Container implements IScheduler {
	readonly id: string;
	readonly hooks: ContainerHooks;

	private readonly transport: TransportFactory;
	private readonly timers: IScheduler;
	private readonly logger: Logger;
	private readonly tasks = new Set<ScheduledTask>();
	private readonly engines = new Set<ReconnectEngine>();
	private waiters: Array<{
		resolve: () => void;
		reject: (error: unknown) => void;
	}> = [];
	private started = false;
	private _stopped = false;
	private draining = false;
	private failure: { error: unknown } | null = null;

	constructor(options: ContainerOptions = {}) {
		this.id = options.id ?? uuidv7();
		this.hooks = options.hooks ?? {};
		this.transport = options.transport ?? createWebSocketTransport();
		this.timers = options.scheduler ?? new TimerScheduler();
		this.logger = options.logger ?? createLogger();
	}

	get stopped(): boolean {
		return this._stopped;
	}

	/**
	 * Connections that have not reached closed
	 */
	get connections(): Connection[] {
		return [...this.engines].map((engine) => engine.connection);
	}

	/**
	 * Scheduled callbacks that have not run yet
	 */
	get pendingTasks(): number {
		return this.tasks.size;
	}

	/**
	 * Open a logical connection
	 *
	 * The first attempt always goes to `url`; failover and sticky addresses
	 * from `options` are used for reconnect attempts only.
	 *
	 * @param url - Address to connect to
	 * @param options - Connection options
	 * @returns The connection handle; progress is reported through hooks
	 * @throws ContainerStoppedError if the container was stopped
	 * @throws InvalidTargetError if an address cannot be parsed
	 * @throws InvalidOptionsError if an option fails validation
	 */
	connect(
		url: string,
		options?: ConnectionOptions | ConnectionOptionsInit,
	): Connection {
		if (this._stopped) throw new ContainerStoppedError();

		const engine = new ReconnectEngine({
			container: this,
			target: parseTarget(url),
			options: ConnectionOptions.from(options),
			transport: this.transport,
			scheduler: this,
			logger: this.logger,
			hooks: this.hooks,
			invoke: (fn) => this.invoke(fn),
			onClosed: (closed) => this.release(closed),
		});
		this.engines.add(engine);
		engine.start();
		return engine.connection;
	}

	/**
	 * Run `callback` once after `delay` milliseconds on the container loop
	 *
	 * Every task is cancelled by `stop()`. After stop, returns a task that
	 * never runs.
	 */
	schedule(delay: number, callback: () => void): ScheduledTask {
		if (this._stopped) return CANCELLED;

		let settled = false;
		let cancelled = false;
		const task: ScheduledTask = {
			cancel: () => {
				if (settled) return;
				settled = true;
				cancelled = true;
				inner.cancel();
				this.tasks.delete(task);
				this.checkIdle();
			},
			get cancelled() {
				return cancelled;
			},
		};
		const inner = this.timers.schedule(delay, () => {
			if (settled) return;
			settled = true;
			this.tasks.delete(task);
			if (this._stopped) return;
			this.invoke(callback);
			this.checkIdle();
		});
		this.tasks.add(task);
		return task;
	}

	/**
	 * Run until stopped or until no connection and no task remains
	 *
	 * Calls `hooks.onStart` the first time. Rejects with the error thrown by
	 * a hook or task, after stopping the container.
	 */
	run(): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			this.waiters.push({ resolve, reject });
			if (!this.started) {
				this.started = true;
				this.invoke(() => this.hooks.onStart?.(this));
			}
			this.checkIdle();
		});
	}

	/**
	 * Stop everything: cancel every scheduled task and abort every
	 * connection without further notifications
	 */
	stop(): void {
		if (this._stopped) return;
		this._stopped = true;
		this.draining = true;
		this.logger.debug(`Container ${this.id} stopping`);

		for (const task of [...this.tasks]) task.cancel();
		for (const engine of [...this.engines]) engine.stop();
		this.engines.clear();

		this.invoke(() => this.hooks.onStop?.(this));
		this.draining = false;
		this.settle();
	}

	private invoke(fn: () => void): void {
		try {
			fn();
		} catch (error) {
			this.fail(error);
		}
	}

	private fail(error: unknown): void {
		this.logger.error("Callback threw, stopping container:", error);
		if (!this.failure) this.failure = { error };
		this.stop();
	}

	private release(engine: ReconnectEngine): void {
		this.engines.delete(engine);
		this.checkIdle();
	}

	private checkIdle(): void {
		if (this.draining) return;
		if (
			this._stopped ||
			(this.started && this.engines.size === 0 && this.tasks.size === 0)
		) {
			this.settle();
		}
	}

	private settle(): void {
		if (this.waiters.length === 0) return;
		const waiters = this.waiters;
		this.waiters = [];
		for (const { resolve, reject } of waiters) {
			if (this.failure) reject(this.failure.error);
			else resolve();
		}
	}
}
