/**
 * Reconnect Engine
 *
 * Lifecycle state machine for one logical connection. Owns the candidate
 * list, reconnect policy and options overlay, reacts to transport events
 * and decides whether, when and where to try again.
 *
 * All entry points run on the host loop one at a time; the engine relies on
 * that and holds no locks.
 */

import { v7 as uuidv7 } from "uuid";
import { CandidateList } from "../candidates.js";
import type { Container } from "../container.js";
import {
	AddressUnreachableError,
	LinkError,
	LocalAbortError,
	NotConnectedError,
	PeerRefusedError,
	PolicyExhaustedError,
	type RemoteCondition,
} from "../errors.js";
import {
	type ConnectionOptionValues,
	ConnectionOptions,
	type ConnectionOptionsInit,
	type OptionField,
} from "../options.js";
import type { IScheduler, ScheduledTask } from "../scheduler.js";
import { type ConnectionTarget, formatTarget, parseTarget } from "../target.js";
import type {
	ConnectionHooks,
	ITransport,
	TransportFactory,
	TransportSettings,
	TransportSink,
} from "../types.js";
import type { Logger } from "../utils/logger.js";
import type { ReconnectPolicy } from "../utils/reconnect.js";
import { Connection } from "./connection.js";

/**
 * Engine states
 *
 * `closing` is an open connection waiting for its close handshake.
 */
export type EngineState =
	| "connecting"
	| "open"
	| "retry_wait"
	| "closing"
	| "closed";

/**
 * What the container hands to each engine
 */
export interface EngineContext {
	readonly container: Container;
	/** Address given to connect() */
	readonly target: ConnectionTarget;
	readonly options: ConnectionOptions;
	readonly transport: TransportFactory;
	/** Scheduler whose callbacks already run on the host loop */
	readonly scheduler: IScheduler;
	readonly logger: Logger;
	/** Container-level hooks, used where the connection sets none */
	readonly hooks: ConnectionHooks;
	/** Run a transport callback on the host loop */
	invoke(fn: () => void): void;
	/** Called once when the engine reaches `closed` other than by stop() */
	onClosed(engine: ReconnectEngine): void;
}

function toLinkError(error: unknown, target: ConnectionTarget): LinkError {
	if (error instanceof LinkError) return error;
	const detail = error instanceof Error ? error.message : String(error);
	return new AddressUnreachableError(target, detail, error);
}

export class ReconnectEngine {
	readonly id: string;
	readonly connection: Connection;
	readonly container: Container;

	private readonly context: EngineContext;
	private readonly logger: Logger;
	private readonly overlay: ConnectionOptions;
	private readonly candidates: CandidateList;
	private policy: ReconnectPolicy | null;

	private _state: EngineState = "connecting";
	private transport: ITransport | null = null;
	private pending: ScheduledTask | null = null;
	// Bumped whenever a transport is retired; stale sink events are dropped
	private generation = 0;
	// Reconnect attempts since the last open
	private attempt = 0;
	private totalAttempts = 0;
	private _reconnected = false;
	private _target: ConnectionTarget | null = null;
	private _established: ConnectionTarget | null = null;
	private _error: LinkError | null = null;

	constructor(context: EngineContext) {
		this.id = uuidv7();
		this.context = context;
		this.container = context.container;
		this.logger = context.logger.child(`conn ${this.id.slice(-8)}`);
		this.overlay = context.options.clone();
		this.candidates = new CandidateList(context.target);
		this.policy = null;
		this.applyReconnectFields(this.overlay);
		this.connection = new Connection(this);
	}

	// =========================================================================
	// Observers
	// =========================================================================

	get state(): EngineState {
		return this._state;
	}

	/**
	 * True once a reconnect attempt has been started
	 */
	get reconnected(): boolean {
		return this._reconnected;
	}

	/**
	 * Reconnect attempts since the last successful open
	 */
	get attempts(): number {
		return this.attempt;
	}

	/**
	 * Transport attempts made over the engine's lifetime
	 */
	get totalAttemptCount(): number {
		return this.totalAttempts;
	}

	get error(): LinkError | null {
		return this._error;
	}

	/**
	 * Address of the attempt in flight, or of the last one made
	 */
	get target(): ConnectionTarget | null {
		return this._target;
	}

	/**
	 * Address of the last transport that reached open
	 *
	 * @throws NotConnectedError if no transport has been established yet
	 */
	get url(): string {
		if (!this._established) {
			throw new NotConnectedError(
				"Connection URL requested before any transport was established",
			);
		}
		return formatTarget(this._established);
	}

	get options(): ConnectionOptions {
		return this.overlay.clone();
	}

	/**
	 * Current value of one overlay field
	 */
	option<K extends OptionField>(
		field: K,
	): ConnectionOptionValues[K] | undefined {
		return this.overlay.get(field);
	}

	get candidateList(): CandidateList {
		return this.candidates;
	}

	// =========================================================================
	// Commands
	// =========================================================================

	/**
	 * Dispatch the initial attempt onto the host loop
	 */
	start(): void {
		if (this._state !== "connecting" || this.pending || this.transport) return;
		this.pending = this.context.scheduler.schedule(0, () =>
			this.attemptConnect(true),
		);
	}

	/**
	 * Close the connection
	 *
	 * An open connection starts a clean close handshake. In any other state,
	 * including from inside `onTransportError`, the connection is aborted:
	 * a pending retry is cancelled and no clean-close notification follows.
	 */
	close(): void {
		switch (this._state) {
			case "closed":
			case "closing":
				return;
			case "open":
				if (this.transport) {
					this.setState("closing");
					this.transport.close();
					return;
				}
				break;
		}
		this.abort(new LocalAbortError());
	}

	/**
	 * Merge new options onto the overlay
	 *
	 * Takes effect from the next candidate selection; an attempt already in
	 * flight keeps the options it was started with.
	 */
	updateOptions(delta: ConnectionOptions | ConnectionOptionsInit): void {
		const update = ConnectionOptions.from(delta);
		this.overlay.update(update);
		if (update.touchesReconnect()) this.applyReconnectFields(update);
		this.logger.debug(`Options updated: ${update.fields().join(", ")}`);
	}

	/**
	 * Halt immediately without notifications
	 */
	stop(): void {
		if (this._state === "closed") return;
		this.pending?.cancel();
		this.pending = null;
		const transport = this.retire();
		transport?.destroy();
		this._error ??= new LocalAbortError("Container stopped");
		this.setState("closed");
	}

	// =========================================================================
	// Attempts
	// =========================================================================

	private attemptConnect(firstAttempt: boolean): void {
		this.pending = null;
		if (this._state !== "connecting" && this._state !== "retry_wait") return;

		const target = this.candidates.nextTarget(firstAttempt);
		if (!firstAttempt) this._reconnected = true;
		this._target = target;
		this.totalAttempts++;
		this.setState("connecting");
		this.logger.debug(`Connecting to ${formatTarget(target)}`);

		const generation = this.generation;
		const sink = this.createSink(generation, target);
		try {
			const transport = this.context.transport(this.settingsFor(target), sink);
			// A transport that already reported a terminal event stays retired
			if (generation === this.generation) this.transport = transport;
		} catch (error) {
			if (generation === this.generation) {
				this.handleFailure(toLinkError(error, target));
			}
		}
	}

	private createSink(generation: number, target: ConnectionTarget): TransportSink {
		const current = () =>
			generation === this.generation && this._state !== "closed";
		const dispatch = (fn: () => void) => {
			if (!current()) return;
			this.context.invoke(() => {
				if (current()) fn();
			});
		};

		return {
			opened: () => dispatch(() => this.handleOpened()),
			failed: (error) => dispatch(() => this.handleFailure(error)),
			closed: (clean) => dispatch(() => this.handleClosed(clean, target)),
			remoteError: (condition) =>
				dispatch(() => this.handleRemoteError(condition, target)),
		};
	}

	private settingsFor(target: ConnectionTarget): TransportSettings {
		const o = this.overlay;
		const virtualHost = o.get("virtualHost");
		const user = o.get("user");
		const password = o.get("password");
		const saslAllowedMechs = o.get("saslAllowedMechs");
		const idleTimeout = o.get("idleTimeout");
		const maxFrameSize = o.get("maxFrameSize");
		const headers = o.get("headers");

		return {
			target,
			containerId: o.get("containerId") ?? this.container.id,
			...(virtualHost !== undefined && { virtualHost }),
			...(user !== undefined && { user }),
			...(password !== undefined && { password }),
			...(saslAllowedMechs !== undefined && { saslAllowedMechs }),
			...(idleTimeout !== undefined && { idleTimeout }),
			...(maxFrameSize !== undefined && { maxFrameSize }),
			...(headers !== undefined && { headers }),
		};
	}

	// =========================================================================
	// Transport Events
	// =========================================================================

	private handleOpened(): void {
		if (this._state !== "connecting") return;

		this.attempt = 0;
		this._established = this._target;
		this._error = null;
		this.setState("open");
		if (this._target) {
			this.logger.info(`Connected to ${formatTarget(this._target)}`);
		}
		this.handlerFor("onOpen").onOpen?.(this.connection, this._reconnected);
	}

	private handleRemoteError(
		condition: RemoteCondition,
		target: ConnectionTarget,
	): void {
		const error = new PeerRefusedError(
			target,
			condition.description
				? `${condition.name}: ${condition.description}`
				: condition.name,
			condition,
		);
		this._error = error;
		this.handlerFor("onConnectionError").onConnectionError?.(
			this.connection,
			error,
		);
		if (this._state === "closed") return;

		this.transport?.destroy();
		this.handleFailure(error);
	}

	private handleClosed(clean: boolean, target: ConnectionTarget): void {
		if (this._state === "closing") {
			this.retire();
			this.finish(clean);
			return;
		}
		this.handleFailure(new PeerRefusedError(target, "connection closed by peer"));
	}

	/**
	 * React to a failed attempt or a lost transport
	 *
	 * The application hears about the failure before anything is decided,
	 * so options it changes from inside the notification apply here.
	 */
	private handleFailure(error: LinkError): void {
		const state = this._state;
		this.retire();
		if (state === "closed") return;

		this._error = error;
		if (state === "closing") {
			this.finish(false);
			return;
		}

		this.logger.debug(`Transport error: ${error.message}`);
		this.handlerFor("onTransportError").onTransportError?.(
			this.connection,
			error,
		);
		// close() inside the notification aborts the cycle
		if (this._state === "closed") return;

		this.attempt++;
		const delay = this.policy?.nextDelay(this.attempt) ?? null;
		if (delay === null) {
			if (this.policy) {
				const exhausted = new PolicyExhaustedError(this.attempt - 1, error);
				this._error = exhausted;
				this.logger.warn(exhausted.message);
				this.handlerFor("onReconnectFailed").onReconnectFailed?.(
					this.connection,
					exhausted,
				);
			} else {
				this.logger.warn(`Connection failed: ${error.message}`);
			}
			if (this.state !== "closed") this.finish(false);
			return;
		}

		this.setState("retry_wait");
		this.logger.info(
			`Reconnecting in ${delay}ms (attempt ${this.attempt}):`,
			error.message,
		);
		this.pending = this.context.scheduler.schedule(delay, () =>
			this.attemptConnect(false),
		);
		this.handlerFor("onReconnect").onReconnect?.(
			this.connection,
			this.attempt,
			delay,
		);
	}

	// =========================================================================
	// Internals
	// =========================================================================

	private abort(error: LinkError): void {
		this.pending?.cancel();
		this.pending = null;
		const transport = this.retire();
		transport?.destroy();
		this._error = error;
		this.logger.debug("Aborted locally");
		this.finish(false);
	}

	/**
	 * Detach the current transport so its later events are ignored
	 */
	private retire(): ITransport | null {
		const transport = this.transport;
		this.transport = null;
		this.generation++;
		return transport;
	}

	private finish(clean: boolean): void {
		this.setState("closed");
		if (clean) {
			this.handlerFor("onConnectionClose").onConnectionClose?.(this.connection);
		}
		this.handlerFor("onTransportClose").onTransportClose?.(this.connection);
		this.context.onClosed(this);
	}

	private setState(state: EngineState): void {
		if (state === this._state) return;
		this.logger.debug(`${this._state} -> ${state}`);
		this._state = state;
	}

	/**
	 * The connection's own hooks when they handle `name`, else the container's
	 */
	private handlerFor(name: keyof ConnectionHooks): ConnectionHooks {
		const own = this.overlay.get("hooks");
		return own?.[name] ? own : this.context.hooks;
	}

	private applyReconnectFields(source: ConnectionOptions): void {
		const failover = source.get("failoverUrls");
		const override = source.get("reconnectUrl");
		this.candidates.configure({
			...(failover !== undefined && { failover: failover.map(parseTarget) }),
			...(source.has("reconnectUrl") && {
				override: override ? parseTarget(override) : null,
			}),
		});
		// Once on, reconnection stays on until `reconnect: false`
		const policy = this.overlay.reconnectPolicy();
		if (policy || this.overlay.get("reconnect") === false) this.policy = policy;
	}
}
