/**
 * Link Error Classes
 *
 * Error taxonomy for connection and failover handling. Network-level
 * failures are never thrown by the engine: they are delivered to the
 * application through notifications. The programming errors at the bottom
 * of this file are the ones that do throw.
 */

import { type ConnectionTarget, formatTarget } from "./target.js";

/**
 * Error codes for link failures
 */
export const LinkErrorCodes = {
	ADDRESS_UNREACHABLE: "address_unreachable",
	PROTOCOL_NEGOTIATION_FAILED: "protocol_negotiation_failed",
	AUTHENTICATION_FAILED: "authentication_failed",
	PEER_REFUSED: "peer_refused",
	LOCAL_ABORT: "local_abort",
	POLICY_EXHAUSTED: "policy_exhausted",
	NOT_CONNECTED: "not_connected",
	INVALID_TARGET: "invalid_target",
	INVALID_OPTIONS: "invalid_options",
	CONTAINER_STOPPED: "container_stopped",
	BARRIER: "barrier",
} as const;

export type LinkErrorCode = (typeof LinkErrorCodes)[keyof typeof LinkErrorCodes];

/**
 * Error condition sent by the peer when it closes the connection
 */
export interface RemoteCondition {
	/** Symbolic condition name, e.g. `amqp:connection:forced` */
	name: string;
	description?: string;
}

/**
 * Base class for all link errors
 *
 * @param code - Link error code (from LinkErrorCodes)
 * @param message - Human-readable error message
 * @param target - Address the failing attempt was made against
 */
export class LinkError extends Error {
	readonly code: LinkErrorCode;
	readonly target?: ConnectionTarget;

	constructor(
		code: LinkErrorCode,
		message: string,
		target?: ConnectionTarget,
		options?: { cause?: unknown },
	) {
		super(target ? `${formatTarget(target)}: ${message}` : message, options);
		this.name = "LinkError";
		this.code = code;
		if (target) this.target = target;
	}

	/**
	 * Whether the engine may retry after this error
	 */
	get retryable(): boolean {
		return (
			this.code !== LinkErrorCodes.LOCAL_ABORT &&
			this.code !== LinkErrorCodes.POLICY_EXHAUSTED
		);
	}
}

/**
 * The address could not be resolved or reached
 */
export class AddressUnreachableError extends LinkError {
	constructor(
		target: ConnectionTarget,
		detail = "address unreachable",
		cause?: unknown,
	) {
		super(LinkErrorCodes.ADDRESS_UNREACHABLE, detail, target, { cause });
		this.name = "AddressUnreachableError";
	}
}

/**
 * The peer answered but protocol negotiation did not complete
 */
export class ProtocolNegotiationError extends LinkError {
	constructor(
		target: ConnectionTarget,
		detail = "protocol negotiation failed",
		cause?: unknown,
	) {
		super(LinkErrorCodes.PROTOCOL_NEGOTIATION_FAILED, detail, target, {
			cause,
		});
		this.name = "ProtocolNegotiationError";
	}
}

/**
 * The peer rejected the supplied credentials or mechanisms
 */
export class AuthenticationError extends LinkError {
	constructor(
		target: ConnectionTarget,
		detail = "authentication failed",
		cause?: unknown,
	) {
		super(LinkErrorCodes.AUTHENTICATION_FAILED, detail, target, { cause });
		this.name = "AuthenticationError";
	}
}

/**
 * The peer refused or forcibly closed the connection
 */
export class PeerRefusedError extends LinkError {
	readonly condition?: RemoteCondition;

	constructor(
		target: ConnectionTarget,
		detail = "connection refused",
		condition?: RemoteCondition,
	) {
		super(LinkErrorCodes.PEER_REFUSED, detail, target);
		this.name = "PeerRefusedError";
		if (condition) this.condition = condition;
	}
}

/**
 * The application aborted the connection
 */
export class LocalAbortError extends LinkError {
	constructor(message = "Connection aborted locally") {
		super(LinkErrorCodes.LOCAL_ABORT, message);
		this.name = "LocalAbortError";
	}
}

/**
 * Reconnection stopped because the policy ran out of attempts
 *
 * @param attempts - Number of reconnect attempts made
 * @param lastError - The failure that ended the cycle
 */
export class PolicyExhaustedError extends LinkError {
	readonly attempts: number;
	readonly lastError: LinkError;

	constructor(attempts: number, lastError: LinkError) {
		super(
			LinkErrorCodes.POLICY_EXHAUSTED,
			`Reconnect gave up after ${attempts} attempts: ${lastError.message}`,
			undefined,
			{ cause: lastError },
		);
		this.name = "PolicyExhaustedError";
		this.attempts = attempts;
		this.lastError = lastError;
	}
}

/**
 * Thrown when the connection URL is requested before any transport was established
 */
export class NotConnectedError extends LinkError {
	constructor(message = "No transport has been established") {
		super(LinkErrorCodes.NOT_CONNECTED, message);
		this.name = "NotConnectedError";
	}
}

/**
 * Thrown when an address cannot be parsed
 *
 * @param input - The rejected address string
 */
export class InvalidTargetError extends LinkError {
	readonly input: string;

	constructor(input: string, reason: string) {
		super(
			LinkErrorCodes.INVALID_TARGET,
			`Invalid address '${input}': ${reason}`,
		);
		this.name = "InvalidTargetError";
		this.input = input;
	}
}

/**
 * Thrown when connection or reconnect options fail validation
 *
 * @param data - Optional Zod issues
 */
export class InvalidOptionsError extends LinkError {
	readonly data?: unknown;

	constructor(message: string, data?: unknown) {
		super(LinkErrorCodes.INVALID_OPTIONS, message);
		this.name = "InvalidOptionsError";
		if (data !== undefined) this.data = data;
	}
}

export class ContainerStoppedError extends LinkError {
	constructor(message = "Container has been stopped") {
		super(LinkErrorCodes.CONTAINER_STOPPED, message);
		this.name = "ContainerStoppedError";
	}
}

export class BarrierError extends LinkError {
	constructor(message: string) {
		super(LinkErrorCodes.BARRIER, message);
		this.name = "BarrierError";
	}
}
