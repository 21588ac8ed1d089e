/**
 * Connection Options
 *
 * A layered option object. Every field is either set or unset; an unset
 * field never overwrites anything when one set of options is merged onto
 * another, while a field set to an empty value (`[]`, `null`, `""`) does.
 */

import * as z from "zod";
import { InvalidOptionsError } from "./errors.js";
import { parseTarget } from "./target.js";
import type { ConnectionHooks } from "./types.js";
import {
	type ReconnectOptions,
	ReconnectOptionsSchema,
	ReconnectPolicy,
	resolveReconnectOptions,
} from "./utils/reconnect.js";

/**
 * Values each option field can take
 */
export interface ConnectionOptionValues {
	/** Reconnect policy, or false to disable reconnection */
	reconnect: ReconnectOptions | false;
	/** Sticky address used for every reconnect attempt; null clears it */
	reconnectUrl: string | null;
	/** Alternate addresses cycled after the original one */
	failoverUrls: readonly string[];
	virtualHost: string;
	user: string;
	password: string;
	/** Space separated SASL mechanisms the client may use */
	saslAllowedMechs: string;
	containerId: string;
	/** Idle timeout in ms */
	idleTimeout: number;
	maxFrameSize: number;
	/** Extra headers sent with the transport handshake */
	headers: Readonly<Record<string, string>>;
	/** Per-connection notification handlers */
	hooks: ConnectionHooks;
}

export type OptionField = keyof ConnectionOptionValues;

/**
 * Plain-object form of connection options
 */
export type ConnectionOptionsInit = Partial<ConnectionOptionValues>;

export const OPTION_FIELDS: readonly OptionField[] = [
	"reconnect",
	"reconnectUrl",
	"failoverUrls",
	"virtualHost",
	"user",
	"password",
	"saslAllowedMechs",
	"containerId",
	"idleTimeout",
	"maxFrameSize",
	"headers",
	"hooks",
];

/**
 * Fields that change where or whether reconnect attempts happen
 */
export const RECONNECT_FIELDS: readonly OptionField[] = [
	"reconnect",
	"reconnectUrl",
	"failoverUrls",
];

const HooksSchema = z.custom<ConnectionHooks>(
	(value) => typeof value === "object" && value !== null,
	"hooks must be an object",
);

export const ConnectionOptionsSchema = z
	.object({
		reconnect: z.union([z.literal(false), ReconnectOptionsSchema]).optional(),
		reconnectUrl: z.string().nullable().optional(),
		failoverUrls: z.array(z.string().min(1)).optional(),
		virtualHost: z.string().optional(),
		user: z.string().optional(),
		password: z.string().optional(),
		saslAllowedMechs: z.string().optional(),
		containerId: z.string().min(1).optional(),
		idleTimeout: z.number().int().nonnegative().optional(),
		maxFrameSize: z.number().int().min(512).optional(),
		headers: z.record(z.string(), z.string()).optional(),
		hooks: HooksSchema.optional(),
	})
	.strict();

/**
 * Render zod issues as `path: message` pairs
 */
export function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => {
			const path = issue.path.map(String).join(".");
			return path ? `${path}: ${issue.message}` : issue.message;
		})
		.join("; ");
}

function copyField<K extends OptionField>(
	from: Partial<ConnectionOptionValues>,
	to: Partial<ConnectionOptionValues>,
	field: K,
): void {
	const value = from[field];
	if (value !== undefined) to[field] = value;
}

/**
 * Connection options with field-level merge
 *
 * @example
 * ```ts
 * const options = new ConnectionOptions()
 *   .reconnect({ initialDelay: 100 })
 *   .failoverUrls(["backup-1:5672", "backup-2:5672"])
 *   .user("guest");
 *
 * // Later: only the sticky address changes, user and failover list stay
 * options.update({ reconnectUrl: "primary:5672" });
 * ```
 */
export class ConnectionOptions {
	private readonly values: Partial<ConnectionOptionValues> = {};

	constructor(init?: ConnectionOptionsInit) {
		if (init) this.assign(init);
	}

	/**
	 * Validate a plain object and build options from it
	 *
	 * @throws InvalidOptionsError if a field fails validation
	 * @throws InvalidTargetError if an address cannot be parsed
	 */
	static from(init: ConnectionOptions | ConnectionOptionsInit = {}): ConnectionOptions {
		if (init instanceof ConnectionOptions) return init.clone();
		return new ConnectionOptions(init);
	}

	/**
	 * Merge `delta` onto `base` without modifying either
	 */
	static merge(
		base: ConnectionOptions,
		delta: ConnectionOptions | ConnectionOptionsInit,
	): ConnectionOptions {
		return base.clone().update(delta);
	}

	// =========================================================================
	// Builders
	// =========================================================================

	reconnect(options: ReconnectOptions | false): this {
		if (options !== false) resolveReconnectOptions(options);
		return this.set("reconnect", options === false ? false : { ...options });
	}

	reconnectUrl(url: string | null): this {
		if (url !== null && url !== "") parseTarget(url);
		return this.set("reconnectUrl", url === "" ? null : url);
	}

	failoverUrls(urls: readonly string[]): this {
		for (const url of urls) parseTarget(url);
		return this.set("failoverUrls", [...urls]);
	}

	virtualHost(value: string): this {
		return this.set("virtualHost", value);
	}

	user(value: string): this {
		return this.set("user", value);
	}

	password(value: string): this {
		return this.set("password", value);
	}

	saslAllowedMechs(value: string): this {
		return this.set("saslAllowedMechs", value);
	}

	containerId(value: string): this {
		return this.set("containerId", value);
	}

	idleTimeout(value: number): this {
		return this.set("idleTimeout", value);
	}

	maxFrameSize(value: number): this {
		return this.set("maxFrameSize", value);
	}

	headers(value: Readonly<Record<string, string>>): this {
		return this.set("headers", { ...value });
	}

	hooks(value: ConnectionHooks): this {
		return this.set("hooks", value);
	}

	// =========================================================================
	// Access
	// =========================================================================

	/**
	 * Whether `field` has been explicitly set
	 */
	has(field: OptionField): boolean {
		return Object.hasOwn(this.values, field);
	}

	get<K extends OptionField>(field: K): ConnectionOptionValues[K] | undefined {
		return this.values[field];
	}

	/**
	 * Names of the fields that are set
	 */
	fields(): OptionField[] {
		return OPTION_FIELDS.filter((field) => this.has(field));
	}

	/**
	 * Whether any of the reconnect-related fields are set
	 */
	touchesReconnect(): boolean {
		return RECONNECT_FIELDS.some((field) => this.has(field));
	}

	/**
	 * Build the reconnect policy these options describe
	 *
	 * Reconnection is on when a policy is given, or when a failover list or
	 * sticky address is non-empty (default policy values apply then).
	 * `reconnect: false` turns it off regardless. A connection keeps the
	 * policy it already has when a later update clears the failover list or
	 * sticky address.
	 *
	 * @returns The policy, or null when these options switch nothing on
	 */
	reconnectPolicy(): ReconnectPolicy | null {
		const reconnect = this.values.reconnect;
		if (reconnect === false) return null;
		if (reconnect !== undefined) return new ReconnectPolicy(reconnect);

		const failover = this.values.failoverUrls ?? [];
		const sticky = this.values.reconnectUrl ?? null;
		if (failover.length > 0 || sticky !== null) return new ReconnectPolicy();
		return null;
	}

	// =========================================================================
	// Merge
	// =========================================================================

	/**
	 * Merge `delta` onto these options in place
	 *
	 * Only fields set in `delta` are changed.
	 */
	update(delta: ConnectionOptions | ConnectionOptionsInit): this {
		if (delta instanceof ConnectionOptions) {
			for (const field of delta.fields()) {
				copyField(delta.values, this.values, field);
			}
			return this;
		}
		return this.assign(delta);
	}

	clone(): ConnectionOptions {
		const copy = new ConnectionOptions();
		for (const field of this.fields()) {
			copyField(this.values, copy.values, field);
		}
		return copy;
	}

	/**
	 * Set fields as plain data, with the password left out
	 */
	toJSON(): Record<string, unknown> {
		const json: Record<string, unknown> = {};
		for (const field of this.fields()) {
			if (field === "password" || field === "hooks") continue;
			json[field] = this.values[field];
		}
		return json;
	}

	private set<K extends OptionField>(
		field: K,
		value: ConnectionOptionValues[K],
	): this {
		this.values[field] = value;
		return this;
	}

	private assign(init: ConnectionOptionsInit): this {
		const parsed = ConnectionOptionsSchema.safeParse(init);
		if (!parsed.success) {
			throw new InvalidOptionsError(
				`Invalid connection options: ${formatIssues(parsed.error)}`,
				parsed.error.issues,
			);
		}

		// Validate addresses before anything is written
		const staged = new ConnectionOptions();
		if (init.reconnect !== undefined) staged.reconnect(init.reconnect);
		if (init.reconnectUrl !== undefined) staged.reconnectUrl(init.reconnectUrl);
		if (init.failoverUrls !== undefined) staged.failoverUrls(init.failoverUrls);
		for (const field of OPTION_FIELDS) {
			if (!staged.has(field)) copyField(init, staged.values, field);
		}
		for (const field of staged.fields()) {
			copyField(staged.values, this.values, field);
		}
		return this;
	}
}
