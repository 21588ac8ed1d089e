/**
 * Candidate Address List
 *
 * The cyclic sequence of addresses reconnect attempts are made against:
 * the original address followed by the failover addresses, or a single
 * sticky address when one is set.
 */

import type { ConnectionTarget } from "./target.js";

export interface CandidateConfig {
	/** Failover addresses appended after the original */
	failover?: readonly ConnectionTarget[];
	/** Sticky address that shadows the cycle; null clears it */
	override?: ConnectionTarget | null;
}

export class CandidateList {
	readonly original: ConnectionTarget;
	private failover: readonly ConnectionTarget[] = [];
	private sticky: ConnectionTarget | null = null;
	// Reconnect selections made from the cycle; the position is taken
	// modulo the current length so the n-th pick is stable across rebuilds
	private selections = 0;

	constructor(original: ConnectionTarget, config: CandidateConfig = {}) {
		this.original = original;
		this.configure(config);
	}

	/**
	 * Number of entries in the cycle, ignoring any sticky address
	 */
	get size(): number {
		return this.failover.length + 1;
	}

	/**
	 * Position of the next entry taken from the cycle
	 */
	get cursor(): number {
		return this.selections % this.size;
	}

	get override(): ConnectionTarget | null {
		return this.sticky;
	}

	get failoverTargets(): readonly ConnectionTarget[] {
		return this.failover;
	}

	/**
	 * Replace the failover list and/or sticky address
	 *
	 * Fields absent from `config` keep their value. The count of
	 * selections survives, so the cursor lands in the new list length.
	 */
	configure(config: CandidateConfig): void {
		if (config.failover !== undefined) this.failover = [...config.failover];
		if (config.override !== undefined) this.sticky = config.override;
	}

	/**
	 * Select the address for the next attempt
	 *
	 * @param firstAttempt - True for the initial attempt of a connect(),
	 *   which always uses the original address
	 */
	nextTarget(firstAttempt: boolean): ConnectionTarget {
		if (firstAttempt) return this.original;
		if (this.sticky) return this.sticky;

		const index = this.cursor;
		this.selections++;
		if (index === 0) return this.original;
		return this.failover[index - 1] ?? this.original;
	}
}
