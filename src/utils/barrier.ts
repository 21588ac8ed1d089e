/**
 * Countdown Barrier
 *
 * Waits for N things to be done, then runs a completion callback once.
 */

import { BarrierError } from "../errors.js";
import type { IScheduler } from "../scheduler.js";

export class CountdownBarrier {
	private remaining: number;
	private readonly onReady: () => void;
	private readonly scheduler: IScheduler | undefined;

	/**
	 * @param count - Number of `done()` calls to wait for
	 * @param onReady - Runs when the count reaches zero
	 * @param scheduler - When given, `onReady` is dispatched through it
	 *   instead of running inside the last `done()` call
	 */
	constructor(count: number, onReady: () => void, scheduler?: IScheduler) {
		if (!Number.isInteger(count) || count < 1) {
			throw new BarrierError(
				`Barrier count must be a positive integer, got ${count}`,
			);
		}
		this.remaining = count;
		this.onReady = onReady;
		this.scheduler = scheduler;
	}

	get pending(): number {
		return this.remaining;
	}

	get ready(): boolean {
		return this.remaining === 0;
	}

	done(): void {
		if (this.remaining === 0) {
			throw new BarrierError("Barrier already released");
		}
		this.remaining--;
		if (this.remaining > 0) return;

		if (this.scheduler) this.scheduler.schedule(0, this.onReady);
		else this.onReady();
	}
}
