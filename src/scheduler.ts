/**
 * Scheduling
 *
 * One-shot deferred callbacks used for retry delays and for serializing
 * work onto the host loop.
 */

/**
 * Handle to a scheduled callback
 */
export interface ScheduledTask {
	/** Prevent the callback from running. Has no effect once it ran. */
	cancel(): void;
	readonly cancelled: boolean;
}

/**
 * Minimal scheduler interface
 */
export interface IScheduler {
	/**
	 * Run `callback` once after `delay` milliseconds
	 */
	schedule(delay: number, callback: () => void): ScheduledTask;
}

/**
 * Scheduler backed by `setTimeout`
 */
export class TimerScheduler implements IScheduler {
	schedule(delay: number, callback: () => void): ScheduledTask {
		let cancelled = false;
		let timer: ReturnType<typeof setTimeout> | null = setTimeout(() => {
			timer = null;
			if (!cancelled) callback();
		}, Math.max(0, delay));

		return {
			cancel() {
				cancelled = true;
				if (timer) {
					clearTimeout(timer);
					timer = null;
				}
			},
			get cancelled() {
				return cancelled;
			},
		};
	}
}
