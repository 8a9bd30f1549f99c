import * as os from "os";
import { setImmediate as yieldToEventLoop } from "timers/promises";

/// `JobOutcome` is the result of one job submitted to a `WorkPool`. A job is
/// `"skipped"` when the pool was cancelled before the job started.
export type JobOutcome<R> = { tag: "done", value: R } | { tag: "skipped" };

export function defaultConcurrency(): number {
	return Math.max(1, os.availableParallelism());
}

/**
 * `WorkPool` runs asynchronous jobs with at most `concurrency` of them in
 * flight at once.
 *
 * Jobs do not share state through the pool; each job's value is returned in
 * the position of its input. When `signal` is aborted, no further jobs are
 * started, and jobs already running are left to observe the signal
 * themselves.
 */
export class WorkPool {
	readonly concurrency: number;

	constructor(concurrency: number = defaultConcurrency()) {
		if (!Number.isInteger(concurrency) || concurrency < 1) {
			throw new RangeError("WorkPool concurrency must be a positive integer, but was " + concurrency);
		}
		this.concurrency = concurrency;
	}

	async map<T, R>(
		items: readonly T[],
		job: (item: T, index: number) => Promise<R> | R,
		signal?: AbortSignal,
	): Promise<JobOutcome<R>[]> {
		const outcomes: JobOutcome<R>[] = items.map((): JobOutcome<R> => ({ tag: "skipped" }));
		let next = 0;
		let failed = false;

		const runner = async () => {
			while (next < items.length && !failed) {
				if (signal?.aborted) {
					return;
				}
				const index = next;
				next += 1;
				try {
					outcomes[index] = { tag: "done", value: await job(items[index], index) };
				} catch (e) {
					failed = true;
					throw e;
				}
				// Let cancellation requests and other runners make progress
				// between CPU-bound jobs.
				await yieldToEventLoop();
			}
		};

		const runners = [];
		for (let i = 0; i < Math.min(this.concurrency, items.length); i++) {
			runners.push(runner());
		}

		const settled = await Promise.allSettled(runners);
		for (const result of settled) {
			if (result.status === "rejected") {
				throw result.reason;
			}
		}
		return outcomes;
	}
}
