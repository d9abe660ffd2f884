import { sleep } from "./timing.js";

/**
 * Options for launching tasks with pacing.
 */
export interface PacingOptions<T> {
	/** Total number of tasks to launch */
	count: number;
	/** Delay in milliseconds between consecutive launches */
	delayMs: number;
	/** Function that launches one task (receives 0-based index) */
	onStart: (index: number) => T;
}

/**
 * Launch tasks with a fixed delay between starts (none after the last).
 *
 * Tasks are started in a fire-and-forget pattern: the returned handles are
 * available once every task has been launched, not once they complete.
 *
 * @returns The launched handles, in launch order
 */
export async function launchWithPacing<T>(options: PacingOptions<T>): Promise<T[]> {
	const { count, delayMs, onStart } = options;
	const launched: T[] = [];

	for (let i = 0; i < count; i++) {
		launched.push(onStart(i));

		// Pace task starts (except for the last one)
		if (i < count - 1 && delayMs > 0) {
			await sleep(delayMs);
		}
	}

	return launched;
}

/**
 * Calculate the target launch rate (tasks per second).
 */
export function calculatePacingRate(delayMs: number): string {
	return delayMs > 0 ? (1000 / delayMs).toFixed(1) : "max";
}
