export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Round a millisecond measurement to two decimals.
 */
export function roundMs(ms: number): number {
	return Math.round(ms * 100) / 100;
}

/**
 * Milliseconds elapsed since a `performance.now()` reading, rounded to two decimals.
 */
export function elapsedMs(since: number): number {
	return roundMs(performance.now() - since);
}
