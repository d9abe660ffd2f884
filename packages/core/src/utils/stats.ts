import { roundMs } from "./timing.js";

/**
 * Round-trip latency statistics for a set of samples, in milliseconds.
 */
export interface LatencyStats {
	min: number;
	max: number;
	avg: number;
	p50: number;
	p95: number;
	p99: number;
}

export const EMPTY_LATENCY_STATS: LatencyStats = Object.freeze({ min: 0, max: 0, avg: 0, p50: 0, p95: 0, p99: 0 });

/**
 * Calculate latency statistics from an array of samples.
 * Returns all zeros if the array is empty.
 */
export function calculateLatencyStats(samples: readonly number[]): LatencyStats {
	if (samples.length === 0) return EMPTY_LATENCY_STATS;
	const sorted = [...samples].sort((a, b) => a - b);
	// Since array is sorted ascending, min is first element, max is last
	// Avoid spread operator to prevent stack overflow with large arrays (>65K elements)
	return {
		min: roundMs(sorted[0] ?? 0),
		max: roundMs(sorted[sorted.length - 1] ?? 0),
		avg: roundMs(sorted.reduce((a, b) => a + b, 0) / sorted.length),
		p50: roundMs(sorted[Math.floor((sorted.length - 1) * 0.5)] ?? 0),
		p95: roundMs(sorted[Math.floor((sorted.length - 1) * 0.95)] ?? 0),
		p99: roundMs(sorted[Math.floor((sorted.length - 1) * 0.99)] ?? 0),
	};
}

/**
 * Percentage of `part` in `whole`, 0 when `whole` is 0.
 */
export function percentage(part: number, whole: number): number {
	return whole > 0 ? (part / whole) * 100 : 0;
}
