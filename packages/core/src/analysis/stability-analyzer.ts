import type { BatchResult } from "../domain/results.js";

export interface StabilityCriteria {
	/** Minimum success rate (%) for a batch to be stable; inclusive */
	threshold: number;
	/** Step between tested counts */
	increment: number;
}

/**
 * Classification of a run's batch history.
 * Counts are `totalConnections`, i.e. the connections held open at once.
 */
export type StabilityVerdict =
	| { kind: "ceiling"; ceiling: number; maxStable: BatchResult; minUnstable: BatchResult }
	| { kind: "range"; lower: number; upper: number; maxStable: BatchResult; minUnstable: BatchResult }
	| { kind: "stable_no_ceiling"; highestTested: number; highestBatch: BatchResult }
	| { kind: "unstable_from_start"; lowestTested: number; lowestBatch: BatchResult }
	| { kind: "no_data" };

export function isStableBatch(batch: BatchResult, threshold: number): boolean {
	return batch.successRate >= threshold;
}

function highest(batches: readonly BatchResult[]): BatchResult | undefined {
	return batches.reduce<BatchResult | undefined>(
		(best, batch) => (best === undefined || batch.totalConnections > best.totalConnections ? batch : best),
		undefined,
	);
}

function lowest(batches: readonly BatchResult[]): BatchResult | undefined {
	return batches.reduce<BatchResult | undefined>(
		(best, batch) => (best === undefined || batch.totalConnections < best.totalConnections ? batch : best),
		undefined,
	);
}

/**
 * Decide what boundary, if any, the batch history has found.
 */
export function analyzeStability(history: readonly BatchResult[], criteria: StabilityCriteria): StabilityVerdict {
	const stable = history.filter((batch) => isStableBatch(batch, criteria.threshold));
	const unstable = history.filter((batch) => !isStableBatch(batch, criteria.threshold));

	const maxStable = highest(stable);
	const minUnstable = lowest(unstable);

	if (maxStable && minUnstable) {
		if (minUnstable.totalConnections - maxStable.totalConnections <= criteria.increment) {
			return { kind: "ceiling", ceiling: maxStable.totalConnections, maxStable, minUnstable };
		}
		return {
			kind: "range",
			lower: maxStable.totalConnections,
			upper: minUnstable.totalConnections,
			maxStable,
			minUnstable,
		};
	}

	if (maxStable) {
		return { kind: "stable_no_ceiling", highestTested: maxStable.totalConnections, highestBatch: maxStable };
	}

	if (minUnstable) {
		return { kind: "unstable_from_start", lowestTested: minUnstable.totalConnections, lowestBatch: minUnstable };
	}

	return { kind: "no_data" };
}

/**
 * One-line description of a verdict.
 */
export function describeVerdict(verdict: StabilityVerdict): string {
	switch (verdict.kind) {
		case "ceiling":
			return `practical ceiling of ${verdict.ceiling} connections; instability starts at ${verdict.minUnstable.totalConnections}`;
		case "range":
			return `ceiling between ${verdict.lower} and ${verdict.upper} connections; retest this range with smaller increments`;
		case "stable_no_ceiling":
			return `stable through ${verdict.highestTested}; ceiling not yet found`;
		case "unstable_from_start":
			return `unstable even at ${verdict.lowestTested}, the smallest tested count`;
		case "no_data":
			return "no data";
	}
}
