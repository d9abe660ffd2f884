import chalk from "chalk";
import cliProgress from "cli-progress";

export interface ConnectionProgress {
	established: number;
	failed: number;
}

/**
 * Create a progress bar for connection establishment.
 */
export function createConnectionProgressBar(label: string): cliProgress.SingleBar {
	return new cliProgress.SingleBar(
		{
			format: `${chalk.cyan(label)} ${chalk.gray("|")} {bar} ${chalk.gray("|")} {value}/{total} (${chalk.green("✓")} {established} ${chalk.red("✗")} {failed})`,
			barCompleteChar: "█",
			barIncompleteChar: "░",
			hideCursor: true,
			clearOnComplete: false,
			stopOnComplete: true,
		},
		cliProgress.Presets.shades_classic,
	);
}

/**
 * Tracks one batch's establishment progress on a bar.
 */
export class BatchProgress {
	private readonly progress: ConnectionProgress = { established: 0, failed: 0 };
	private active = true;

	constructor(
		private readonly bar: cliProgress.SingleBar,
		total: number,
	) {
		bar.start(total, 0, { ...this.progress });
	}

	established(): void {
		this.progress.established++;
		this.update();
	}

	failed(): void {
		this.progress.failed++;
		this.update();
	}

	stop(): void {
		if (!this.active) return;
		this.active = false;
		this.bar.stop();
	}

	private update(): void {
		if (!this.active) return;
		this.bar.update(this.progress.established + this.progress.failed, { ...this.progress });
	}
}
