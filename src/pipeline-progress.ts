import ora, { type Ora } from "ora";
import chalk from "chalk";
import { STAGE_NUMBERS, TOTAL_STAGES, type PipelineStageName } from "./pipeline-errors.js";

/**
 * The only channel the orchestrator and stages report through.
 */
export interface PipelineProgress {
	beginStage(stage: PipelineStageName): void;
	start(message: string): void;
	succeed(message: string): void;
	fail(message: string): void;
	warn(message: string): void;
	info(message: string): void;
	debug(message: string): void;
	stop(): void;
}

export interface PipelineProgressConfig {
	verbose?: boolean;
	silent?: boolean;
}

const STAGE_HEADINGS: Record<PipelineStageName, { icon: string; title: string }> = {
	extraction: { icon: "🎵", title: "Extracting Audio" },
	transcription: { icon: "🎙️ ", title: "Transcribing Audio" },
	summarization: { icon: "🤖", title: "Analyzing Transcript" },
};

export function formatStageHeading(stage: PipelineStageName): string {
	const { icon, title } = STAGE_HEADINGS[stage];
	return `${icon} Step ${STAGE_NUMBERS[stage]}/${TOTAL_STAGES}: ${title}`;
}

export class PipelineProgressReporter implements PipelineProgress {
	private spinner?: Ora;
	private stage?: PipelineStageName;
	private verbose: boolean;
	private silent: boolean;

	constructor(config: PipelineProgressConfig = {}) {
		this.verbose = config.verbose ?? false;
		this.silent = config.silent ?? false;
	}

	get currentStage(): PipelineStageName | undefined {
		return this.stage;
	}

	beginStage(stage: PipelineStageName): void {
		this.stage = stage;
		if (this.silent) return;

		this.stop();
		console.log(chalk.white(`\n${formatStageHeading(stage)}`));
		console.log(chalk.gray("-".repeat(70)));
	}

	start(message: string): void {
		if (this.silent) return;

		this.stop();
		// spinner lines carry the stage counter, e.g. [2/3]
		const prefixText = this.stage ? chalk.gray(`[${STAGE_NUMBERS[this.stage]}/${TOTAL_STAGES}]`) : "";
		this.spinner = ora({ text: message, prefixText, color: "cyan" }).start();
	}

	succeed(message: string): void {
		this.settle(chalk.green("✓"), chalk.green(message));
	}

	fail(message: string): void {
		this.settle(chalk.red("✗"), chalk.red(message));
	}

	warn(message: string): void {
		this.write(chalk.yellow(`⚠️  ${message}`));
	}

	info(message: string): void {
		this.write(chalk.gray(`   ${message}`));
	}

	debug(message: string): void {
		if (!this.verbose) return;
		this.write(chalk.gray(`  [debug] ${message}`));
	}

	stop(): void {
		this.spinner?.stop();
		this.spinner = undefined;
	}

	private settle(symbol: string, text: string): void {
		if (this.silent) return;

		if (this.spinner) {
			this.spinner.stopAndPersist({ symbol, text });
			this.spinner = undefined;
			return;
		}
		console.log(`${symbol} ${text}`);
	}

	/** Prints above a running spinner without ending it. */
	private write(line: string): void {
		if (this.silent) return;

		this.spinner?.clear();
		console.log(line);
		this.spinner?.render();
	}
}

export function createProgress(config?: PipelineProgressConfig): PipelineProgressReporter {
	return new PipelineProgressReporter(config);
}

export function formatDuration(ms: number): string {
	if (ms < 1000) {
		return `${ms}ms`;
	}
	const seconds = ms / 1000;
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainingSeconds = (seconds % 60).toFixed(0);
	return `${minutes}m ${remainingSeconds}s`;
}
