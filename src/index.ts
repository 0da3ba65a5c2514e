#!/usr/bin/env node

import { Command, Option } from "commander";
import dotenv from "dotenv";
import chalk from "chalk";
import { AudioExtractor } from "./audio-extractor.js";
import { EXIT_CODES, MeetingPipeline, exitCodeFor } from "./pipeline.js";
import {
	buildJobConfig,
	describeModel,
	readEnvironmentDefaults,
	type CliOptions,
	type JobConfig,
} from "./pipeline-config.js";
import { MissingPrerequisitesError, formatError, type PipelineError } from "./pipeline-errors.js";
import { createProgress } from "./pipeline-progress.js";
import { formatCompletionReport } from "./pipeline-report.js";
import { WHISPER_MODELS } from "./pipeline-schemas.js";
import { checkPrerequisites } from "./prerequisites.js";
import { createStageFactories } from "./stage-factories.js";

dotenv.config();

function printBanner(): void {
	console.log(chalk.blue("=".repeat(70)));
	console.log(chalk.blue("  MEETSCRIBE - Meeting Transcription & Summarization"));
	console.log(chalk.blue("=".repeat(70)));
	console.log();
}

function printJob(config: JobConfig): void {
	console.log(chalk.gray(`📁 Video: ${config.videoPath}`));
	console.log(chalk.gray(`📁 Output: ${config.outputBase}`));
	console.log(chalk.gray(`🎯 Whisper Model: ${config.whisperModel}`));
	console.log(chalk.gray(`🗣️  Language: ${config.language ?? "auto-detect"}`));
	if (!config.skipSummary) {
		console.log(chalk.gray(`🤖 Summary Model: ${describeModel(config.ai)}`));
	}
	if (config.force) {
		console.log(chalk.yellow("🔁 --force: every stage that is not skipped will re-run"));
	}
	console.log();
}

function printFailure(error: PipelineError): void {
	console.error("\n" + formatError(error));

	if (error.kind === "unexpected") {
		const stack = error.cause?.stack ?? error.stack;
		if (stack) {
			console.error(chalk.gray(stack));
		}
	}
}

async function runMeetingJob(videoPath: string, options: CliOptions): Promise<number> {
	printBanner();

	let config: JobConfig;
	try {
		config = buildJobConfig(videoPath, options, readEnvironmentDefaults(process.env));
	} catch (error: unknown) {
		console.error(formatError(error));
		return EXIT_CODES.failure;
	}

	const issues = await checkPrerequisites(config, {
		isFfmpegInstalled: (ffmpegPath) => AudioExtractor.isInstalled(ffmpegPath),
	});
	if (issues.length > 0) {
		console.error(formatError(new MissingPrerequisitesError(issues)));
		console.log();
		return EXIT_CODES.failure;
	}

	printJob(config);

	const progress = createProgress({ verbose: config.verbose });
	const pipeline = new MeetingPipeline(createStageFactories(config, progress), progress);

	const controller = new AbortController();
	let interrupted = false;
	const onInterrupt = (): void => {
		if (interrupted) {
			process.exit(EXIT_CODES.interrupted);
		}
		interrupted = true;
		progress.stop();
		controller.abort();
	};
	process.on("SIGINT", onInterrupt);

	try {
		const outcome = await pipeline.run(config, controller.signal);

		if (!outcome.ok) {
			if (outcome.error.kind === "interrupted") {
				console.log(chalk.yellow("\n\n⚠️  Process interrupted by user"));
			} else {
				printFailure(outcome.error);
			}
			return exitCodeFor(outcome);
		}

		const [title, ...rest] = formatCompletionReport(outcome.result);
		console.log();
		console.log(chalk.green("=".repeat(70)));
		console.log(chalk.green(title));
		console.log(chalk.gray("-".repeat(70)));
		for (const line of rest) {
			console.log(line);
		}
		console.log(chalk.green("=".repeat(70)));

		return exitCodeFor(outcome);
	} finally {
		process.off("SIGINT", onInterrupt);
		progress.stop();
	}
}

const program = new Command();

program
	.name("meetscribe")
	.description("Transcribe and summarize meeting videos, skipping steps whose output already exists")
	.version("1.0.0")
	.argument("<video>", "Path to the meeting video file (mkv, mp4, etc.)")
	.addOption(
		new Option("--model <size>", "Whisper model size (default: MEETSCRIBE_WHISPER_MODEL or medium)").choices([
			...WHISPER_MODELS,
		])
	)
	.option("--language <code>", "Language code (en, es, fr, etc.) or 'auto' for detection", "en")
	.option("--output <path>", "Output directory or base filename (default: ./output/<video name>)")
	.option("--context <text>", "Optional context about the meeting for better summarization")
	.option("--ai-model <provider:model>", "Summarization model, e.g. anthropic:claude-sonnet-4-20250514")
	.addOption(new Option("--device <device>", "Device for Whisper").choices(["auto", "cpu", "cuda"]))
	.option("--skip-extraction", "Skip audio extraction (the audio file must already exist)")
	.option("--skip-transcription", "Skip transcription (the transcript must already exist)")
	.option("--skip-summary", "Skip summarization (only transcribe)")
	.option("--force", "Re-run every stage that is not skipped, even if its output exists")
	.option("--verbose", "Enable verbose logging for debugging")
	.addHelpText(
		"after",
		`
Examples:
  $ meetscribe meeting.mkv                      # skips completed steps
  $ meetscribe meeting.mkv --force              # re-process everything
  $ meetscribe meeting.mkv --model large-v3     # larger Whisper model
  $ meetscribe meeting.mkv --context "Sprint planning for Q1"`
	)
	.action(async (video: string, options: CliOptions) => {
		const code = await runMeetingJob(video, options);
		process.exit(code);
	});

program.parseAsync().catch((error: unknown) => {
	console.error(formatError(error));
	if (error instanceof Error && error.stack) {
		console.error(chalk.gray(error.stack));
	}
	process.exit(EXIT_CODES.failure);
});
