import fs from "node:fs/promises";
import path from "node:path";
import { exists } from "./artifact-locator.js";
import { VideoNotFoundError } from "./pipeline-errors.js";
import type { PipelineProgress } from "./pipeline-progress.js";
import { runCommand, isToolInstalled, type CommandRunner } from "./process-runner.js";

export const AUDIO_SAMPLE_RATE = 16000;

export interface AudioExtractorConfig {
	ffmpegPath?: string;
	runner?: CommandRunner;
	progress?: PipelineProgress;
}

export interface AudioExtractionStage {
	extract(videoPath: string, audioPath: string, signal?: AbortSignal): Promise<string>;
}

/**
 * ffmpeg arguments for a mono 16kHz 16-bit PCM WAV, overwriting the
 * destination.
 */
export function buildFfmpegArgs(videoPath: string, audioPath: string): string[] {
	return [
		"-i",
		videoPath,
		"-vn",
		"-acodec",
		"pcm_s16le",
		"-ar",
		String(AUDIO_SAMPLE_RATE),
		"-ac",
		"1",
		"-y",
		audioPath,
	];
}

export class AudioExtractor implements AudioExtractionStage {
	private ffmpegPath: string;
	private runner: CommandRunner;
	private progress?: PipelineProgress;

	constructor(config: AudioExtractorConfig = {}) {
		this.ffmpegPath = config.ffmpegPath ?? "ffmpeg";
		this.runner = config.runner ?? runCommand;
		this.progress = config.progress;
	}

	async extract(videoPath: string, audioPath: string, signal?: AbortSignal): Promise<string> {
		if (!(await exists(videoPath))) {
			throw new VideoNotFoundError(videoPath);
		}

		await fs.mkdir(path.dirname(audioPath), { recursive: true });

		const args = buildFfmpegArgs(videoPath, audioPath);
		this.progress?.debug(`Running: ${this.ffmpegPath} ${args.join(" ")}`);
		this.progress?.start(`Extracting audio from ${path.basename(videoPath)}...`);

		try {
			await this.runner(this.ffmpegPath, args, { signal, stage: "extraction" });
		} catch (error) {
			this.progress?.fail("Audio extraction failed");
			throw error;
		}

		this.progress?.succeed(`Audio extracted to ${audioPath}`);
		return audioPath;
	}

	static isInstalled(ffmpegPath = "ffmpeg", runner: CommandRunner = runCommand): Promise<boolean> {
		return isToolInstalled(ffmpegPath, ["-version"], runner);
	}
}
