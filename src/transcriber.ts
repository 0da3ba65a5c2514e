import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { exists } from "./artifact-locator.js";
import { AudioNotFoundError, ExternalToolError } from "./pipeline-errors.js";
import type { PipelineProgress } from "./pipeline-progress.js";
import {
	WhisperOutputSchema,
	type TranscriptRecord,
	type TranscriptSegment,
	type WhisperDevice,
	type WhisperModel,
	type WhisperOutput,
} from "./pipeline-schemas.js";
import { runCommand, type CommandRunner } from "./process-runner.js";

export interface RecognitionRequest {
	audioPath: string;
	/** Fixed language code, or undefined to let the engine detect it */
	language?: string;
	signal?: AbortSignal;
}

export interface RecognitionResult {
	language?: string;
	segments: TranscriptSegment[];
}

/**
 * Maps a waveform to timestamped segments with word-level timings.
 */
export interface SpeechEngine {
	recognize(request: RecognitionRequest): Promise<RecognitionResult>;
}

export interface TranscriptionStage {
	transcribe(audioPath: string, language: string | undefined, signal?: AbortSignal): Promise<TranscriptRecord>;
}

export interface WhisperCliConfig {
	model: WhisperModel;
	device?: WhisperDevice;
	whisperPath?: string;
	runner?: CommandRunner;
	progress?: PipelineProgress;
}

export function buildWhisperArgs(
	audioPath: string,
	outputDir: string,
	options: { model: WhisperModel; device: WhisperDevice; language?: string }
): string[] {
	const args = [
		audioPath,
		"--model",
		options.model,
		"--word_timestamps",
		"True",
		"--output_format",
		"json",
		"--output_dir",
		outputDir,
		"--verbose",
		"False",
	];

	if (options.language) {
		args.push("--language", options.language);
	}

	if (options.device !== "auto") {
		args.push("--device", options.device);
	}

	if (options.device === "cpu") {
		args.push("--fp16", "False");
	}

	return args;
}

export function toRecognitionResult(output: WhisperOutput): RecognitionResult {
	return {
		language: output.language ?? undefined,
		segments: output.segments.map((segment) => ({
			start: segment.start,
			end: segment.end,
			text: segment.text.trim(),
			words: (segment.words ?? []).map((word) => ({
				word: word.word,
				start: word.start,
				end: word.end,
				probability: word.probability,
			})),
		})),
	};
}

export class WhisperCliEngine implements SpeechEngine {
	private model: WhisperModel;
	private device: WhisperDevice;
	private whisperPath: string;
	private runner: CommandRunner;
	private progress?: PipelineProgress;

	constructor(config: WhisperCliConfig) {
		this.model = config.model;
		this.device = config.device ?? "auto";
		this.whisperPath = config.whisperPath ?? "whisper";
		this.runner = config.runner ?? runCommand;
		this.progress = config.progress;
	}

	async recognize(request: RecognitionRequest): Promise<RecognitionResult> {
		const outputDir = await fs.mkdtemp(path.join(os.tmpdir(), "meetscribe-whisper-"));

		try {
			const args = buildWhisperArgs(request.audioPath, outputDir, {
				model: this.model,
				device: this.device,
				language: request.language,
			});
			this.progress?.debug(`Running: ${this.whisperPath} ${args.join(" ")}`);

			await this.runner(this.whisperPath, args, { signal: request.signal, stage: "transcription" });

			const outputName = `${path.parse(request.audioPath).name}.json`;
			const outputPath = path.join(outputDir, outputName);

			let raw: string;
			try {
				raw = await fs.readFile(outputPath, "utf8");
			} catch (error: unknown) {
				throw new ExternalToolError(this.whisperPath, `no output written to ${outputName}`, {
					stage: "transcription",
					cause: error instanceof Error ? error : undefined,
				});
			}

			let json: unknown;
			try {
				json = JSON.parse(raw);
			} catch (error: unknown) {
				throw new ExternalToolError(this.whisperPath, `${outputName} is not valid JSON`, {
					stage: "transcription",
					cause: error instanceof Error ? error : undefined,
				});
			}

			const parsed = WhisperOutputSchema.safeParse(json);
			if (!parsed.success) {
				throw new ExternalToolError(this.whisperPath, `unexpected output format: ${parsed.error.message}`, {
					stage: "transcription",
				});
			}

			return toRecognitionResult(parsed.data);
		} finally {
			await fs.rm(outputDir, { recursive: true, force: true });
		}
	}
}

export function buildTranscriptRecord(result: RecognitionResult, requestedLanguage?: string): TranscriptRecord {
	const segments = result.segments.map((segment) => ({
		...segment,
		text: segment.text.trim(),
	}));

	const duration = segments.length > 0 ? segments[segments.length - 1].end : 0;

	return {
		language: result.language ?? requestedLanguage ?? "unknown",
		duration,
		full_transcript: segments.map((segment) => segment.text).join(" "),
		segments,
	};
}

export class Transcriber implements TranscriptionStage {
	private engine: SpeechEngine;
	private progress?: PipelineProgress;

	constructor(engine: SpeechEngine, progress?: PipelineProgress) {
		this.engine = engine;
		this.progress = progress;
	}

	async transcribe(audioPath: string, language: string | undefined, signal?: AbortSignal): Promise<TranscriptRecord> {
		if (!(await exists(audioPath))) {
			throw new AudioNotFoundError(audioPath);
		}

		this.progress?.info("This may take several minutes depending on the audio length...");
		this.progress?.start(`Transcribing ${path.basename(audioPath)}...`);

		let result: RecognitionResult;
		try {
			result = await this.engine.recognize({ audioPath, language, signal });
		} catch (error) {
			this.progress?.fail("Transcription failed");
			throw error;
		}

		const transcript = buildTranscriptRecord(result, language);

		this.progress?.succeed(
			`Transcription complete: ${transcript.segments.length} segments, ${transcript.duration.toFixed(1)} seconds`
		);
		this.progress?.info(`Detected language: ${transcript.language}`);

		return transcript;
	}
}
