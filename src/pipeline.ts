import fs from "node:fs/promises";
import path from "node:path";
import {
	exists,
	listGeneratedFiles,
	locateAll,
	type ArtifactPaths,
	type GeneratedFile,
} from "./artifact-locator.js";
import type { AudioExtractionStage } from "./audio-extractor.js";
import type { JobConfig } from "./pipeline-config.js";
import {
	MissingArtifactError,
	PipelineInterruptedError,
	VideoNotFoundError,
	wrapError,
	type PipelineError,
	type PipelineStageName,
} from "./pipeline-errors.js";
import type { PipelineProgress } from "./pipeline-progress.js";
import type { SummaryRecord, TranscriptRecord } from "./pipeline-schemas.js";
import type { SummarizationStage } from "./meeting-summarizer.js";
import { loadSummary, saveSummary } from "./summary-formatters.js";
import { loadTranscript, saveTranscript } from "./transcript-formatters.js";
import type { TranscriptionStage } from "./transcriber.js";

/** How a stage was resolved in a run */
export type StageResolution = "ran" | "reused" | "skipped";

export type PipelineJob = Pick<
	JobConfig,
	| "videoPath"
	| "outputBase"
	| "language"
	| "context"
	| "force"
	| "skipExtraction"
	| "skipTranscription"
	| "skipSummary"
>;

/**
 * Stage collaborators are built on first use so a skipped or reused stage
 * never needs its tool or credential.
 */
export interface StageFactories {
	extractor: () => AudioExtractionStage;
	transcriber: () => TranscriptionStage;
	summarizer: () => SummarizationStage;
}

export interface PipelineResult {
	outputBase: string;
	artifacts: ArtifactPaths;
	stages: Record<PipelineStageName, StageResolution>;
	transcript: TranscriptRecord;
	summary?: SummaryRecord;
	files: GeneratedFile[];
	elapsedMs: number;
}

export type PipelineOutcome =
	| { ok: true; result: PipelineResult }
	| { ok: false; error: PipelineError };

export const EXIT_CODES = {
	success: 0,
	failure: 1,
	interrupted: 130,
} as const;

export function exitCodeFor(outcome: PipelineOutcome): number {
	if (outcome.ok) {
		return EXIT_CODES.success;
	}
	return outcome.error.kind === "interrupted" ? EXIT_CODES.interrupted : EXIT_CODES.failure;
}

export class MeetingPipeline {
	private factories: StageFactories;
	private progress: PipelineProgress;

	constructor(factories: StageFactories, progress: PipelineProgress) {
		this.factories = factories;
		this.progress = progress;
	}

	async run(job: PipelineJob, signal?: AbortSignal): Promise<PipelineOutcome> {
		const startTime = Date.now();
		const artifacts = locateAll(job.outputBase);
		let currentStage: PipelineStageName | undefined;

		try {
			await fs.mkdir(path.dirname(job.outputBase), { recursive: true });
			await this.verifyInputs(job, artifacts);

			currentStage = "extraction";
			this.checkInterrupted(signal, currentStage);
			const extraction = await this.resolveExtraction(job, artifacts, signal);

			currentStage = "transcription";
			this.checkInterrupted(signal, currentStage);
			const transcription = await this.resolveTranscription(job, artifacts, signal);

			currentStage = "summarization";
			this.checkInterrupted(signal, currentStage);
			const summarization = await this.resolveSummarization(job, artifacts, transcription.transcript, signal);

			currentStage = undefined;
			const files = await listGeneratedFiles(job.outputBase);

			return {
				ok: true,
				result: {
					outputBase: job.outputBase,
					artifacts,
					stages: {
						extraction,
						transcription: transcription.resolution,
						summarization: summarization.resolution,
					},
					transcript: transcription.transcript,
					summary: summarization.summary,
					files,
					elapsedMs: Date.now() - startTime,
				},
			};
		} catch (error: unknown) {
			this.progress.stop();
			if (signal?.aborted) {
				return { ok: false, error: new PipelineInterruptedError(currentStage) };
			}
			return { ok: false, error: wrapError(error, currentStage) };
		}
	}

	/**
	 * Inputs are checked before any collaborator runs: the video unless
	 * extraction is skipped (even when its audio would be reused), and the
	 * artifact of every skipped stage except the terminal summarization.
	 */
	private async verifyInputs(job: PipelineJob, artifacts: ArtifactPaths): Promise<void> {
		if (!job.skipExtraction && !(await exists(job.videoPath))) {
			throw new VideoNotFoundError(job.videoPath);
		}
		if (job.skipExtraction && !(await exists(artifacts.audio.wav))) {
			throw new MissingArtifactError("extraction", artifacts.audio.wav, "--skip-extraction");
		}
		if (job.skipTranscription && !(await exists(artifacts.transcript.json))) {
			throw new MissingArtifactError("transcription", artifacts.transcript.json, "--skip-transcription");
		}
	}

	private checkInterrupted(signal: AbortSignal | undefined, stage: PipelineStageName): void {
		if (signal?.aborted) {
			throw new PipelineInterruptedError(stage);
		}
	}

	private async resolveExtraction(
		job: PipelineJob,
		artifacts: ArtifactPaths,
		signal?: AbortSignal
	): Promise<StageResolution> {
		const audioPath = artifacts.audio.wav;

		if (job.skipExtraction) {
			this.progress.info("⏭️  Skipping audio extraction (--skip-extraction flag)");
			return "skipped";
		}

		if (!job.force && (await exists(audioPath))) {
			this.progress.info("⏭️  Skipping audio extraction (file already exists)");
			this.progress.info(`   Found: ${audioPath}`);
			this.progress.info("   Use --force to re-extract");
			return "reused";
		}

		this.progress.beginStage("extraction");
		await this.factories.extractor().extract(job.videoPath, audioPath, signal);
		return "ran";
	}

	private async resolveTranscription(
		job: PipelineJob,
		artifacts: ArtifactPaths,
		signal?: AbortSignal
	): Promise<{ resolution: StageResolution; transcript: TranscriptRecord }> {
		const transcriptPath = artifacts.transcript.json;

		if (job.skipTranscription) {
			this.progress.info("⏭️  Skipping transcription (--skip-transcription flag)");
			return { resolution: "skipped", transcript: await loadTranscript(transcriptPath) };
		}

		if (!job.force && (await exists(transcriptPath))) {
			this.progress.info("⏭️  Skipping transcription (file already exists)");
			this.progress.info(`   Found: ${transcriptPath}`);
			this.progress.info("   Use --force to re-transcribe");
			return { resolution: "reused", transcript: await loadTranscript(transcriptPath) };
		}

		this.progress.beginStage("transcription");
		// always the canonical audio path, whether extraction ran or not
		const transcript = await this.factories.transcriber().transcribe(artifacts.audio.wav, job.language, signal);
		await saveTranscript(transcript, artifacts.transcript);
		this.progress.debug(`Saved ${artifacts.transcript.json}, ${artifacts.transcript.txt}, ${artifacts.transcript.srt}`);

		return { resolution: "ran", transcript };
	}

	private async resolveSummarization(
		job: PipelineJob,
		artifacts: ArtifactPaths,
		transcript: TranscriptRecord,
		signal?: AbortSignal
	): Promise<{ resolution: StageResolution; summary?: SummaryRecord }> {
		const summaryPath = artifacts.summary.json;

		if (job.skipSummary) {
			this.progress.info("⏭️  Skipping summarization");
			return { resolution: "skipped" };
		}

		if (!job.force && (await exists(summaryPath))) {
			this.progress.info("⏭️  Skipping summarization (file already exists)");
			this.progress.info(`   Found: ${summaryPath}`);
			this.progress.info("   Use --force to re-summarize");
			return { resolution: "reused", summary: await loadSummary(summaryPath) };
		}

		this.progress.beginStage("summarization");
		const summary = await this.factories.summarizer().summarize(transcript.full_transcript, job.context, signal);
		await saveSummary(summary, artifacts.summary);
		this.progress.debug(`Saved ${artifacts.summary.json}, ${artifacts.summary.md}`);

		return { resolution: "ran", summary };
	}
}
