import { AudioExtractor } from "./audio-extractor.js";
import { MeetingSummarizer } from "./meeting-summarizer.js";
import type { StageFactories } from "./pipeline.js";
import { apiKeyEnvVar, type JobConfig } from "./pipeline-config.js";
import { ConfigurationError } from "./pipeline-errors.js";
import type { PipelineProgress } from "./pipeline-progress.js";
import type { CommandRunner } from "./process-runner.js";
import { AiSdkTextGenerator } from "./text-generator.js";
import { Transcriber, WhisperCliEngine } from "./transcriber.js";

export function createStageFactories(
	config: JobConfig,
	progress: PipelineProgress,
	runner?: CommandRunner
): StageFactories {
	return {
		extractor: () =>
			new AudioExtractor({
				ffmpegPath: config.tools.ffmpegPath,
				runner,
				progress,
			}),

		transcriber: () => {
			progress.info(`Loading Whisper model '${config.whisperModel}' (first run downloads it)...`);
			const engine = new WhisperCliEngine({
				model: config.whisperModel,
				device: config.whisperDevice,
				whisperPath: config.tools.whisperPath,
				runner,
				progress,
			});
			return new Transcriber(engine, progress);
		},

		summarizer: () => {
			if (!config.ai.apiKey) {
				throw new ConfigurationError(`${apiKeyEnvVar(config.ai.provider)} is not set`, [
					`Set ${apiKeyEnvVar(config.ai.provider)} in your environment or .env file`,
					"--skip-summary (only transcribe)",
				]);
			}
			const generator = new AiSdkTextGenerator({
				provider: config.ai.provider,
				model: config.ai.model,
				apiKey: config.ai.apiKey,
				requestTimeoutMs: config.ai.requestTimeoutMs,
				progress,
			});
			return new MeetingSummarizer(generator, { progress });
		},
	};
}
