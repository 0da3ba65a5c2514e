import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./pipeline-errors.js";
import {
	WhisperDeviceSchema,
	WhisperModelSchema,
	type WhisperDevice,
	type WhisperModel,
} from "./pipeline-schemas.js";

export type AIProvider = "openai" | "anthropic";

export const ENV_VARS = {
	anthropicApiKey: "MEETSCRIBE_ANTHROPIC_API_KEY",
	openaiApiKey: "MEETSCRIBE_OPENAI_API_KEY",
	aiModel: "MEETSCRIBE_AI_MODEL",
	aiRequestTimeoutMs: "MEETSCRIBE_AI_REQUEST_TIMEOUT_MS",
	whisperModel: "MEETSCRIBE_WHISPER_MODEL",
	whisperDevice: "MEETSCRIBE_WHISPER_DEVICE",
	outputDir: "MEETSCRIBE_OUTPUT_DIR",
	ffmpegPath: "MEETSCRIBE_FFMPEG_PATH",
	whisperPath: "MEETSCRIBE_WHISPER_PATH",
} as const;

export const DEFAULT_AI_MODEL = "anthropic:claude-sonnet-4-20250514";
export const DEFAULT_WHISPER_MODEL: WhisperModel = "medium";
export const DEFAULT_OUTPUT_DIR = "./output";
export const DEFAULT_LANGUAGE = "en";
export const DEFAULT_AI_REQUEST_TIMEOUT_MS = 180_000;

export interface ResolvedModel {
	provider: AIProvider;
	model: string;
	source: "cli-model" | "env-model" | "default";
}

/**
 * Environment-sourced defaults, read once at startup.
 */
export interface EnvironmentDefaults {
	apiKeys: Partial<Record<AIProvider, string>>;
	aiModel?: string;
	aiRequestTimeoutMs: number;
	whisperModel: WhisperModel;
	whisperDevice: WhisperDevice;
	outputDir: string;
	ffmpegPath: string;
	whisperPath: string;
}

export interface CliOptions {
	model?: string;
	language?: string;
	output?: string;
	context?: string;
	aiModel?: string;
	device?: string;
	skipExtraction?: boolean;
	skipTranscription?: boolean;
	skipSummary?: boolean;
	force?: boolean;
	verbose?: boolean;
}

export interface JobConfig {
	readonly videoPath: string;
	readonly outputBase: string;
	readonly whisperModel: WhisperModel;
	readonly whisperDevice: WhisperDevice;
	/** Fixed recognition language; undefined lets the engine detect it */
	readonly language?: string;
	readonly context?: string;
	readonly force: boolean;
	readonly skipExtraction: boolean;
	readonly skipTranscription: boolean;
	readonly skipSummary: boolean;
	readonly verbose: boolean;
	readonly ai: {
		readonly provider: AIProvider;
		readonly model: string;
		readonly source: ResolvedModel["source"];
		readonly apiKey?: string;
		readonly requestTimeoutMs: number;
	};
	readonly tools: {
		readonly ffmpegPath: string;
		readonly whisperPath: string;
	};
}

const TimeoutSchema = z.coerce.number().int().min(1000);

function nonEmpty(value: string | undefined): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}

export function readEnvironmentDefaults(env: NodeJS.ProcessEnv): EnvironmentDefaults {
	const whisperModel = WhisperModelSchema.safeParse(nonEmpty(env[ENV_VARS.whisperModel]) ?? DEFAULT_WHISPER_MODEL);
	if (!whisperModel.success) {
		throw new ConfigurationError(
			`${ENV_VARS.whisperModel} must be one of: ${WhisperModelSchema.options.join(", ")}`
		);
	}

	const whisperDevice = WhisperDeviceSchema.safeParse(nonEmpty(env[ENV_VARS.whisperDevice]) ?? "auto");
	if (!whisperDevice.success) {
		throw new ConfigurationError(
			`${ENV_VARS.whisperDevice} must be one of: ${WhisperDeviceSchema.options.join(", ")}`
		);
	}

	const timeout = TimeoutSchema.safeParse(nonEmpty(env[ENV_VARS.aiRequestTimeoutMs]) ?? DEFAULT_AI_REQUEST_TIMEOUT_MS);
	if (!timeout.success) {
		throw new ConfigurationError(
			`${ENV_VARS.aiRequestTimeoutMs} must be a whole number of milliseconds, at least 1000`
		);
	}

	return {
		apiKeys: {
			anthropic: nonEmpty(env[ENV_VARS.anthropicApiKey]),
			openai: nonEmpty(env[ENV_VARS.openaiApiKey]),
		},
		aiModel: nonEmpty(env[ENV_VARS.aiModel]),
		aiRequestTimeoutMs: timeout.data,
		whisperModel: whisperModel.data,
		whisperDevice: whisperDevice.data,
		outputDir: nonEmpty(env[ENV_VARS.outputDir]) ?? DEFAULT_OUTPUT_DIR,
		ffmpegPath: nonEmpty(env[ENV_VARS.ffmpegPath]) ?? "ffmpeg",
		whisperPath: nonEmpty(env[ENV_VARS.whisperPath]) ?? "whisper",
	};
}

function isProvider(value: string): value is AIProvider {
	return value === "openai" || value === "anthropic";
}

/**
 * Parse a model string in the format "provider:model"
 */
export function parseModelString(modelString: string): { provider: AIProvider; model: string } | null {
	const separator = modelString.indexOf(":");
	if (separator <= 0 || separator === modelString.length - 1) {
		return null;
	}

	const provider = modelString.slice(0, separator);
	const model = modelString.slice(separator + 1);
	if (!isProvider(provider)) {
		return null;
	}

	return { provider, model };
}

/**
 * Resolution priority:
 * 1. --ai-model flag
 * 2. MEETSCRIBE_AI_MODEL
 * 3. built-in default
 */
export function resolveModel(cliModel: string | undefined, envModel: string | undefined): ResolvedModel {
	const candidates: Array<[string | undefined, ResolvedModel["source"], string]> = [
		[cliModel, "cli-model", "--ai-model"],
		[envModel, "env-model", ENV_VARS.aiModel],
	];

	for (const [value, source, origin] of candidates) {
		if (!value) continue;
		const parsed = parseModelString(value);
		if (!parsed) {
			throw new ConfigurationError(
				`Invalid model format from ${origin}: "${value}". Use format "provider:model"`,
				["--ai-model anthropic:claude-sonnet-4-20250514", "--ai-model openai:gpt-4o"]
			);
		}
		return { ...parsed, source };
	}

	const parsed = parseModelString(DEFAULT_AI_MODEL);
	if (!parsed) {
		throw new ConfigurationError(`Invalid built-in model "${DEFAULT_AI_MODEL}"`);
	}
	return { ...parsed, source: "default" };
}

function isDirectory(candidate: string): boolean {
	try {
		return fs.statSync(candidate).isDirectory();
	} catch {
		return false;
	}
}

function videoStem(videoPath: string): string {
	return path.parse(videoPath).name;
}

/**
 * An --output naming an existing directory (or ending in a separator) gets the
 * video's stem appended; anything else is used as the base path itself.
 */
export function resolveOutputBase(videoPath: string, output: string | undefined, outputDir: string): string {
	if (!output) {
		return path.join(outputDir, videoStem(videoPath));
	}

	if (output.endsWith("/") || output.endsWith(path.sep) || isDirectory(output)) {
		return path.join(output, videoStem(videoPath));
	}

	return output;
}

export function resolveLanguage(language: string | undefined): string | undefined {
	const value = nonEmpty(language) ?? DEFAULT_LANGUAGE;
	return value.toLowerCase() === "auto" ? undefined : value;
}

export function buildJobConfig(videoPath: string, options: CliOptions, defaults: EnvironmentDefaults): JobConfig {
	const whisperModel = WhisperModelSchema.safeParse(options.model ?? defaults.whisperModel);
	if (!whisperModel.success) {
		throw new ConfigurationError(`--model must be one of: ${WhisperModelSchema.options.join(", ")}`);
	}

	const whisperDevice = WhisperDeviceSchema.safeParse(options.device ?? defaults.whisperDevice);
	if (!whisperDevice.success) {
		throw new ConfigurationError(`--device must be one of: ${WhisperDeviceSchema.options.join(", ")}`);
	}

	const resolved = resolveModel(nonEmpty(options.aiModel), defaults.aiModel);

	const config: JobConfig = {
		videoPath,
		outputBase: resolveOutputBase(videoPath, nonEmpty(options.output), defaults.outputDir),
		whisperModel: whisperModel.data,
		whisperDevice: whisperDevice.data,
		language: resolveLanguage(options.language),
		context: nonEmpty(options.context),
		force: options.force ?? false,
		skipExtraction: options.skipExtraction ?? false,
		skipTranscription: options.skipTranscription ?? false,
		skipSummary: options.skipSummary ?? false,
		verbose: options.verbose ?? false,
		ai: Object.freeze({
			provider: resolved.provider,
			model: resolved.model,
			source: resolved.source,
			apiKey: defaults.apiKeys[resolved.provider],
			requestTimeoutMs: defaults.aiRequestTimeoutMs,
		}),
		tools: Object.freeze({
			ffmpegPath: defaults.ffmpegPath,
			whisperPath: defaults.whisperPath,
		}),
	};

	return Object.freeze(config);
}

const MODEL_SOURCE_LABELS: Record<ResolvedModel["source"], string> = {
	"cli-model": "--ai-model",
	"env-model": ENV_VARS.aiModel,
	default: "default",
};

export function describeModel(ai: Pick<JobConfig["ai"], "provider" | "model" | "source">): string {
	return `${ai.provider}:${ai.model} (${MODEL_SOURCE_LABELS[ai.source]})`;
}

export function apiKeyEnvVar(provider: AIProvider): string {
	return provider === "anthropic" ? ENV_VARS.anthropicApiKey : ENV_VARS.openaiApiKey;
}
