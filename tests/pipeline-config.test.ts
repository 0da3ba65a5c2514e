import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
	DEFAULT_AI_REQUEST_TIMEOUT_MS,
	ENV_VARS,
	apiKeyEnvVar,
	buildJobConfig,
	describeModel,
	parseModelString,
	readEnvironmentDefaults,
	resolveLanguage,
	resolveModel,
	resolveOutputBase,
	type EnvironmentDefaults,
} from "../src/pipeline-config.js";
import { ConfigurationError } from "../src/pipeline-errors.js";
import { createTempDir, removeTempDir } from "./helpers/temp-dir.js";

describe("readEnvironmentDefaults", () => {
	it("should fall back to built-in defaults", () => {
		expect(readEnvironmentDefaults({})).toEqual({
			apiKeys: { anthropic: undefined, openai: undefined },
			aiModel: undefined,
			aiRequestTimeoutMs: DEFAULT_AI_REQUEST_TIMEOUT_MS,
			whisperModel: "medium",
			whisperDevice: "auto",
			outputDir: "./output",
			ffmpegPath: "ffmpeg",
			whisperPath: "whisper",
		});
	});

	it("should read prefixed variables", () => {
		const defaults = readEnvironmentDefaults({
			[ENV_VARS.anthropicApiKey]: "test-api-key",
			[ENV_VARS.aiModel]: "openai:gpt-4o",
			[ENV_VARS.whisperModel]: "small",
			[ENV_VARS.whisperDevice]: "cpu",
			[ENV_VARS.outputDir]: "/srv/meetings",
			[ENV_VARS.aiRequestTimeoutMs]: "60000",
			[ENV_VARS.ffmpegPath]: "/opt/bin/ffmpeg",
		});

		expect(defaults).toMatchObject({
			apiKeys: { anthropic: "test-api-key" },
			aiModel: "openai:gpt-4o",
			whisperModel: "small",
			whisperDevice: "cpu",
			outputDir: "/srv/meetings",
			aiRequestTimeoutMs: 60000,
			ffmpegPath: "/opt/bin/ffmpeg",
		});
	});

	it("should treat blank values as unset", () => {
		const defaults = readEnvironmentDefaults({ [ENV_VARS.openaiApiKey]: "   ", [ENV_VARS.whisperModel]: "" });

		expect(defaults.apiKeys.openai).toBeUndefined();
		expect(defaults.whisperModel).toBe("medium");
	});

	it("should reject an unknown whisper model", () => {
		expect(() => readEnvironmentDefaults({ [ENV_VARS.whisperModel]: "huge" })).toThrow(ConfigurationError);
	});

	it("should reject an unknown device", () => {
		expect(() => readEnvironmentDefaults({ [ENV_VARS.whisperDevice]: "tpu" })).toThrow(
			`${ENV_VARS.whisperDevice} must be one of: auto, cpu, cuda`
		);
	});

	it("should reject an unusable timeout", () => {
		const message = `${ENV_VARS.aiRequestTimeoutMs} must be a whole number of milliseconds, at least 1000`;

		expect(() => readEnvironmentDefaults({ [ENV_VARS.aiRequestTimeoutMs]: "soon" })).toThrow(message);
		expect(() => readEnvironmentDefaults({ [ENV_VARS.aiRequestTimeoutMs]: "10" })).toThrow(ConfigurationError);
		expect(() => readEnvironmentDefaults({ [ENV_VARS.aiRequestTimeoutMs]: "1500.5" })).toThrow(ConfigurationError);
	});
});

describe("parseModelString", () => {
	it("should split on the first colon", () => {
		expect(parseModelString("anthropic:claude-sonnet-4-20250514")).toEqual({
			provider: "anthropic",
			model: "claude-sonnet-4-20250514",
		});
		expect(parseModelString("openai:ft:gpt-4o:team")).toEqual({ provider: "openai", model: "ft:gpt-4o:team" });
	});

	it("should reject malformed strings", () => {
		expect(parseModelString("gpt-4o")).toBeNull();
		expect(parseModelString(":gpt-4o")).toBeNull();
		expect(parseModelString("openai:")).toBeNull();
		expect(parseModelString("mistral:large")).toBeNull();
	});
});

describe("resolveModel", () => {
	it("should prefer the flag over the environment", () => {
		expect(resolveModel("openai:gpt-4o", "anthropic:claude-test")).toEqual({
			provider: "openai",
			model: "gpt-4o",
			source: "cli-model",
		});
	});

	it("should use the environment when no flag is given", () => {
		expect(resolveModel(undefined, "anthropic:claude-test")).toMatchObject({ source: "env-model", model: "claude-test" });
	});

	it("should fall back to the default", () => {
		expect(resolveModel(undefined, undefined)).toEqual({
			provider: "anthropic",
			model: "claude-sonnet-4-20250514",
			source: "default",
		});
	});

	it("should name where an invalid value came from", () => {
		expect(() => resolveModel(undefined, "gpt-4o")).toThrow(
			`Invalid model format from ${ENV_VARS.aiModel}: "gpt-4o". Use format "provider:model"`
		);
		expect(() => resolveModel("gpt-4o", undefined)).toThrow('Invalid model format from --ai-model: "gpt-4o"');
	});
});

describe("resolveOutputBase", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await createTempDir();
	});

	afterEach(async () => {
		await removeTempDir(dir);
	});

	it("should default to the video stem under the output directory", () => {
		expect(resolveOutputBase("/videos/standup.mkv", undefined, "./output")).toBe(path.join("output", "standup"));
	});

	it("should append the stem to an existing directory", () => {
		expect(resolveOutputBase("/videos/standup.mkv", dir, "./output")).toBe(path.join(dir, "standup"));
	});

	it("should append the stem to a path ending in a separator", () => {
		expect(resolveOutputBase("/videos/standup.mkv", "results/", "./output")).toBe(path.join("results", "standup"));
	});

	it("should use any other path as the base itself", () => {
		const base = path.join(dir, "monday");
		expect(resolveOutputBase("/videos/standup.mkv", base, "./output")).toBe(base);
	});
});

describe("resolveLanguage", () => {
	it("should default to English", () => {
		expect(resolveLanguage(undefined)).toBe("en");
	});

	it("should map auto to detection", () => {
		expect(resolveLanguage("auto")).toBeUndefined();
		expect(resolveLanguage("AUTO")).toBeUndefined();
	});

	it("should pass other codes through", () => {
		expect(resolveLanguage("fr")).toBe("fr");
	});
});

describe("buildJobConfig", () => {
	const defaults: EnvironmentDefaults = {
		apiKeys: { anthropic: "test-api-key" },
		aiRequestTimeoutMs: 60000,
		whisperModel: "medium",
		whisperDevice: "auto",
		outputDir: "/srv/meetings",
		ffmpegPath: "ffmpeg",
		whisperPath: "whisper",
	};

	it("should combine flags with environment defaults", () => {
		const config = buildJobConfig(
			"/videos/standup.mkv",
			{ model: "small", language: "auto", context: " Weekly sync ", skipSummary: true },
			defaults
		);

		expect(config).toMatchObject({
			videoPath: "/videos/standup.mkv",
			outputBase: path.join("/srv/meetings", "standup"),
			whisperModel: "small",
			whisperDevice: "auto",
			language: undefined,
			context: "Weekly sync",
			force: false,
			skipExtraction: false,
			skipTranscription: false,
			skipSummary: true,
			verbose: false,
			ai: {
				provider: "anthropic",
				model: "claude-sonnet-4-20250514",
				source: "default",
				apiKey: "test-api-key",
				requestTimeoutMs: 60000,
			},
		});
	});

	it("should pick the key of the resolved provider", () => {
		const config = buildJobConfig("/videos/standup.mkv", { aiModel: "openai:gpt-4o" }, defaults);

		expect(config.ai.provider).toBe("openai");
		expect(config.ai.apiKey).toBeUndefined();
	});

	it("should be frozen", () => {
		const config = buildJobConfig("/videos/standup.mkv", {}, defaults);

		expect(Object.isFrozen(config)).toBe(true);
		expect(Object.isFrozen(config.ai)).toBe(true);
		expect(Object.isFrozen(config.tools)).toBe(true);
	});

	it("should reject an unknown whisper model flag", () => {
		expect(() => buildJobConfig("/videos/standup.mkv", { model: "huge" }, defaults)).toThrow(ConfigurationError);
	});
});

describe("describeModel", () => {
	it("should name where the model came from", () => {
		expect(describeModel({ provider: "openai", model: "gpt-4o", source: "cli-model" })).toBe(
			"openai:gpt-4o (--ai-model)"
		);
		expect(describeModel({ provider: "anthropic", model: "claude-test", source: "env-model" })).toBe(
			"anthropic:claude-test (MEETSCRIBE_AI_MODEL)"
		);
		expect(describeModel(resolveModel(undefined, undefined))).toBe(
			"anthropic:claude-sonnet-4-20250514 (default)"
		);
	});
});

describe("apiKeyEnvVar", () => {
	it("should name the variable for each provider", () => {
		expect(apiKeyEnvVar("anthropic")).toBe("MEETSCRIBE_ANTHROPIC_API_KEY");
		expect(apiKeyEnvVar("openai")).toBe("MEETSCRIBE_OPENAI_API_KEY");
	});
});
