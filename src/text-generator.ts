import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import { generateText, type LanguageModel } from "ai";
import type { AIProvider } from "./pipeline-config.js";
import type { PipelineProgress } from "./pipeline-progress.js";

export interface TextGenerationRequest {
	system?: string;
	prompt: string;
	maxOutputTokens: number;
	temperature: number;
	signal?: AbortSignal;
}

export interface TextGenerationResponse {
	text: string;
	modelId: string;
	inputTokens: number;
	outputTokens: number;
}

/**
 * The narrow contract the summarizer needs from a text-generation service.
 */
export interface TextGenerationService {
	readonly modelId: string;
	generate(request: TextGenerationRequest): Promise<TextGenerationResponse>;
}

export interface AiSdkGeneratorConfig {
	provider: AIProvider;
	model: string;
	apiKey: string;
	requestTimeoutMs?: number;
	progress?: PipelineProgress;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 180_000;

export function createLanguageModel(provider: AIProvider, model: string, apiKey: string): LanguageModel {
	return provider === "anthropic" ? createAnthropic({ apiKey })(model) : createOpenAI({ apiKey })(model);
}

export class AiSdkTextGenerator implements TextGenerationService {
	readonly modelId: string;
	private provider: AIProvider;
	private model: LanguageModel;
	private requestTimeoutMs: number;
	private progress?: PipelineProgress;

	constructor(config: AiSdkGeneratorConfig) {
		if (!config.apiKey) {
			throw new Error(`API key required for ${config.provider === "anthropic" ? "Anthropic" : "OpenAI"}`);
		}

		this.provider = config.provider;
		this.modelId = config.model;
		this.model = createLanguageModel(config.provider, config.model, config.apiKey);
		this.requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
		this.progress = config.progress;

		this.progress?.debug(`Text generator initialized`);
		this.progress?.debug(`Provider: ${this.provider}`);
		this.progress?.debug(`Model: ${this.modelId}`);
	}

	async generate(request: TextGenerationRequest): Promise<TextGenerationResponse> {
		const abortController = new AbortController();
		const timeoutId = setTimeout(() => {
			abortController.abort();
		}, this.requestTimeoutMs);
		const onJobAbort = (): void => abortController.abort();
		request.signal?.addEventListener("abort", onJobAbort, { once: true });
		if (request.signal?.aborted) {
			abortController.abort();
		}

		const startTime = Date.now();

		try {
			this.progress?.debug(`Prompt length: ${request.prompt.length} characters`);

			const { text, usage, response } = await generateText({
				model: this.model,
				system: request.system,
				prompt: request.prompt,
				temperature: request.temperature,
				maxOutputTokens: request.maxOutputTokens,
				// a failed call fails the stage; nothing is retried
				maxRetries: 0,
				abortSignal: abortController.signal,
			});

			this.progress?.debug(`Response received in ${Date.now() - startTime}ms`);

			return {
				text,
				modelId: response.modelId || this.modelId,
				inputTokens: usage.inputTokens ?? 0,
				outputTokens: usage.outputTokens ?? 0,
			};
		} catch (error: unknown) {
			if (error instanceof Error && error.name === "AbortError" && !request.signal?.aborted) {
				throw new Error(`Request timed out after ${Math.round(this.requestTimeoutMs / 1000)}s`, { cause: error });
			}
			throw error;
		} finally {
			clearTimeout(timeoutId);
			request.signal?.removeEventListener("abort", onJobAbort);
		}
	}
}
