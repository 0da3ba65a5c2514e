import type { PipelineProgress } from "./pipeline-progress.js";
import type { StructuredData, SummaryRecord } from "./pipeline-schemas.js";
import { emptyStructuredData, parseStructuredData } from "./structured-data-parser.js";
import type { TextGenerationResponse, TextGenerationService } from "./text-generator.js";

export interface SummarizationStage {
	summarize(fullTranscript: string, context: string | undefined, signal?: AbortSignal): Promise<SummaryRecord>;
}

export interface SummarizerConfig {
	narrativeMaxTokens?: number;
	extractionMaxTokens?: number;
	progress?: PipelineProgress;
}

export const NARRATIVE_SYSTEM_PROMPT = `You are an expert meeting analyst. Your task is to analyze meeting transcripts
and extract ALL important information without missing any details. You should be thorough and comprehensive.

Your analysis should include:
1. Executive Summary - Brief overview of the meeting
2. Key Discussion Points - All topics discussed with details
3. Decisions Made - Any decisions or conclusions reached
4. Action Items - Tasks, assignments, or next steps mentioned
5. Important Details - Specific numbers, dates, deadlines, names, or technical details
6. Questions Raised - Any open questions or concerns
7. Follow-up Needed - Items that need further discussion

Be meticulous and capture every important point, even minor details.`;

export function buildNarrativePrompt(transcript: string, context?: string): string {
	const parts: string[] = ["Please analyze this meeting transcript and provide a comprehensive summary."];

	if (context) {
		parts.push(`\nMeeting Context: ${context}`);
	}

	parts.push(`\nTranscript:\n${transcript}`);
	parts.push("\nProvide your analysis in a structured format with clear sections. Capture ALL details discussed.");

	return parts.join("\n");
}

export function buildExtractionPrompt(summary: string): string {
	return `Based on this meeting summary, extract structured data in JSON format.

Summary:
${summary}

Extract and format as JSON with these fields:
{
  "action_items": [
    {"task": "description", "owner": "person if mentioned", "deadline": "if mentioned"}
  ],
  "decisions": [
    {"decision": "what was decided", "context": "why/how"}
  ],
  "key_dates": [
    {"date": "date mentioned", "event": "what it's for"}
  ],
  "participants_mentioned": ["list of people mentioned"],
  "technical_details": ["specific technical points, numbers, or specifications"],
  "open_questions": ["any unresolved questions or concerns"]
}

Every field must be present. If a field has no data, use an empty array, never null.`;
}

/**
 * Two sequential generation calls: a narrative analysis of the transcript,
 * then a JSON extraction from that narrative. Only the first is fatal.
 */
export class MeetingSummarizer implements SummarizationStage {
	private generator: TextGenerationService;
	private narrativeMaxTokens: number;
	private extractionMaxTokens: number;
	private progress?: PipelineProgress;

	constructor(generator: TextGenerationService, config: SummarizerConfig = {}) {
		this.generator = generator;
		this.narrativeMaxTokens = config.narrativeMaxTokens ?? 4000;
		this.extractionMaxTokens = config.extractionMaxTokens ?? 2000;
		this.progress = config.progress;
	}

	async summarize(fullTranscript: string, context: string | undefined, signal?: AbortSignal): Promise<SummaryRecord> {
		this.progress?.start(`Analyzing transcript with ${this.generator.modelId}...`);

		let narrative: TextGenerationResponse;
		try {
			narrative = await this.generator.generate({
				system: NARRATIVE_SYSTEM_PROMPT,
				prompt: buildNarrativePrompt(fullTranscript, context),
				maxOutputTokens: this.narrativeMaxTokens,
				temperature: 0,
				signal,
			});
		} catch (error) {
			this.progress?.fail("Failed to generate summary");
			throw error;
		}

		this.progress?.succeed("Summary generated");
		this.progress?.info(`Tokens used: ${narrative.inputTokens} input, ${narrative.outputTokens} output`);

		const structuredData = await this.extractStructuredData(narrative.text, signal);

		return {
			summary: narrative.text,
			structured_data: structuredData,
			model_used: narrative.modelId,
			tokens_used: {
				input: narrative.inputTokens,
				output: narrative.outputTokens,
			},
		};
	}

	private async extractStructuredData(summary: string, signal?: AbortSignal): Promise<StructuredData> {
		this.progress?.start("Extracting structured data...");

		let responseText: string;
		try {
			const response = await this.generator.generate({
				prompt: buildExtractionPrompt(summary),
				maxOutputTokens: this.extractionMaxTokens,
				temperature: 0,
				signal,
			});
			responseText = response.text;
		} catch (error: unknown) {
			if (signal?.aborted) {
				throw error;
			}
			this.progress?.stop();
			this.progress?.warn(
				`Could not extract structured data: ${error instanceof Error ? error.message : String(error)}`
			);
			return emptyStructuredData();
		}

		const result = parseStructuredData(responseText);
		if (!result.ok) {
			this.progress?.stop();
			this.progress?.warn(`Could not extract structured data: ${result.error.message}`);
			return emptyStructuredData();
		}

		this.progress?.succeed("Structured data extracted");
		return result.data;
	}
}
