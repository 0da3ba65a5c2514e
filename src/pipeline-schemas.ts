import { z } from "zod";

export const WHISPER_MODELS = ["tiny", "base", "small", "medium", "large-v2", "large-v3"] as const;

export const WhisperModelSchema = z.enum(WHISPER_MODELS);

export const WhisperDeviceSchema = z.enum(["auto", "cpu", "cuda"]);

export const TranscriptWordSchema = z.object({
	word: z.string().describe("Recognized word, including its leading space"),
	start: z.number().describe("Start time in seconds"),
	end: z.number().describe("End time in seconds"),
	probability: z.number().describe("Engine confidence between 0 and 1"),
});

export const TranscriptSegmentSchema = z.object({
	start: z.number(),
	end: z.number(),
	text: z.string(),
	words: z.array(TranscriptWordSchema),
});

export const TranscriptRecordSchema = z.object({
	language: z.string(),
	duration: z.number().describe("End time of the last segment, 0 without segments"),
	full_transcript: z.string(),
	segments: z.array(TranscriptSegmentSchema),
});

export const ActionItemSchema = z.object({
	task: z.string(),
	owner: z.string().nullish(),
	deadline: z.string().nullish(),
});

export const DecisionSchema = z.object({
	decision: z.string(),
	context: z.string().nullish(),
});

export const KeyDateSchema = z.object({
	date: z.string(),
	event: z.string(),
});

// A null or malformed list is dropped on its own; the other fields survive.
function salvagedList<T extends z.ZodTypeAny>(item: T) {
	return z
		.array(item)
		.nullish()
		.catch(undefined)
		.transform((value) => value ?? undefined);
}

export const StructuredDataSchema = z.object({
	action_items: salvagedList(ActionItemSchema),
	decisions: salvagedList(DecisionSchema),
	key_dates: salvagedList(KeyDateSchema),
	participants_mentioned: salvagedList(z.string()),
	technical_details: salvagedList(z.string()),
	open_questions: salvagedList(z.string()),
});

export const TokenUsageSchema = z.object({
	input: z.number(),
	output: z.number(),
});

export const SummaryRecordSchema = z.object({
	summary: z.string(),
	structured_data: StructuredDataSchema,
	model_used: z.string(),
	tokens_used: TokenUsageSchema,
});

// Raw JSON written by the whisper CLI with --output_format json
export const WhisperOutputWordSchema = z.object({
	word: z.string().default(""),
	start: z.number().default(0),
	end: z.number().default(0),
	probability: z.number().default(1),
});

export const WhisperOutputSegmentSchema = z.object({
	start: z.number(),
	end: z.number(),
	text: z.string(),
	words: z.array(WhisperOutputWordSchema).nullish(),
});

export const WhisperOutputSchema = z.object({
	text: z.string().optional(),
	language: z.string().nullish(),
	segments: z.array(WhisperOutputSegmentSchema),
});

export type WhisperModel = z.infer<typeof WhisperModelSchema>;
export type WhisperDevice = z.infer<typeof WhisperDeviceSchema>;

export type TranscriptWord = z.infer<typeof TranscriptWordSchema>;
export type TranscriptSegment = z.infer<typeof TranscriptSegmentSchema>;
export type TranscriptRecord = z.infer<typeof TranscriptRecordSchema>;

export type ActionItem = z.infer<typeof ActionItemSchema>;
export type Decision = z.infer<typeof DecisionSchema>;
export type KeyDate = z.infer<typeof KeyDateSchema>;
export type StructuredData = z.infer<typeof StructuredDataSchema>;
export type TokenUsage = z.infer<typeof TokenUsageSchema>;
export type SummaryRecord = z.infer<typeof SummaryRecordSchema>;

export type WhisperOutput = z.infer<typeof WhisperOutputSchema>;
export type WhisperOutputSegment = z.infer<typeof WhisperOutputSegmentSchema>;
