import { StructuredDataParseError } from "./pipeline-errors.js";
import { StructuredDataSchema, type StructuredData } from "./pipeline-schemas.js";

export type StructuredDataResult =
	| { ok: true; data: StructuredData }
	| { ok: false; error: StructuredDataParseError };

const FENCED_BLOCK = /```[\w-]*[^\S\n]*\n?([\s\S]*?)```/;
const OPENING_FENCE_ONLY = /^```[\w-]*[^\S\n]*\n?([\s\S]*)$/;

/**
 * Remove a Markdown code fence around the payload, tagged or not. Text with
 * no fence is returned trimmed.
 */
export function stripCodeFence(response: string): string {
	const trimmed = response.trim();

	const fenced = trimmed.match(FENCED_BLOCK);
	if (fenced) {
		return fenced[1].trim();
	}

	// a response cut off before its closing fence
	const opened = trimmed.match(OPENING_FENCE_ONLY);
	if (opened) {
		return opened[1].trim();
	}

	return trimmed;
}

export function parseStructuredData(response: string): StructuredDataResult {
	const payload = stripCodeFence(response);

	let json: unknown;
	try {
		json = JSON.parse(payload);
	} catch (error: unknown) {
		return {
			ok: false,
			error: new StructuredDataParseError(
				`Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
				response,
				{ cause: error instanceof Error ? error : undefined }
			),
		};
	}

	const parsed = StructuredDataSchema.safeParse(json);
	if (!parsed.success) {
		return {
			ok: false,
			error: new StructuredDataParseError(
				`Response does not match the expected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
				response
			),
		};
	}

	return { ok: true, data: parsed.data };
}

export function emptyStructuredData(): StructuredData {
	return {};
}
