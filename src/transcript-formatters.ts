import fs from "node:fs/promises";
import path from "node:path";
import type { TranscriptArtifacts } from "./artifact-locator.js";
import { InvalidArtifactError } from "./pipeline-errors.js";
import {
	TranscriptRecordSchema,
	type TranscriptRecord,
	type TranscriptSegment,
} from "./pipeline-schemas.js";

function pad(value: number, width: number): string {
	return value.toString().padStart(width, "0");
}

/**
 * Seconds to `HH:MM:SS,mmm`. Milliseconds are truncated, never rounded.
 */
export function formatSrtTimestamp(seconds: number): string {
	// epsilon keeps values such as 1.005 from flooring to 1004ms
	const totalMs = Math.floor(Math.max(0, seconds) * 1000 + 1e-6);
	const hours = Math.floor(totalMs / 3_600_000);
	const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
	const secs = Math.floor((totalMs % 60_000) / 1000);
	const millis = totalMs % 1000;
	return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(secs, 2)},${pad(millis, 3)}`;
}

export function formatAsSrt(segments: TranscriptSegment[]): string {
	return segments
		.map(
			(segment, i) =>
				`${i + 1}\n${formatSrtTimestamp(segment.start)} --> ${formatSrtTimestamp(segment.end)}\n${segment.text}\n\n`
		)
		.join("");
}

export function formatAsText(transcript: TranscriptRecord): string {
	return transcript.full_transcript;
}

export function formatAsJson(transcript: TranscriptRecord, indent = 2): string {
	return JSON.stringify(transcript, null, indent);
}

export async function saveTranscript(
	transcript: TranscriptRecord,
	artifacts: TranscriptArtifacts
): Promise<void> {
	await fs.mkdir(path.dirname(artifacts.json), { recursive: true });
	await fs.writeFile(artifacts.json, formatAsJson(transcript), "utf8");
	await fs.writeFile(artifacts.txt, formatAsText(transcript), "utf8");
	await fs.writeFile(artifacts.srt, formatAsSrt(transcript.segments), "utf8");
}

export async function loadTranscript(jsonPath: string): Promise<TranscriptRecord> {
	try {
		const content = await fs.readFile(jsonPath, "utf8");
		return TranscriptRecordSchema.parse(JSON.parse(content));
	} catch (error: unknown) {
		throw new InvalidArtifactError(
			jsonPath,
			"transcription",
			error instanceof Error ? error : new Error(String(error))
		);
	}
}
