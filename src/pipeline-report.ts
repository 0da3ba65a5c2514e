import { formatFileSize } from "./artifact-locator.js";
import type { PipelineResult, StageResolution } from "./pipeline.js";
import { formatDuration } from "./pipeline-progress.js";

const RESOLUTION_LABELS: Record<StageResolution, string> = {
	ran: "ran",
	reused: "reused existing output",
	skipped: "skipped",
};

export function formatStageLine(result: PipelineResult): string {
	const { extraction, transcription, summarization } = result.stages;
	return `Stages: extraction ${RESOLUTION_LABELS[extraction]}, transcription ${RESOLUTION_LABELS[transcription]}, summarization ${RESOLUTION_LABELS[summarization]}`;
}

/**
 * Plain-text completion report; the CLI adds colour.
 */
export function formatCompletionReport(result: PipelineResult): string[] {
	const lines: string[] = [];

	lines.push("✨ Processing Complete!");
	lines.push(`⏱️  Total time: ${formatDuration(result.elapsedMs)}`);
	lines.push(formatStageLine(result));
	lines.push("");
	lines.push("📄 Generated files:");

	for (const file of result.files) {
		lines.push(`   - ${file.name} (${formatFileSize(file.sizeBytes)})`);
	}

	if (result.summary) {
		lines.push("");
		lines.push(`📖 View the summary: ${result.artifacts.summary.md}`);
	}

	return lines;
}
