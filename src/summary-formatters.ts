import fs from "node:fs/promises";
import path from "node:path";
import type { SummaryArtifacts } from "./artifact-locator.js";
import { InvalidArtifactError } from "./pipeline-errors.js";
import {
	SummaryRecordSchema,
	type StructuredData,
	type SummaryRecord,
} from "./pipeline-schemas.js";

export function formatSummaryAsMarkdown(record: SummaryRecord): string {
	const lines: string[] = [];

	lines.push("# Meeting Summary");
	lines.push("");
	lines.push(record.summary);
	lines.push("");
	lines.push("---");
	lines.push("");
	lines.push("## Structured Data");
	lines.push("");

	lines.push(...formatActionItems(record.structured_data));
	lines.push(...formatDecisions(record.structured_data));
	lines.push(...formatKeyDates(record.structured_data));
	lines.push(...formatBulletSection("Open Questions", record.structured_data.open_questions));
	lines.push(...formatBulletSection("Technical Details", record.structured_data.technical_details));

	lines.push(...formatMetadata(record));

	return lines.join("\n");
}

function formatActionItems(data: StructuredData): string[] {
	if (!data.action_items?.length) return [];

	const lines: string[] = ["### Action Items", ""];
	for (const item of data.action_items) {
		const owner = item.owner ? ` (${item.owner})` : "";
		const deadline = item.deadline ? ` - Due: ${item.deadline}` : "";
		lines.push(`- ${item.task}${owner}${deadline}`);
	}
	lines.push("");

	return lines;
}

function formatDecisions(data: StructuredData): string[] {
	if (!data.decisions?.length) return [];

	const lines: string[] = ["### Decisions Made", ""];
	for (const decision of data.decisions) {
		lines.push(`- **${decision.decision}**`);
		if (decision.context) {
			lines.push(`  - ${decision.context}`);
		}
	}
	lines.push("");

	return lines;
}

function formatKeyDates(data: StructuredData): string[] {
	if (!data.key_dates?.length) return [];

	const lines: string[] = ["### Key Dates", ""];
	for (const entry of data.key_dates) {
		lines.push(`- ${entry.date}: ${entry.event}`);
	}
	lines.push("");

	return lines;
}

function formatBulletSection(title: string, items: string[] | undefined): string[] {
	if (!items?.length) return [];

	return [`### ${title}`, "", ...items.map((item) => `- ${item}`), ""];
}

function formatMetadata(record: SummaryRecord): string[] {
	return [
		"",
		"---",
		"",
		"## Analysis Metadata",
		"",
		`- Model: ${record.model_used}`,
		`- Tokens: ${record.tokens_used.input} input, ${record.tokens_used.output} output`,
		"",
	];
}

export function formatSummaryAsJson(record: SummaryRecord, indent = 2): string {
	return JSON.stringify(record, null, indent);
}

export async function saveSummary(record: SummaryRecord, artifacts: SummaryArtifacts): Promise<void> {
	await fs.mkdir(path.dirname(artifacts.json), { recursive: true });
	await fs.writeFile(artifacts.json, formatSummaryAsJson(record), "utf8");
	await fs.writeFile(artifacts.md, formatSummaryAsMarkdown(record), "utf8");
}

export async function loadSummary(jsonPath: string): Promise<SummaryRecord> {
	try {
		const content = await fs.readFile(jsonPath, "utf8");
		return SummaryRecordSchema.parse(JSON.parse(content));
	} catch (error: unknown) {
		throw new InvalidArtifactError(
			jsonPath,
			"summarization",
			error instanceof Error ? error : new Error(String(error))
		);
	}
}
