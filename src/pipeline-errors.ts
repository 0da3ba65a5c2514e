import chalk from "chalk";

export type PipelineStageName = "extraction" | "transcription" | "summarization";

export const STAGE_NUMBERS: Record<PipelineStageName, number> = {
	extraction: 1,
	transcription: 2,
	summarization: 3,
};

export const TOTAL_STAGES = 3;

export type PipelineErrorKind =
	| "precondition"
	| "missing-prerequisite"
	| "external-failure"
	| "partial-parse"
	| "interrupted"
	| "configuration"
	| "unexpected";

export interface PipelineErrorOptions {
	stage?: PipelineStageName;
	cause?: Error;
	suggestions?: string[];
}

export class PipelineError extends Error {
	readonly kind: PipelineErrorKind;
	readonly stage?: PipelineStageName;
	readonly cause?: Error;
	readonly suggestions: string[];

	constructor(message: string, kind: PipelineErrorKind, options: PipelineErrorOptions = {}) {
		super(message);
		this.name = "PipelineError";
		this.kind = kind;
		this.stage = options.stage;
		this.cause = options.cause;
		this.suggestions = options.suggestions ?? [];

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, PipelineError);
		}
	}

	get stageNumber(): number | undefined {
		return this.stage ? STAGE_NUMBERS[this.stage] : undefined;
	}

	getFormattedMessage(): string {
		const lines: string[] = [];

		if (this.stage) {
			lines.push(chalk.red(`❌ ${STAGE_LABELS[this.stage]} failed (Stage ${this.stageNumber}/${TOTAL_STAGES})`));
		} else {
			lines.push(chalk.red(`❌ ${KIND_LABELS[this.kind]}`));
		}
		lines.push("");
		lines.push(chalk.white(`Error: ${this.message}`));

		if (this.suggestions.length > 0) {
			lines.push("");
			lines.push(chalk.yellow("Try one of these:"));
			for (const suggestion of this.suggestions) {
				lines.push(chalk.cyan(`  ${suggestion}`));
			}
		}

		return lines.join("\n");
	}
}

const STAGE_LABELS: Record<PipelineStageName, string> = {
	extraction: "Audio extraction",
	transcription: "Transcription",
	summarization: "Summarization",
};

const KIND_LABELS: Record<PipelineErrorKind, string> = {
	precondition: "Missing input",
	"missing-prerequisite": "Missing requirements",
	"external-failure": "External tool failed",
	"partial-parse": "Could not parse response",
	interrupted: "Process interrupted by user",
	configuration: "Invalid configuration",
	unexpected: "Unexpected error",
};

/**
 * An input file a stage needs is absent or unreadable. Raised before any
 * external collaborator is invoked.
 */
export class PreconditionError extends PipelineError {
	readonly filePath: string;

	constructor(message: string, filePath: string, options: PipelineErrorOptions = {}) {
		super(message, "precondition", options);
		this.name = "PreconditionError";
		this.filePath = filePath;
	}
}

export class VideoNotFoundError extends PreconditionError {
	constructor(videoPath: string) {
		super(`Video file not found: ${videoPath}`, videoPath, {
			stage: "extraction",
			suggestions: ["Check the video path is correct", "--skip-extraction (if the audio file already exists)"],
		});
		this.name = "VideoNotFoundError";
	}
}

export class AudioNotFoundError extends PreconditionError {
	constructor(audioPath: string) {
		super(`Audio file not found: ${audioPath}`, audioPath, {
			stage: "transcription",
			suggestions: ["Run without --skip-extraction to extract the audio first"],
		});
		this.name = "AudioNotFoundError";
	}
}

export class MissingArtifactError extends PreconditionError {
	constructor(stage: PipelineStageName, artifactPath: string, flag: string) {
		super(`${flag} was given but ${artifactPath} does not exist`, artifactPath, {
			stage,
			suggestions: [`Run without ${flag} to produce it`],
		});
		this.name = "MissingArtifactError";
	}
}

export class InvalidArtifactError extends PreconditionError {
	constructor(artifactPath: string, stage: PipelineStageName, cause?: Error) {
		super(`Could not read ${artifactPath}: ${cause?.message ?? "invalid content"}`, artifactPath, {
			stage,
			cause,
			suggestions: ["--force (re-run the stage and overwrite the file)"],
		});
		this.name = "InvalidArtifactError";
	}
}

export class MissingPrerequisitesError extends PipelineError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(issues.join("; "), "missing-prerequisite", {
			suggestions: ["Install ffmpeg and make sure it is on your PATH", "Set the API key in your environment or .env file"],
		});
		this.name = "MissingPrerequisitesError";
		this.issues = issues;
	}

	override getFormattedMessage(): string {
		const lines = [chalk.red("❌ Missing requirements:")];
		for (const issue of this.issues) {
			lines.push(chalk.red(`   - ${issue}`));
		}
		return lines.join("\n");
	}
}

export class ExternalToolError extends PipelineError {
	readonly tool: string;
	readonly diagnostics: string;

	constructor(tool: string, diagnostics: string, options: PipelineErrorOptions = {}) {
		super(`${tool} failed: ${diagnostics.trim()}`, "external-failure", options);
		this.name = "ExternalToolError";
		this.tool = tool;
		this.diagnostics = diagnostics;
	}
}

export class StructuredDataParseError extends PipelineError {
	readonly rawResponse: string;

	constructor(message: string, rawResponse: string, options: { cause?: Error } = {}) {
		super(message, "partial-parse", { stage: "summarization", cause: options.cause });
		this.name = "StructuredDataParseError";
		this.rawResponse = rawResponse;
	}
}

export class PipelineInterruptedError extends PipelineError {
	constructor(stage?: PipelineStageName) {
		super("Process interrupted by user", "interrupted", { stage });
		this.name = "PipelineInterruptedError";
	}
}

export class ConfigurationError extends PipelineError {
	constructor(message: string, suggestions: string[] = []) {
		super(message, "configuration", { suggestions });
		this.name = "ConfigurationError";
	}
}

export function isAbortError(error: unknown): boolean {
	return error instanceof Error && error.name === "AbortError";
}

export function wrapError(error: unknown, stage?: PipelineStageName): PipelineError {
	if (error instanceof PipelineError) {
		return error;
	}

	if (isAbortError(error)) {
		return new PipelineInterruptedError(stage);
	}

	const originalError = error instanceof Error ? error : new Error(String(error));
	const message = originalError.message || "Unknown error";

	if (stage === "summarization") {
		const suggestions: string[] = [];
		if (message.includes("API key") || message.includes("401")) {
			suggestions.push("Check the API key for the selected provider");
		}
		if (message.includes("rate limit") || message.includes("429")) {
			suggestions.push("Wait a few minutes and try again");
		}
		return new ExternalToolError("Text generation", message, {
			stage,
			cause: originalError,
			suggestions,
		});
	}

	return new PipelineError(message, "unexpected", { stage, cause: originalError });
}

export function formatError(error: unknown): string {
	if (error instanceof PipelineError) {
		return error.getFormattedMessage();
	}

	const message = error instanceof Error ? error.message : String(error);
	return chalk.red(`❌ Error: ${message}`);
}
