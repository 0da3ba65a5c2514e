import { describe, it, expect } from "vitest";
import {
	AudioNotFoundError,
	ConfigurationError,
	ExternalToolError,
	InvalidArtifactError,
	MissingArtifactError,
	MissingPrerequisitesError,
	PipelineError,
	PipelineInterruptedError,
	PreconditionError,
	VideoNotFoundError,
	formatError,
	wrapError,
} from "../src/pipeline-errors.js";

describe("PipelineError", () => {
	it("should number the stage it failed in", () => {
		expect(new PipelineError("boom", "unexpected", { stage: "extraction" }).stageNumber).toBe(1);
		expect(new PipelineError("boom", "unexpected", { stage: "summarization" }).stageNumber).toBe(3);
		expect(new PipelineError("boom", "unexpected").stageNumber).toBeUndefined();
	});

	it("should format the stage header, message and suggestions", () => {
		const error = new ExternalToolError("ffmpeg", "Invalid data found when processing input", {
			stage: "extraction",
			suggestions: ["Check the video file is not corrupted"],
		});

		const formatted = error.getFormattedMessage();

		expect(formatted).toContain("❌ Audio extraction failed (Stage 1/3)");
		expect(formatted).toContain("Error: ffmpeg failed: Invalid data found when processing input");
		expect(formatted).toContain("Try one of these:");
		expect(formatted).toContain("  Check the video file is not corrupted");
	});

	it("should fall back to the kind label without a stage", () => {
		expect(new ConfigurationError("bad value").getFormattedMessage()).toContain("❌ Invalid configuration");
	});
});

describe("precondition errors", () => {
	it("should carry the missing path and stage", () => {
		const video = new VideoNotFoundError("/videos/missing.mkv");
		const audio = new AudioNotFoundError("/out/missing_audio.wav");

		expect(video).toBeInstanceOf(PreconditionError);
		expect(video).toMatchObject({ kind: "precondition", stage: "extraction", filePath: "/videos/missing.mkv" });
		expect(video.message).toBe("Video file not found: /videos/missing.mkv");
		expect(audio).toMatchObject({ kind: "precondition", stage: "transcription", filePath: "/out/missing_audio.wav" });
	});

	it("should name the flag for a missing skipped artifact", () => {
		const error = new MissingArtifactError("transcription", "/out/a_transcript.json", "--skip-transcription");

		expect(error.message).toBe("--skip-transcription was given but /out/a_transcript.json does not exist");
		expect(error.suggestions).toEqual(["Run without --skip-transcription to produce it"]);
	});

	it("should keep the cause of an unreadable artifact", () => {
		const cause = new Error("Unexpected token");
		const error = new InvalidArtifactError("/out/a_summary.json", "summarization", cause);

		expect(error.cause).toBe(cause);
		expect(error.message).toBe("Could not read /out/a_summary.json: Unexpected token");
	});
});

describe("ExternalToolError", () => {
	it("should keep the diagnostics verbatim and trim only the message", () => {
		const error = new ExternalToolError("ffmpeg", "standup.mkv: Invalid data found when processing input\n");

		expect(error.diagnostics).toBe("standup.mkv: Invalid data found when processing input\n");
		expect(error.message).toBe("ffmpeg failed: standup.mkv: Invalid data found when processing input");
	});
});

describe("MissingPrerequisitesError", () => {
	it("should list every issue", () => {
		const error = new MissingPrerequisitesError(["ffmpeg is not installed", "KEY not set"]);

		const formatted = error.getFormattedMessage();

		expect(error.kind).toBe("missing-prerequisite");
		expect(formatted).toContain("❌ Missing requirements:");
		expect(formatted).toContain("   - ffmpeg is not installed");
		expect(formatted).toContain("   - KEY not set");
	});
});

describe("wrapError", () => {
	it("should pass pipeline errors through", () => {
		const error = new PipelineInterruptedError("transcription");
		expect(wrapError(error, "summarization")).toBe(error);
	});

	it("should treat abort errors as interruption", () => {
		const abort = new Error("This operation was aborted");
		abort.name = "AbortError";

		expect(wrapError(abort, "summarization")).toMatchObject({ kind: "interrupted", stage: "summarization" });
	});

	it("should attribute summarization failures to text generation", () => {
		const wrapped = wrapError(new Error("401 Unauthorized: invalid API key"), "summarization");

		expect(wrapped).toBeInstanceOf(ExternalToolError);
		expect(wrapped.message).toBe("Text generation failed: 401 Unauthorized: invalid API key");
		expect(wrapped.suggestions).toEqual(["Check the API key for the selected provider"]);
	});

	it("should mark anything else as unexpected", () => {
		const wrapped = wrapError("plain string", "extraction");

		expect(wrapped).toMatchObject({ kind: "unexpected", stage: "extraction", message: "plain string" });
	});
});

describe("formatError", () => {
	it("should format unknown errors plainly", () => {
		expect(formatError(new Error("disk full"))).toContain("❌ Error: disk full");
	});
});
