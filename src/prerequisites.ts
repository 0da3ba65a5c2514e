import { apiKeyEnvVar, type JobConfig } from "./pipeline-config.js";

export interface PrerequisiteChecks {
	isFfmpegInstalled: (ffmpegPath: string) => Promise<boolean>;
}

/**
 * Everything missing for the job, reported together. Only a job that skips
 * both extraction and summarization is exempt.
 */
export async function checkPrerequisites(
	config: Pick<JobConfig, "skipExtraction" | "skipSummary" | "ai" | "tools">,
	checks: PrerequisiteChecks
): Promise<string[]> {
	if (config.skipExtraction && config.skipSummary) {
		return [];
	}

	const issues: string[] = [];

	if (!(await checks.isFfmpegInstalled(config.tools.ffmpegPath))) {
		issues.push(`ffmpeg is not installed (looked for '${config.tools.ffmpegPath}'). Install it and make sure it is on your PATH`);
	}

	if (!config.ai.apiKey) {
		issues.push(`${apiKeyEnvVar(config.ai.provider)} not set in environment or .env file`);
	}

	return issues;
}
