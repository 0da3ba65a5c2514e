import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { ExternalToolError, PipelineInterruptedError, type PipelineStageName } from "./pipeline-errors.js";

const execFileAsync = promisify(execFile);

export interface CommandResult {
	stdout: string;
	stderr: string;
}

export interface RunCommandOptions {
	signal?: AbortSignal;
	stage?: PipelineStageName;
}

export type CommandRunner = (
	command: string,
	args: string[],
	options?: RunCommandOptions
) => Promise<CommandResult>;

interface ExecFailure {
	code?: number | string;
	stderr?: string;
}

function asExecFailure(error: unknown): ExecFailure {
	if (typeof error !== "object" || error === null) {
		return {};
	}
	const code = "code" in error && (typeof error.code === "number" || typeof error.code === "string") ? error.code : undefined;
	const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr : undefined;
	return { code, stderr };
}

/**
 * Run a binary without a shell. Nonzero exits carry the tool's stderr
 * verbatim in `diagnostics`.
 */
export const runCommand: CommandRunner = async (command, args, options = {}) => {
	try {
		const { stdout, stderr } = await execFileAsync(command, args, {
			signal: options.signal,
			encoding: "utf8",
			maxBuffer: 64 * 1024 * 1024,
		});
		return { stdout, stderr };
	} catch (error: unknown) {
		if (error instanceof Error && error.name === "AbortError") {
			throw new PipelineInterruptedError(options.stage);
		}

		const failure = asExecFailure(error);
		const cause = error instanceof Error ? error : undefined;

		if (failure.code === "ENOENT") {
			throw new ExternalToolError(command, `'${command}' was not found on your PATH`, {
				stage: options.stage,
				cause,
			});
		}

		const diagnostics = failure.stderr?.trim() ? failure.stderr : (cause?.message ?? String(error));
		throw new ExternalToolError(command, diagnostics, { stage: options.stage, cause });
	}
};

export async function isToolInstalled(
	command: string,
	versionArgs: string[] = ["-version"],
	runner: CommandRunner = runCommand
): Promise<boolean> {
	try {
		await runner(command, versionArgs);
		return true;
	} catch {
		return false;
	}
}
