import fs from "node:fs/promises";
import path from "node:path";

export type ArtifactStage = "audio" | "transcript" | "summary";

export interface AudioArtifacts {
	wav: string;
}

export interface TranscriptArtifacts {
	json: string;
	txt: string;
	srt: string;
}

export interface SummaryArtifacts {
	json: string;
	md: string;
}

export interface ArtifactPaths {
	audio: AudioArtifacts;
	transcript: TranscriptArtifacts;
	summary: SummaryArtifacts;
}

export interface GeneratedFile {
	name: string;
	path: string;
	sizeBytes: number;
}

/**
 * Canonical artifact paths for an output base. Pure string arithmetic: the
 * same base always yields the same paths and nothing touches the disk.
 */
export function locate<S extends ArtifactStage>(outputBase: string, stage: S): ArtifactPaths[S];
export function locate(outputBase: string, stage: ArtifactStage): ArtifactPaths[ArtifactStage] {
	switch (stage) {
		case "audio":
			return { wav: `${outputBase}_audio.wav` };
		case "transcript":
			return {
				json: `${outputBase}_transcript.json`,
				txt: `${outputBase}_transcript.txt`,
				srt: `${outputBase}_transcript.srt`,
			};
		case "summary":
			return {
				json: `${outputBase}_summary.json`,
				md: `${outputBase}_summary.md`,
			};
	}
}

export function locateAll(outputBase: string): ArtifactPaths {
	return {
		audio: locate(outputBase, "audio"),
		transcript: locate(outputBase, "transcript"),
		summary: locate(outputBase, "summary"),
	};
}

export async function exists(filePath: string): Promise<boolean> {
	try {
		await fs.access(filePath);
		return true;
	} catch {
		return false;
	}
}

/**
 * Every file in the output directory whose name starts with the base name,
 * sorted by name.
 */
export async function listGeneratedFiles(outputBase: string): Promise<GeneratedFile[]> {
	const dir = path.dirname(outputBase);
	const prefix = path.basename(outputBase);

	let entries: string[];
	try {
		entries = await fs.readdir(dir);
	} catch {
		return [];
	}

	const files: GeneratedFile[] = [];
	for (const name of entries.filter((entry) => entry.startsWith(prefix)).sort()) {
		const filePath = path.join(dir, name);
		const stat = await fs.stat(filePath);
		if (stat.isFile()) {
			files.push({ name, path: filePath, sizeBytes: stat.size });
		}
	}

	return files;
}

export function formatFileSize(bytes: number): string {
	if (bytes >= 1024 * 1024) {
		return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
	}
	if (bytes >= 1024) {
		return `${(bytes / 1024).toFixed(1)} KB`;
	}
	return `${bytes} bytes`;
}
