import fs from "node:fs";
import path from "node:path";
import { InputError, errorMessage } from "../core/errors.js";
import { workspaceRootFor } from "../utils/paths.js";
import type { ExecOptions } from "./dependencies.js";
import { runDefinitionFile } from "./run.js";

export const DEFAULT_DEFINITION_FILE = ".localflow.yml";
export const DEFINITION_SUFFIX = ".yml";

export type FileResult = {
	file: string;
	error?: Error;
};

export type ScanReport = {
	files: FileResult[];
	failed: number;
};

export type ExecResult = { mode: "file"; file: string } | { mode: "directory"; report: ScanReport };

/**
 * Runs a single definition file, or every definition below a directory. A
 * missing input falls back to the default file in `cwd`.
 */
export async function execPath(
	input: string | undefined,
	options: ExecOptions,
	cwd = process.cwd(),
): Promise<ExecResult> {
	const target = path.resolve(cwd, input ?? DEFAULT_DEFINITION_FILE);

	let stat: fs.Stats;
	try {
		stat = fs.statSync(target);
	} catch (error) {
		throw new InputError(`Cannot access ${target}: ${errorMessage(error)}`, { cause: error });
	}

	if (stat.isDirectory()) {
		return { mode: "directory", report: await execDir(target, options) };
	}
	await execFile(target, options);
	return { mode: "file", file: target };
}

export async function execFile(file: string, options: ExecOptions): Promise<void> {
	await runDefinitionFile(file, workspaceRootFor(file), options);
}

/**
 * Runs every definition below `dir` in lexical order. A failing file is
 * reported and recorded, and the scan moves on.
 */
export async function execDir(dir: string, options: ExecOptions): Promise<ScanReport> {
	const workspaceRoot = workspaceRootFor(dir);
	const { output } = options.deps;
	const files: FileResult[] = [];

	for (const file of walkDefinitionFiles(dir)) {
		output.print(`# ${path.basename(file)}`);
		try {
			await runDefinitionFile(file, workspaceRoot, options);
			files.push({ file });
		} catch (error) {
			const failure = error instanceof Error ? error : new Error(String(error));
			output.error(`${path.basename(file)}: ${failure.message}`);
			files.push({ file, error: failure });
		}
		output.print("");
	}

	return { files, failed: files.filter((result) => result.error).length };
}

export function* walkDefinitionFiles(dir: string, suffix = DEFINITION_SUFFIX): Generator<string> {
	const entries = fs
		.readdirSync(dir, { withFileTypes: true })
		.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

	for (const entry of entries) {
		const fullPath = path.join(dir, entry.name);
		if (entry.isDirectory()) {
			yield* walkDefinitionFiles(fullPath, suffix);
		} else if (entry.isFile() && entry.name.endsWith(suffix)) {
			yield fullPath;
		}
	}
}
