import fs from "node:fs/promises";
import { InputError, MatrixError, errorMessage } from "../core/errors.js";
import { formatAxis } from "../core/metadata.js";
import type { MatrixAxis } from "../core/types.js";
import { execAxis } from "./axis.js";
import type { ExecOptions } from "./dependencies.js";

/**
 * Runs one definition file once per matrix axis, in expansion order. The
 * first failing axis stops the remaining ones.
 */
export async function runDefinitionFile(
	file: string,
	workspaceRoot: string,
	options: ExecOptions,
): Promise<void> {
	let raw: string;
	try {
		raw = await fs.readFile(file, "utf-8");
	} catch (error) {
		throw new InputError(`Cannot read ${file}: ${errorMessage(error)}`, { cause: error });
	}

	let axes: MatrixAxis[];
	try {
		axes = options.deps.parseMatrix(raw);
	} catch (error) {
		throw new MatrixError({ cause: error });
	}
	if (axes.length === 0) {
		axes = [{}];
	}

	for (const axis of axes) {
		if (axes.length > 1) {
			options.deps.output.info(`matrix ${formatAxis(axis)}`);
		}
		await execAxis(raw, file, workspaceRoot, axis, options);
	}
}
