import process from "node:process";
import { intro, log, outro } from "@clack/prompts";
import { loadConfig } from "../config/load-config.js";
import type { ExecConfig } from "../config/schema.js";
import { errorMessage, isCancellation } from "../core/errors.js";
import type { ExecDependencies } from "../exec/dependencies.js";
import { defaultDependencies } from "../exec/dependencies.js";
import { execPath } from "../exec/discovery.js";
import { parseArgs, printHelp, readPackageVersion } from "./args.js";

export async function runCli(
	argv: string[] = process.argv.slice(2),
	deps: ExecDependencies = defaultDependencies,
	cwd: string = process.cwd(),
): Promise<void> {
	const args = parseArgs(argv);
	if (args.help) {
		printHelp();
		return;
	}
	if (args.version) {
		process.stdout.write(`localflow ${readPackageVersion()}\n`);
		return;
	}
	if (args.unknown.length) {
		process.stderr.write(`Unknown option(s): ${args.unknown.join(", ")}\n`);
		process.stderr.write("Run `localflow --help` for usage.\n");
		process.exitCode = 2;
		return;
	}
	if (args.errors.length) {
		process.stderr.write(`${args.errors.join("\n")}\n`);
		process.exitCode = 2;
		return;
	}

	let config: ExecConfig;
	try {
		config = loadConfig(cwd, args.overrides).config;
	} catch (error) {
		process.stderr.write(`${errorMessage(error)}\n`);
		process.exitCode = 2;
		return;
	}

	intro("localflow");
	try {
		const result = await execPath(args.path, { config, deps }, cwd);
		if (result.mode === "directory") {
			const { files, failed } = result.report;
			outro(`${files.length} definition(s), ${failed} failed`);
		} else {
			outro("Pipeline finished");
		}
	} catch (error) {
		log.error(errorMessage(error));
		process.exitCode = isCancellation(error) ? 130 : 1;
	}
}
