import fs from "node:fs";
import { z } from "zod";

const PackageJsonSchema = z.object({ version: z.string().optional() }).passthrough();

export type CliOptions = {
	command: "exec";
	path?: string;
	overrides: Record<string, unknown>;
	help?: boolean;
	version?: boolean;
	unknown: string[];
	errors: string[];
};

type FlagKind = "string" | "int" | "list";

type FlagDef = {
	kind: FlagKind;
	path: string[];
};

function buildFlags(prefix: string, key: string, withParent: boolean): Record<string, FlagDef> {
	const flags: Record<string, FlagDef> = {
		[`--${prefix}build-number`]: { kind: "int", path: [key, "number"] },
		[`--${prefix}build-created`]: { kind: "int", path: [key, "created"] },
		[`--${prefix}build-started`]: { kind: "int", path: [key, "started"] },
		[`--${prefix}build-finished`]: { kind: "int", path: [key, "finished"] },
		[`--${prefix}build-status`]: { kind: "string", path: [key, "status"] },
		[`--${prefix}build-event`]: { kind: "string", path: [key, "event"] },
		[`--${prefix}build-link`]: { kind: "string", path: [key, "link"] },
		[`--${prefix}commit-sha`]: { kind: "string", path: [key, "commit", "sha"] },
		[`--${prefix}commit-ref`]: { kind: "string", path: [key, "commit", "ref"] },
		[`--${prefix}commit-refspec`]: { kind: "string", path: [key, "commit", "refspec"] },
		[`--${prefix}commit-branch`]: { kind: "string", path: [key, "commit", "branch"] },
		[`--${prefix}commit-message`]: { kind: "string", path: [key, "commit", "message"] },
		[`--${prefix}commit-author-name`]: { kind: "string", path: [key, "commit", "author", "name"] },
		[`--${prefix}commit-author-email`]: { kind: "string", path: [key, "commit", "author", "email"] },
		[`--${prefix}commit-author-avatar`]: { kind: "string", path: [key, "commit", "author", "avatar"] },
	};
	if (withParent) {
		flags["--parent-build-number"] = { kind: "int", path: [key, "parent"] };
		flags["--build-target"] = { kind: "string", path: [key, "target"] };
	}
	return flags;
}

const FLAGS: Record<string, FlagDef> = {
	"--repo-name": { kind: "string", path: ["repo", "name"] },
	"--repo-link": { kind: "string", path: ["repo", "link"] },
	"--repo-remote-url": { kind: "string", path: ["repo", "remote"] },
	...buildFlags("", "build", true),
	...buildFlags("prev-", "prev", false),
	"--job-number": { kind: "int", path: ["job", "number"] },
	"--system-name": { kind: "string", path: ["system", "name"] },
	"--system-link": { kind: "string", path: ["system", "link"] },
	"--system-arch": { kind: "string", path: ["system", "arch"] },
	"--timeout": { kind: "string", path: ["timeout"] },
	"--backend": { kind: "string", path: ["backend"] },
	"--volume": { kind: "list", path: ["volumes"] },
	"--privileged": { kind: "list", path: ["privileged"] },
	"--network": { kind: "list", path: ["networks"] },
	"--prefix": { kind: "string", path: ["prefix"] },
	"--netrc-username": { kind: "string", path: ["netrc", "username"] },
	"--netrc-password": { kind: "string", path: ["netrc", "password"] },
	"--netrc-machine": { kind: "string", path: ["netrc", "machine"] },
	"--env": { kind: "list", path: ["env"] },
	"--workspace-base": { kind: "string", path: ["workspace", "base"] },
	"--workspace-path": { kind: "string", path: ["workspace", "path"] },
};

const SWITCHES: Record<string, { path: string[]; value: boolean }> = {
	"--repo-private": { path: ["repo", "private"], value: true },
	"--local": { path: ["local"], value: true },
	"--no-local": { path: ["local"], value: false },
	"--no-proxy": { path: ["proxy"], value: false },
};

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = { command: "exec", overrides: {}, unknown: [], errors: [] };
	const args = [...argv];
	if (args[0] === "exec") {
		args.shift();
	}

	while (args.length) {
		const arg = args.shift();
		if (arg === undefined) {
			break;
		}
		if (arg === "--help" || arg === "-h") {
			options.help = true;
			continue;
		}
		if (arg === "--version" || arg === "-v") {
			options.version = true;
			continue;
		}

		const toggle = SWITCHES[arg];
		if (toggle) {
			setIn(options.overrides, toggle.path, toggle.value);
			continue;
		}

		const def = FLAGS[arg];
		if (def) {
			const value = takeValue(arg, args, options);
			if (value !== undefined) {
				applyFlag(arg, def, value, options);
			}
			continue;
		}

		if (!arg.startsWith("-") && options.path === undefined) {
			options.path = arg;
			continue;
		}
		options.unknown.push(arg);
	}

	return options;
}

function applyFlag(flag: string, def: FlagDef, value: string, options: CliOptions): void {
	switch (def.kind) {
		case "string":
			setIn(options.overrides, def.path, value);
			return;
		case "int": {
			const parsed = Number(value);
			if (!Number.isInteger(parsed)) {
				options.errors.push(`Invalid value for ${flag}: ${value} (expected an integer)`);
				return;
			}
			setIn(options.overrides, def.path, parsed);
			return;
		}
		case "list": {
			const current = getIn(options.overrides, def.path);
			setIn(options.overrides, def.path, [...(Array.isArray(current) ? current : []), value]);
			return;
		}
	}
}

function setIn(target: Record<string, unknown>, keys: string[], value: unknown): void {
	let node = target;
	for (const key of keys.slice(0, -1)) {
		const next = node[key];
		if (isRecord(next)) {
			node = next;
		} else {
			const created: Record<string, unknown> = {};
			node[key] = created;
			node = created;
		}
	}
	node[keys[keys.length - 1]] = value;
}

function getIn(target: Record<string, unknown>, keys: string[]): unknown {
	let node: unknown = target;
	for (const key of keys) {
		if (!isRecord(node)) {
			return undefined;
		}
		node = node[key];
	}
	return node;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function printHelp(): void {
	process.stdout.write(`localflow exec [path] [options]\n\n`);
	process.stdout.write(`Runs a pipeline definition (default .localflow.yml) or every .yml below a directory.\n\n`);
	process.stdout.write(`Options:\n`);
	process.stdout.write(`  --backend <name>          Backend: auto-detect, docker, local\n`);
	process.stdout.write(`  --timeout <duration>      Pipeline timeout (e.g. 30m, 1h)\n`);
	process.stdout.write(`  --local, --no-local       Mount the local workspace instead of cloning\n`);
	process.stdout.write(`  --volume <src:dst>        Extra volume (repeatable)\n`);
	process.stdout.write(`  --privileged <image>      Image allowed to run privileged (repeatable)\n`);
	process.stdout.write(`  --network <name>          Extra network (repeatable)\n`);
	process.stdout.write(`  --prefix <name>           Prefix for containers, volumes and networks\n`);
	process.stdout.write(`  --env <KEY=VALUE>         Extra step environment (repeatable)\n`);
	process.stdout.write(`  --workspace-base <path>   Default workspace base\n`);
	process.stdout.write(`  --workspace-path <path>   Default workspace path\n`);
	process.stdout.write(`  --netrc-username <user>   Clone credentials\n`);
	process.stdout.write(`  --netrc-password <pass>\n`);
	process.stdout.write(`  --netrc-machine <host>\n`);
	process.stdout.write(`  --no-proxy                Do not pass host proxy variables to steps\n`);
	process.stdout.write(`  -h, --help                Show help\n`);
	process.stdout.write(`  -v, --version             Show version\n\n`);
	process.stdout.write(`Build metadata:\n`);
	process.stdout.write(`  --repo-name, --repo-link, --repo-remote-url, --repo-private\n`);
	process.stdout.write(`  --build-number, --parent-build-number, --build-created, --build-started,\n`);
	process.stdout.write(`  --build-finished, --build-status, --build-event, --build-link, --build-target\n`);
	process.stdout.write(`  --commit-sha, --commit-ref, --commit-refspec, --commit-branch, --commit-message,\n`);
	process.stdout.write(`  --commit-author-name, --commit-author-email, --commit-author-avatar\n`);
	process.stdout.write(`  --prev-build-*, --prev-commit-* (same fields for the previous build)\n`);
	process.stdout.write(`  --job-number, --system-name, --system-link, --system-arch\n`);
}

export function readPackageVersion(): string {
	const pkgUrl = new URL("../../package.json", import.meta.url);
	const raw = fs.readFileSync(pkgUrl, "utf-8");
	const parsed = PackageJsonSchema.parse(JSON.parse(raw));
	return parsed.version ?? "0.0.0";
}

function takeValue(flag: string, args: string[], options: CliOptions): string | undefined {
	const value = args.shift();
	if (!value || value.startsWith("-")) {
		options.errors.push(`Missing value for ${flag}`);
		if (value) {
			args.unshift(value);
		}
		return undefined;
	}
	return value;
}
