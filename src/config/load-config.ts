import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ZodError } from "zod";
import { ConfigError } from "../core/errors.js";
import type { ExecConfig } from "./schema.js";
import { ConfigSchema } from "./schema.js";

export type ConfigLoadResult = {
	config: ExecConfig;
	path?: string;
};

export const DEFAULT_CONFIG_PATH = "localflow.config.yml";

/**
 * Loads `localflow.config.yml` from `cwd` when present and layers `overrides`
 * (usually command-line flags) on top before validating.
 */
export function loadConfig(cwd: string, overrides: Record<string, unknown> = {}): ConfigLoadResult {
	const configPath = path.join(cwd, DEFAULT_CONFIG_PATH);
	const exists = fs.existsSync(configPath);

	let fileValues: unknown = {};
	if (exists) {
		try {
			fileValues = YAML.parse(fs.readFileSync(configPath, "utf-8")) ?? {};
		} catch (error) {
			throw new ConfigError(`${configPath}: ${errorText(error)}`, { cause: error });
		}
	}

	try {
		const merged = mergeDeep(ConfigSchema.parse(fileValues), overrides);
		return { config: ConfigSchema.parse(merged), path: exists ? configPath : undefined };
	} catch (error) {
		const label = exists ? configPath : "configuration";
		throw new ConfigError(`${label}: ${errorText(error)}`, { cause: error });
	}
}

function errorText(error: unknown): string {
	if (error instanceof ZodError) {
		const issue = error.issues[0];
		return `${issue.path.join(".") || "config"}: ${issue.message}`;
	}
	return error instanceof Error ? error.message : String(error);
}

function mergeDeep(base: unknown, overrides: unknown): unknown {
	if (!isPlainObject(base) || !isPlainObject(overrides)) {
		return overrides === undefined ? base : overrides;
	}
	const merged: Record<string, unknown> = { ...base };
	for (const [key, value] of Object.entries(overrides)) {
		if (value !== undefined) {
			merged[key] = mergeDeep(base[key], value);
		}
	}
	return merged;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
