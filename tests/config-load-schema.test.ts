import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG_PATH, loadConfig } from "../src/config/load-config.js";
import { ConfigSchema } from "../src/config/schema.js";
import { ConfigError } from "../src/core/errors.js";

describe("config schema", () => {
	it("applies defaults", () => {
		const parsed = ConfigSchema.parse({});
		expect(parsed).toMatchObject({
			timeout: 3_600_000,
			backend: "auto-detect",
			local: true,
			proxy: true,
			volumes: [],
			networks: [],
			privileged: ["plugins/docker", "plugins/gcr", "plugins/ecr"],
			prefix: "localflow",
			env: [],
			workspace: { base: "/localflow", path: "src" },
		});
		expect(parsed.netrc).toBeUndefined();
	});

	it("parses duration strings and bare milliseconds", () => {
		expect(ConfigSchema.parse({ timeout: "1h30m" }).timeout).toBe(5_400_000);
		expect(ConfigSchema.parse({ timeout: 250 }).timeout).toBe(250);
	});

	it("rejects invalid durations", () => {
		expect(() => ConfigSchema.parse({ timeout: "soon" })).toThrow(/Invalid duration: soon/);
	});
});

describe("load config", () => {
	it("returns defaults when the config file does not exist", () => {
		const root = fs.mkdtempSync(path.join(os.tmpdir(), "localflow-config-empty-"));
		const loaded = loadConfig(root);

		expect(loaded.path).toBeUndefined();
		expect(loaded.config.backend).toBe("auto-detect");
		expect(loaded.config.workspace.base).toBe("/localflow");
	});

	it("loads the file and layers overrides on top", () => {
		const root = fs.mkdtempSync(path.join(os.tmpdir(), "localflow-config-ok-"));
		const configPath = path.join(root, DEFAULT_CONFIG_PATH);
		fs.writeFileSync(
			configPath,
			[
				"backend: docker",
				"timeout: 10m",
				"repo:",
				"  name: octo/app",
				"volumes:",
				"  - /cache:/cache",
				"workspace:",
				"  base: /build",
			].join("\n"),
		);

		const loaded = loadConfig(root, {
			repo: { link: "https://example.test/octo/app" },
			volumes: ["/data:/data"],
		});
		expect(loaded.path).toBe(configPath);
		expect(loaded.config.backend).toBe("docker");
		expect(loaded.config.timeout).toBe(600_000);
		expect(loaded.config.repo).toEqual({ name: "octo/app", link: "https://example.test/octo/app" });
		expect(loaded.config.volumes).toEqual(["/data:/data"]);
		expect(loaded.config.workspace).toEqual({ base: "/build", path: "src" });
	});

	it("reports the offending field", () => {
		const root = fs.mkdtempSync(path.join(os.tmpdir(), "localflow-config-invalid-"));
		const configPath = path.join(root, DEFAULT_CONFIG_PATH);
		fs.writeFileSync(configPath, "local: sometimes\n");

		expect(() => loadConfig(root)).toThrow(ConfigError);
		expect(() => loadConfig(root)).toThrow(`${configPath}: local: Expected boolean, received string`);
	});

	it("reports yaml syntax errors as config errors", () => {
		const root = fs.mkdtempSync(path.join(os.tmpdir(), "localflow-config-yaml-"));
		fs.writeFileSync(path.join(root, DEFAULT_CONFIG_PATH), "volumes: [\n");

		expect(() => loadConfig(root)).toThrow(ConfigError);
	});
});
