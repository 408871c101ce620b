import { describe, expect, it } from "vitest";
import { parseArgs } from "../src/cli/args.js";

describe("cli args", () => {
	it("parses exec options into config overrides", () => {
		const parsed = parseArgs([
			"exec",
			"ci/build.yml",
			"--backend",
			"local",
			"--timeout",
			"30m",
			"--volume",
			"/cache:/cache",
			"--volume",
			"/data:/data",
			"--env",
			"FOO=bar",
			"--no-local",
			"--repo-private",
		]);

		expect(parsed).toMatchObject({
			command: "exec",
			path: "ci/build.yml",
			unknown: [],
			errors: [],
		});
		expect(parsed.overrides).toEqual({
			backend: "local",
			timeout: "30m",
			volumes: ["/cache:/cache", "/data:/data"],
			env: ["FOO=bar"],
			local: false,
			repo: { private: true },
		});
	});

	it("maps build and previous build metadata flags", () => {
		const parsed = parseArgs([
			"--build-number",
			"42",
			"--commit-sha",
			"abc123",
			"--commit-author-name",
			"octocat",
			"--prev-build-number",
			"41",
			"--prev-commit-branch",
			"main",
			"--parent-build-number",
			"7",
		]);

		expect(parsed.errors).toEqual([]);
		expect(parsed.overrides).toEqual({
			build: {
				number: 42,
				parent: 7,
				commit: { sha: "abc123", author: { name: "octocat" } },
			},
			prev: { number: 41, commit: { branch: "main" } },
		});
	});

	it("works without the exec subcommand", () => {
		const parsed = parseArgs(["pipelines"]);
		expect(parsed.command).toBe("exec");
		expect(parsed.path).toBe("pipelines");
	});

	it("captures unknown options and extra positionals", () => {
		const parsed = parseArgs(["--wat", "a.yml", "b.yml"]);
		expect(parsed.unknown).toEqual(["--wat", "b.yml"]);
		expect(parsed.path).toBe("a.yml");
	});

	it("reports missing values for valued flags", () => {
		const parsed = parseArgs(["--backend", "--prefix", "ci"]);
		expect(parsed.errors).toEqual(["Missing value for --backend"]);
		expect(parsed.overrides).toEqual({ prefix: "ci" });
	});

	it("reports non-integer values for numeric flags", () => {
		const parsed = parseArgs(["--job-number", "two"]);
		expect(parsed.errors).toEqual(["Invalid value for --job-number: two (expected an integer)"]);
		expect(parsed.overrides).toEqual({});
	});

	it("recognizes help and version", () => {
		expect(parseArgs(["--help"]).help).toBe(true);
		expect(parseArgs(["-v"]).version).toBe(true);
	});
});
