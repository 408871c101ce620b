import { describe, expect, it } from "vitest";
import { InputError } from "../src/core/errors.js";
import { buildMetadata, formatAxis, metadataEnviron } from "../src/core/metadata.js";
import { axisEnvironment, parseEnvOverrides } from "../src/exec/environ.js";

describe("metadata", () => {
	it("fills absent fields with empty values", () => {
		const metadata = buildMetadata({}, {});

		expect(metadata.repo).toEqual({ name: "", link: "", remote: "", private: false });
		expect(metadata.curr.number).toBe(0);
		expect(metadata.curr.commit.author).toEqual({ name: "", email: "", avatar: "" });
		expect(metadata.job).toEqual({ number: 0, matrix: {} });
		expect(Object.isFrozen(metadata)).toBe(true);
	});

	it("carries build, previous build and axis values", () => {
		const metadata = buildMetadata(
			{
				repo: { name: "octo/app", private: true },
				build: { number: 5, event: "push", commit: { sha: "abc", author: { name: "octocat" } } },
				prev: { number: 4, status: "failure" },
				job: { number: 2 },
				system: { name: "localflow", arch: "linux/amd64" },
			},
			{ NODE: "20", DB: "pg" },
		);

		expect(metadataEnviron(metadata)).toMatchObject({
			CI: "localflow",
			CI_REPO_NAME: "octo/app",
			CI_REPO_PRIVATE: "true",
			CI_BUILD_NUMBER: "5",
			CI_BUILD_EVENT: "push",
			CI_COMMIT_SHA: "abc",
			CI_COMMIT_AUTHOR: "octocat",
			CI_PARENT_BUILD_NUMBER: "0",
			CI_PREV_BUILD_NUMBER: "4",
			CI_PREV_BUILD_STATUS: "failure",
			CI_PREV_COMMIT_SHA: "",
			CI_JOB_NUMBER: "2",
			CI_JOB_MATRIX: "NODE=20,DB=pg",
			CI_SYSTEM_ARCH: "linux/amd64",
		});
	});

	it("formats axes in declaration order", () => {
		expect(formatAxis({ B: "2", A: "1" })).toBe("B=2,A=1");
		expect(formatAxis({})).toBe("");
	});
});

describe("axis environment", () => {
	it("lets matrix values replace metadata variables and offers them as secrets", () => {
		const metadata = buildMetadata({ repo: { name: "octo/app" } }, { CI_REPO_NAME: "override", NODE: "20" });
		const { environ, secrets } = axisEnvironment(metadata);

		expect(environ.CI_REPO_NAME).toBe("override");
		expect(environ.NODE).toBe("20");
		expect(secrets).toEqual([
			{ name: "CI_REPO_NAME", value: "override" },
			{ name: "NODE", value: "20" },
		]);
	});

	it("splits overrides on the first equals sign", () => {
		expect(parseEnvOverrides(["A=1", "B=x=y", "C="])).toEqual({ A: "1", B: "x=y", C: "" });
	});

	it("rejects overrides without a value separator", () => {
		expect(() => parseEnvOverrides(["BROKEN"])).toThrow(InputError);
		expect(() => parseEnvOverrides(["BROKEN"])).toThrow('Invalid environment override "BROKEN": expected KEY=VALUE');
	});
});
