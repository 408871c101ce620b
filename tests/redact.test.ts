import { describe, expect, it } from "vitest";
import { redactArgs } from "../src/utils/redact.js";

describe("redact args", () => {
	it("masks environment values but keeps their keys", () => {
		const args = [
			"run",
			"--name",
			"localflow_step_0",
			"-e",
			"TOKEN=test-secret",
			"--env=API_KEY=test-key",
			"--password",
			"test-password",
			"alpine:latest",
		];

		expect(redactArgs(args)).toEqual([
			"run",
			"--name",
			"localflow_step_0",
			"-e",
			"TOKEN=<redacted>",
			"--env=API_KEY=<redacted>",
			"--password",
			"<redacted>",
			"alpine:latest",
		]);
	});

	it("masks the whole value when it carries no key", () => {
		expect(redactArgs(["-e", "bare"])).toEqual(["-e", "<redacted>"]);
	});

	it("leaves a trailing flag without a value untouched", () => {
		expect(redactArgs(["run", "-e"])).toEqual(["run", "-e"]);
	});
});
