import { describe, expect, it, vi } from "vitest";
import { CancelledError, ExitError, OomError } from "../src/core/errors.js";
import type { LogLine } from "../src/exec/line-writer.js";
import { createLogger } from "../src/exec/logger.js";
import type { RunOptions, TraceState } from "../src/pipeline/runtime.js";
import { noopTracer, run } from "../src/pipeline/runtime.js";
import type { FakeStepScript } from "./helpers.js";
import { FakeBackend, makeStep, planOf } from "./helpers.js";

function runOptions(backend: FakeBackend, overrides: Partial<RunOptions> = {}): RunOptions {
	return {
		signal: new AbortController().signal,
		tracer: noopTracer,
		logger: async () => undefined,
		backend,
		onLogError: () => undefined,
		...overrides,
	};
}

function backendWith(scripts: Record<string, FakeStepScript> = {}): FakeBackend {
	return new FakeBackend(scripts);
}

describe("runtime", () => {
	it("runs stages in order and tears down", async () => {
		const backend = backendWith();
		await run(planOf([makeStep("build")], [makeStep("test")]), runOptions(backend));

		expect(backend.calls).toEqual(["setup", "exec:build", "wait:build", "exec:test", "wait:test", "destroy"]);
	});

	it("streams each step's output to the logger", async () => {
		const backend = backendWith({ build: { output: "compiling\ndone\n" } });
		const lines: LogLine[] = [];
		const logger = createLogger(() => (line) => lines.push(line));

		await run(planOf([makeStep("build")]), runOptions(backend, { logger }));

		expect(lines.map((line) => `${line.step}:${line.text}`)).toEqual(["build:compiling", "build:done"]);
	});

	it("skips success steps after a failure and runs failure steps", async () => {
		const backend = backendWith({ build: { exitCode: 2 } });
		const plan = planOf(
			[makeStep("build")],
			[makeStep("test")],
			[makeStep("notify", { onSuccess: false, onFailure: true })],
		);

		const error = await run(plan, runOptions(backend)).catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(ExitError);
		expect(error).toMatchObject({ step: "build", exitCode: 2, message: "build: exit code 2" });
		expect(backend.calls).toEqual(["setup", "exec:build", "wait:build", "exec:notify", "wait:notify", "destroy"]);
	});

	it("reports oom kills", async () => {
		const backend = backendWith({ build: { exitCode: 137, oomKilled: true } });
		await expect(run(planOf([makeStep("build")]), runOptions(backend))).rejects.toBeInstanceOf(OomError);
	});

	it("does not wait for detached steps", async () => {
		const backend = backendWith();
		await run(planOf([makeStep("db", { detached: true })], [makeStep("build")]), runOptions(backend));

		expect(backend.calls).toEqual(["setup", "exec:db", "exec:build", "wait:build", "destroy"]);
	});

	it("stops on cancellation and still tears down", async () => {
		const controller = new AbortController();
		const backend = backendWith({ build: { hang: true } });
		backend.onWait = () => controller.abort(new CancelledError("timeout"));

		const execution = run(
			planOf([makeStep("build")], [makeStep("notify", { onFailure: true })]),
			runOptions(backend, { signal: controller.signal }),
		);

		await expect(execution).rejects.toMatchObject({ name: "CancelledError", reason: "timeout" });
		expect(backend.calls).toEqual(["setup", "exec:build", "wait:build", "destroy"]);
	});

	it("reports a setup failure caused by cancellation as cancelled", async () => {
		const controller = new AbortController();
		const backend = backendWith();
		backend.onSetup = (signal) =>
			new Promise<void>((_resolve, reject) => {
				signal.addEventListener("abort", () => reject(new Error("docker volume create failed: exit 1")));
			});

		const execution = run(planOf([makeStep("build")]), runOptions(backend, { signal: controller.signal }));
		controller.abort(new CancelledError("interrupt"));

		await expect(execution).rejects.toMatchObject({ name: "CancelledError", reason: "interrupt" });
		expect(backend.calls).toEqual(["setup", "destroy"]);
	});

	it("passes setup failures through when not cancelled", async () => {
		const backend = backendWith();
		backend.onSetup = async () => {
			throw new Error("docker volume create failed: exit 1");
		};

		await expect(run(planOf([makeStep("build")]), runOptions(backend))).rejects.toThrow(
			"docker volume create failed: exit 1",
		);
		expect(backend.calls).toEqual(["setup", "destroy"]);
	});

	it("does not start when already cancelled", async () => {
		const controller = new AbortController();
		controller.abort(new CancelledError("interrupt"));
		const backend = backendWith();

		await expect(run(planOf([makeStep("build")]), runOptions(backend, { signal: controller.signal }))).rejects.toBeInstanceOf(
			CancelledError,
		);
		expect(backend.calls).toEqual(["destroy"]);
	});

	it("reports log failures without failing the step", async () => {
		const backend = backendWith();
		const onLogError = vi.fn();
		const failure = new Error("stream closed");

		await run(
			planOf([makeStep("build")]),
			runOptions(backend, {
				logger: async () => {
					throw failure;
				},
				onLogError,
			}),
		);

		expect(onLogError).toHaveBeenCalledTimes(1);
		expect(onLogError.mock.calls[0][1]).toBe(failure);
	});

	it("traces each step with the state before it", async () => {
		const backend = backendWith({ build: { exitCode: 1 } });
		const states: TraceState[] = [];
		const plan = planOf([makeStep("build")], [makeStep("notify", { onFailure: true })]);

		await run(plan, runOptions(backend, { tracer: (state) => void states.push(state) })).catch(() => undefined);

		expect(states.map((state) => state.step.alias)).toEqual(["build", "notify"]);
		expect(states[0].error).toBeNull();
		expect(states[1].error).toBeInstanceOf(ExitError);
	});
});
