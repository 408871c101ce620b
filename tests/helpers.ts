import { Readable } from "node:stream";
import { ConfigSchema } from "../src/config/schema.js";
import type { ExecConfig } from "../src/config/schema.js";
import type { Backend, StepState } from "../src/core/engine.js";
import type { CompiledPlan, CompiledStep } from "../src/core/types.js";
import type { ExecDependencies } from "../src/exec/dependencies.js";
import { defaultDependencies } from "../src/exec/dependencies.js";
import type { InterruptSource } from "../src/exec/lifecycle.js";
import type { Output } from "../src/utils/output.js";

export function makeConfig(overrides: Record<string, unknown> = {}): ExecConfig {
	return ConfigSchema.parse({ backend: "fake", timeout: "1m", ...overrides });
}

export type RecordingOutput = Output & {
	printed: string[];
	infos: string[];
	warnings: string[];
	errors: string[];
};

export function recordingOutput(): RecordingOutput {
	const output: RecordingOutput = {
		printed: [],
		infos: [],
		warnings: [],
		errors: [],
		print: (line) => output.printed.push(line),
		info: (message) => output.infos.push(message),
		warn: (message) => output.warnings.push(message),
		error: (message) => output.errors.push(message),
	};
	return output;
}

export const silentInterrupts: InterruptSource = () => () => undefined;

export type FakeStepScript = {
	exitCode?: number;
	output?: string;
	oomKilled?: boolean;
	hang?: boolean;
};

export class FakeBackend implements Backend {
	readonly name = "fake";
	readonly calls: string[] = [];
	readonly plans: CompiledPlan[] = [];
	readonly executed: CompiledStep[] = [];
	onWait?: (step: CompiledStep) => void;
	onSetup?: (signal: AbortSignal) => Promise<void>;

	constructor(private readonly scripts: Record<string, FakeStepScript> = {}) {}

	isAvailable(): boolean {
		return true;
	}

	async load(): Promise<void> {
		this.calls.push("load");
	}

	async setup(plan: CompiledPlan, signal: AbortSignal): Promise<void> {
		this.calls.push("setup");
		this.plans.push(plan);
		await this.onSetup?.(signal);
	}

	async exec(step: CompiledStep): Promise<void> {
		this.calls.push(`exec:${step.alias}`);
		this.executed.push(step);
	}

	async tail(step: CompiledStep): Promise<Readable> {
		const output = this.scripts[step.alias]?.output;
		return Readable.from(output ? [Buffer.from(output)] : []);
	}

	wait(step: CompiledStep): Promise<StepState> {
		this.calls.push(`wait:${step.alias}`);
		this.onWait?.(step);
		const script = this.scripts[step.alias] ?? {};
		if (script.hang) {
			return new Promise<StepState>(() => undefined);
		}
		return Promise.resolve({
			exitCode: script.exitCode ?? 0,
			oomKilled: script.oomKilled ?? false,
		});
	}

	async destroy(): Promise<void> {
		this.calls.push("destroy");
	}
}

export function makeDeps(overrides: Partial<ExecDependencies> = {}): ExecDependencies & {
	output: RecordingOutput;
} {
	return {
		...defaultDependencies,
		logger: async () => undefined,
		interrupts: silentInterrupts,
		...overrides,
		output: recordingOutput(),
	};
}

export function makeStep(alias: string, overrides: Partial<CompiledStep> = {}): CompiledStep {
	return {
		name: `test_step_${alias}`,
		alias,
		image: "alpine:latest",
		pull: false,
		detached: false,
		privileged: false,
		workingDir: "/localflow/src",
		environment: {},
		entrypoint: [],
		command: [],
		volumes: [],
		networks: [],
		onSuccess: true,
		onFailure: false,
		...overrides,
	};
}

export function planOf(...stages: CompiledStep[][]): CompiledPlan {
	return {
		volumes: [{ name: "test_default" }],
		networks: [{ name: "test_default" }],
		secrets: [],
		stages: stages.map((steps, index) => ({
			name: `test_stage_${index}`,
			alias: steps[0]?.alias ?? `stage-${index}`,
			steps,
		})),
	};
}
