import type { Readable } from "node:stream";
import type { CompiledPlan, CompiledStep } from "./types.js";

export type StepState = {
	exitCode: number;
	oomKilled: boolean;
};

/**
 * A backend runs compiled steps. The runtime calls setup once per plan,
 * then exec/tail/wait per step, and destroy on every exit path.
 */
export interface Backend {
	readonly name: string;
	isAvailable(): boolean;
	load(): Promise<void>;
	setup(plan: CompiledPlan, signal: AbortSignal): Promise<void>;
	exec(step: CompiledStep, signal: AbortSignal): Promise<void>;
	tail(step: CompiledStep): Promise<Readable>;
	wait(step: CompiledStep, signal: AbortSignal): Promise<StepState>;
	destroy(plan: CompiledPlan): Promise<void>;
}
