import type { Backend } from "../core/engine.js";
import type { CancelReason } from "../core/errors.js";
import { CancelledError, errorMessage } from "../core/errors.js";
import type { CompiledPlan } from "../core/types.js";
import type { LogFunc, RunOptions, Tracer } from "../pipeline/runtime.js";
import type { Output } from "../utils/output.js";

// setTimeout overflows above this and fires immediately.
const MAX_TIMER_MS = 2_147_483_647;

export const INTERRUPT_NOTICE = "ctrl+c received, terminating process";

export type ExecutionContext = {
	readonly signal: AbortSignal;
	cancel(reason: CancelReason): void;
	dispose(): void;
};

export function createExecutionContext(timeoutMs: number): ExecutionContext {
	const controller = new AbortController();
	const cancel = (reason: CancelReason): void => {
		if (!controller.signal.aborted) {
			controller.abort(new CancelledError(reason));
		}
	};
	const timer = setTimeout(() => cancel("timeout"), Math.min(Math.max(timeoutMs, 0), MAX_TIMER_MS));

	return {
		signal: controller.signal,
		cancel,
		dispose: () => {
			clearTimeout(timer);
			if (!controller.signal.aborted) {
				controller.abort();
			}
		},
	};
}

/** Subscribes a listener to interrupt requests and returns an unsubscribe function. */
export type InterruptSource = (listener: () => void) => () => void;

export const processInterrupts: InterruptSource = (listener) => {
	process.on("SIGINT", listener);
	process.on("SIGTERM", listener);
	return () => {
		process.off("SIGINT", listener);
		process.off("SIGTERM", listener);
	};
};

export function onInterrupt(
	context: ExecutionContext,
	source: InterruptSource,
	notify: (message: string) => void,
): () => void {
	let received = false;
	return source(() => {
		if (received) {
			return;
		}
		received = true;
		notify(INTERRUPT_NOTICE);
		context.cancel("interrupt");
	});
}

export type ExecutePlanOptions = {
	timeoutMs: number;
	run: (plan: CompiledPlan, options: RunOptions) => Promise<void>;
	tracer: Tracer;
	logger: LogFunc;
	interrupts: InterruptSource;
	output: Output;
};

/**
 * Runs a compiled plan under a deadline and an interrupt hook. Both end up as
 * cancellation of the same signal; the context is released on every path.
 */
export async function executePlan(
	plan: CompiledPlan,
	backend: Backend,
	options: ExecutePlanOptions,
): Promise<void> {
	const context = createExecutionContext(options.timeoutMs);
	const release = onInterrupt(context, options.interrupts, (message) => options.output.warn(message));
	try {
		await options.run(plan, {
			signal: context.signal,
			tracer: options.tracer,
			logger: options.logger,
			backend,
			onLogError: (step, error) =>
				options.output.warn(`${step.alias}: could not attach logs: ${errorMessage(error)}`),
		});
	} finally {
		release();
		context.dispose();
	}
}
