import type { Backend, StepState } from "../core/engine.js";
import { CancelledError, ExitError, OomError } from "../core/errors.js";
import type { CompiledPlan, CompiledStep } from "../core/types.js";
import type { MultipartReader } from "./multipart.js";
import { singlePartReader } from "./multipart.js";

export type LogFunc = (step: CompiledStep, reader: MultipartReader) => Promise<void>;

export type TraceState = {
	startedAt: number;
	step: CompiledStep;
	error: Error | null;
	previous: StepState | null;
};

export type Tracer = (state: TraceState) => void | Promise<void>;

export const noopTracer: Tracer = () => undefined;

export type RunOptions = {
	signal: AbortSignal;
	tracer: Tracer;
	logger: LogFunc;
	backend: Backend;
	onLogError: (step: CompiledStep, error: unknown) => void;
};

export async function run(plan: CompiledPlan, options: RunOptions): Promise<void> {
	await new Runtime(plan, options).run();
}

/**
 * Stages run one after another; the steps of a stage run together. A failed
 * stage records its error and later steps only run if they opt into failure.
 */
class Runtime {
	private error: Error | null = null;
	private previous: StepState | null = null;
	private readonly startedAt = Date.now();
	private readonly detachedLogs: Promise<void>[] = [];

	constructor(
		private readonly plan: CompiledPlan,
		private readonly options: RunOptions,
	) {}

	async run(): Promise<void> {
		const { backend, signal } = this.options;
		try {
			throwIfAborted(signal);
			await backend.setup(this.plan, signal);
			for (const stage of this.plan.stages) {
				throwIfAborted(signal);
				const results = await Promise.allSettled(stage.steps.map((step) => this.exec(step)));
				const failure = results.find(
					(result): result is PromiseRejectedResult => result.status === "rejected",
				);
				if (failure) {
					this.error = toError(failure.reason);
					if (this.error instanceof CancelledError) {
						throw this.error;
					}
				}
			}
			throwIfAborted(signal);
		} catch (error) {
			// Backends fail in their own words once the signal kills their commands.
			if (signal.aborted) {
				throw cancelledFrom(signal);
			}
			throw error;
		} finally {
			await backend.destroy(this.plan);
			await Promise.all(this.detachedLogs);
		}

		if (this.error) {
			throw this.error;
		}
	}

	private async exec(step: CompiledStep): Promise<void> {
		if (this.error && !step.onFailure) {
			return;
		}
		if (!this.error && !step.onSuccess) {
			return;
		}

		const { backend, signal, tracer } = this.options;
		await tracer({
			startedAt: this.startedAt,
			step,
			error: this.error,
			previous: this.previous,
		});

		await backend.exec(step, signal);
		const logging = this.attachLogs(step);
		if (step.detached) {
			this.detachedLogs.push(logging);
			return;
		}

		const state = await raceAbort(backend.wait(step, signal), signal);
		await logging;
		this.previous = state;

		if (state.oomKilled) {
			throw new OomError(step.alias);
		}
		if (state.exitCode !== 0) {
			throw new ExitError(step.alias, state.exitCode);
		}
	}

	// Log failures are reported per step and never fail the step itself.
	private async attachLogs(step: CompiledStep): Promise<void> {
		try {
			const stream = await this.options.backend.tail(step);
			await this.options.logger(step, singlePartReader(stream, { step: step.alias }));
		} catch (error) {
			this.options.onLogError(step, error);
		}
	}
}

export function cancelledFrom(signal: AbortSignal): CancelledError {
	return signal.reason instanceof CancelledError ? signal.reason : new CancelledError("interrupt");
}

function throwIfAborted(signal: AbortSignal): void {
	if (signal.aborted) {
		throw cancelledFrom(signal);
	}
}

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
	if (signal.aborted) {
		return Promise.reject(cancelledFrom(signal));
	}
	return new Promise<T>((resolve, reject) => {
		const onAbort = (): void => reject(cancelledFrom(signal));
		signal.addEventListener("abort", onAbort, { once: true });
		promise.then(
			(value) => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(error);
			},
		);
	});
}

function toError(reason: unknown): Error {
	return reason instanceof Error ? reason : new Error(String(reason));
}
