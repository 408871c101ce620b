import type { ExecConfig } from "../config/schema.js";
import type { CompileOptions } from "../core/compiler.js";
import { compile } from "../core/compiler.js";
import { parseDefinition } from "../core/definition.js";
import type { Backend } from "../core/engine.js";
import type { LintOptions } from "../core/linter.js";
import { lint } from "../core/linter.js";
import { parseMatrix } from "../core/matrix.js";
import type { Lookup } from "../core/template.js";
import { substitute } from "../core/template.js";
import type { CompiledPlan, Definition, MatrixAxis } from "../core/types.js";
import { findBackend } from "../engines/factory.js";
import type { LogFunc, RunOptions, Tracer } from "../pipeline/runtime.js";
import { noopTracer, run } from "../pipeline/runtime.js";
import type { Output } from "../utils/output.js";
import { consoleOutput } from "../utils/output.js";
import type { InterruptSource } from "./lifecycle.js";
import { processInterrupts } from "./lifecycle.js";
import { defaultLogger } from "./logger.js";

/**
 * Everything the orchestrator calls out to. Tests swap single entries; the
 * CLI uses the defaults.
 */
export type ExecDependencies = {
	parseMatrix: (raw: string) => MatrixAxis[];
	substitute: (text: string, lookup: Lookup) => string;
	parseDefinition: (text: string, source: string) => Definition;
	lint: (definition: Definition, options: LintOptions) => void;
	compile: (definition: Definition, options: CompileOptions) => CompiledPlan;
	findBackend: (name: string) => Backend;
	run: (plan: CompiledPlan, options: RunOptions) => Promise<void>;
	tracer: Tracer;
	logger: LogFunc;
	interrupts: InterruptSource;
	output: Output;
};

export const defaultDependencies: ExecDependencies = {
	parseMatrix,
	substitute,
	parseDefinition,
	lint,
	compile,
	findBackend,
	run,
	tracer: noopTracer,
	logger: defaultLogger,
	interrupts: processInterrupts,
	output: consoleOutput,
};

export type ExecOptions = {
	config: ExecConfig;
	deps: ExecDependencies;
};
