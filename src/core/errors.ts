export type ErrorKind =
	| "input"
	| "config"
	| "matrix"
	| "template"
	| "definition"
	| "lint"
	| "backend"
	| "exit"
	| "oom"
	| "cancelled";

export type CancelReason = "interrupt" | "timeout";

export class LocalflowError extends Error {
	constructor(
		readonly kind: ErrorKind,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "LocalflowError";
	}
}

export class InputError extends LocalflowError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("input", message, options);
		this.name = "InputError";
	}
}

export class ConfigError extends LocalflowError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("config", message, options);
		this.name = "ConfigError";
	}
}

export class MatrixError extends LocalflowError {
	constructor(options?: { cause?: unknown }) {
		super("matrix", "matrix parse failure", options);
		this.name = "MatrixError";
	}
}

export class TemplateError extends LocalflowError {
	constructor(
		message: string,
		readonly offset: number,
	) {
		super("template", `${message} at offset ${offset}`);
		this.name = "TemplateError";
	}
}

export class DefinitionError extends LocalflowError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("definition", message, options);
		this.name = "DefinitionError";
	}
}

export class LintError extends LocalflowError {
	constructor(
		readonly rule: string,
		message: string,
	) {
		super("lint", `[${rule}] ${message}`);
		this.name = "LintError";
	}
}

export class BackendError extends LocalflowError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("backend", message, options);
		this.name = "BackendError";
	}
}

export class ExitError extends LocalflowError {
	constructor(
		readonly step: string,
		readonly exitCode: number,
	) {
		super("exit", `${step}: exit code ${exitCode}`);
		this.name = "ExitError";
	}
}

export class OomError extends LocalflowError {
	constructor(readonly step: string) {
		super("oom", `${step}: received oom kill`);
		this.name = "OomError";
	}
}

export class CancelledError extends LocalflowError {
	constructor(readonly reason: CancelReason) {
		super(
			"cancelled",
			reason === "timeout" ? "pipeline timed out" : "pipeline was cancelled",
		);
		this.name = "CancelledError";
	}
}

export function isCancellation(error: unknown): error is CancelledError {
	return error instanceof CancelledError;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
