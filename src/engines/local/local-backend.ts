import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import type { Backend, StepState } from "../../core/engine.js";
import { BackendError, errorMessage } from "../../core/errors.js";
import type { CompiledPlan, CompiledStep } from "../../core/types.js";
import type { SpawnedStep } from "../process.js";
import { spawnStep } from "../process.js";

/**
 * Runs step scripts directly on the host, ignoring images. A step works in
 * the host directory bind-mounted onto its working directory, or under a
 * scratch directory created for the run.
 */
export class LocalBackend implements Backend {
	readonly name = "local";
	private scratchDir: string | null = null;
	private readonly running = new Map<string, SpawnedStep>();

	isAvailable(): boolean {
		return process.platform !== "win32";
	}

	async load(): Promise<void> {}

	async setup(_plan: CompiledPlan, _signal: AbortSignal): Promise<void> {
		this.scratchDir = fs.mkdtempSync(path.join(os.tmpdir(), "localflow-"));
	}

	async exec(step: CompiledStep, signal: AbortSignal): Promise<void> {
		const [command, ...args] = [...step.entrypoint, ...step.command];
		if (!command) {
			return;
		}
		const cwd = resolveHostDir(step, this.scratchDir ?? os.tmpdir());
		fs.mkdirSync(cwd, { recursive: true });
		const spawned = spawnStep(command, args, {
			cwd,
			env: { ...process.env, ...step.environment },
			signal,
		});
		try {
			await spawned.started;
		} catch (error) {
			throw new BackendError(`${step.alias}: cannot start ${command}: ${errorMessage(error)}`, { cause: error });
		}
		this.running.set(step.name, spawned);
	}

	async tail(step: CompiledStep): Promise<Readable> {
		return this.running.get(step.name)?.output ?? Readable.from([]);
	}

	async wait(step: CompiledStep, _signal: AbortSignal): Promise<StepState> {
		const spawned = this.running.get(step.name);
		if (!spawned) {
			return { exitCode: 0, oomKilled: false };
		}
		const exitCode = await spawned.exit;
		this.running.delete(step.name);
		return { exitCode, oomKilled: false };
	}

	async destroy(_plan: CompiledPlan): Promise<void> {
		const spawned = [...this.running.values()];
		for (const item of spawned) {
			item.child.kill();
		}
		await Promise.allSettled(spawned.map((item) => item.exit));
		this.running.clear();

		if (this.scratchDir) {
			fs.rmSync(this.scratchDir, { recursive: true, force: true });
			this.scratchDir = null;
		}
	}
}

/**
 * Maps a step's container working directory to a host directory through its
 * bind mounts (`/host/dir:/container/dir`). Named volumes are not mapped.
 */
export function resolveHostDir(step: CompiledStep, scratchDir: string): string {
	let best: { source: string; target: string } | null = null;
	for (const volume of step.volumes) {
		const separator = volume.indexOf(":/");
		if (separator <= 0) {
			continue;
		}
		const source = volume.slice(0, separator);
		const target = volume.slice(separator + 1).split(":")[0];
		if (!path.isAbsolute(source)) {
			continue;
		}
		const inside = step.workingDir === target || step.workingDir.startsWith(`${target}/`);
		if (inside && (!best || target.length > best.target.length)) {
			best = { source, target };
		}
	}

	if (best) {
		return path.join(best.source, path.posix.relative(best.target, step.workingDir));
	}
	return path.join(scratchDir, step.workingDir);
}
