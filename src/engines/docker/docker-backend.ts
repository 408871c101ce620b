import { spawnSync } from "node:child_process";
import { Readable } from "node:stream";
import type { Backend, StepState } from "../../core/engine.js";
import { BackendError, errorMessage } from "../../core/errors.js";
import type { CompiledPlan, CompiledStep } from "../../core/types.js";
import { redactArgs } from "../../utils/redact.js";
import type { SpawnedStep } from "../process.js";
import { runCommand, spawnStep } from "../process.js";

/**
 * Runs each step as a container through the docker CLI. Containers are kept
 * after they exit so their OOM state can be read, and removed in destroy.
 */
export class DockerBackend implements Backend {
	readonly name = "docker";
	private readonly running = new Map<string, SpawnedStep>();
	private readonly containers = new Set<string>();

	constructor(private readonly binary = "docker") {}

	isAvailable(): boolean {
		return spawnSync(this.binary, ["version"], { stdio: "ignore" }).status === 0;
	}

	async load(): Promise<void> {
		const result = await runCommand(this.binary, ["info", "--format", "{{.ServerVersion}}"]);
		if (result.code !== 0) {
			throw new BackendError(`${this.binary} daemon is not reachable: ${result.stderr.trim()}`);
		}
	}

	async setup(plan: CompiledPlan, signal: AbortSignal): Promise<void> {
		for (const volume of plan.volumes) {
			await this.docker(["volume", "create", volume.name], signal);
		}
		for (const network of plan.networks) {
			await this.docker(["network", "create", network.name], signal);
		}
	}

	async exec(step: CompiledStep, signal: AbortSignal): Promise<void> {
		if (step.pull) {
			await this.docker(["pull", step.image], signal);
		}

		this.containers.add(step.name);
		const args = buildRunArgs(step);
		if (step.detached) {
			await this.docker(args, signal);
		} else {
			const attached = spawnStep(this.binary, args, { signal });
			try {
				await attached.started;
			} catch (error) {
				throw new BackendError(`${step.alias}: cannot start ${this.binary}: ${errorMessage(error)}`, { cause: error });
			}
			this.running.set(step.name, attached);
		}

		for (const network of step.networks.slice(1)) {
			await this.docker(["network", "connect", "--alias", step.alias, network, step.name], signal);
		}
	}

	async tail(step: CompiledStep): Promise<Readable> {
		const attached = this.running.get(step.name);
		if (attached) {
			return attached.output;
		}
		if (!this.containers.has(step.name)) {
			return Readable.from([]);
		}
		const logs = spawnStep(this.binary, ["logs", "--follow", step.name]);
		this.running.set(step.name, logs);
		return logs.output;
	}

	async wait(step: CompiledStep, signal: AbortSignal): Promise<StepState> {
		const attached = this.running.get(step.name);
		if (!attached) {
			return { exitCode: 0, oomKilled: false };
		}
		const exitCode = await attached.exit;
		this.running.delete(step.name);

		const inspect = await runCommand(
			this.binary,
			["inspect", "--format", "{{.State.OOMKilled}}", step.name],
			signal,
		);
		return {
			exitCode,
			oomKilled: inspect.code === 0 && inspect.stdout.trim() === "true",
		};
	}

	async destroy(plan: CompiledPlan): Promise<void> {
		const spawned = [...this.running.values()];
		for (const item of spawned) {
			item.child.kill();
		}
		await Promise.allSettled(spawned.map((item) => item.exit));
		this.running.clear();

		if (this.containers.size > 0) {
			await runCommand(this.binary, ["rm", "--force", ...this.containers]);
			this.containers.clear();
		}
		for (const network of plan.networks) {
			await runCommand(this.binary, ["network", "rm", network.name]);
		}
		for (const volume of plan.volumes) {
			await runCommand(this.binary, ["volume", "rm", "--force", volume.name]);
		}
	}

	private async docker(args: string[], signal: AbortSignal): Promise<string> {
		const result = await runCommand(this.binary, args, signal);
		if (result.code !== 0) {
			throw new BackendError(
				`${this.binary} ${redactArgs(args).join(" ")} failed: ${result.stderr.trim() || `exit ${result.code}`}`,
			);
		}
		return result.stdout;
	}
}

export function buildRunArgs(step: CompiledStep): string[] {
	const args = ["run", "--name", step.name];
	if (step.detached) {
		args.push("--detach");
	}
	if (step.workingDir) {
		args.push("--workdir", step.workingDir);
	}
	if (step.privileged) {
		args.push("--privileged");
	}
	if (step.networkMode) {
		args.push("--network", step.networkMode);
	} else if (step.networks.length > 0) {
		args.push("--network", step.networks[0], "--network-alias", step.alias);
	}
	for (const volume of step.volumes) {
		args.push("--volume", volume);
	}
	for (const [key, value] of Object.entries(step.environment)) {
		args.push("-e", `${key}=${value}`);
	}

	const [entrypoint, ...entrypointArgs] = step.entrypoint;
	if (entrypoint) {
		args.push("--entrypoint", entrypoint);
	}
	args.push(step.image, ...entrypointArgs, ...step.command);
	return args;
}
