import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import { PassThrough } from "node:stream";

export type SpawnedStep = {
	child: ChildProcess;
	output: PassThrough;
	started: Promise<void>;
	exit: Promise<number>;
};

export type SpawnOptions = {
	cwd?: string;
	env?: NodeJS.ProcessEnv;
	signal?: AbortSignal;
};

/**
 * Spawns a process whose stdout and stderr share one stream. `started`
 * settles once the process is running or has failed to start. `exit`
 * resolves with the exit code (1 when the process was killed) and rejects
 * only when the process could not be started.
 */
export function spawnStep(command: string, args: string[], options: SpawnOptions = {}): SpawnedStep {
	const child = spawn(command, args, {
		cwd: options.cwd,
		env: options.env ?? process.env,
		signal: options.signal,
		stdio: ["ignore", "pipe", "pipe"],
	});
	const output = new PassThrough();

	let open = 0;
	for (const stream of [child.stdout, child.stderr]) {
		if (!stream) {
			continue;
		}
		open += 1;
		stream.pipe(output, { end: false });
		stream.on("end", () => {
			open -= 1;
			if (open === 0) {
				output.end();
			}
		});
	}
	if (open === 0) {
		output.end();
	}

	const started = new Promise<void>((resolve, reject) => {
		child.once("spawn", () => resolve());
		child.once("error", reject);
	});
	const exit = new Promise<number>((resolve, reject) => {
		started.catch((error: unknown) => {
			output.end();
			reject(error);
		});
		child.once("close", (code: number | null) => {
			resolve(code ?? 1);
		});
	});
	// Detached steps and log followers may never await exit.
	exit.catch(() => undefined);

	return { child, output, started, exit };
}

export type CommandResult = {
	code: number;
	stdout: string;
	stderr: string;
};

export async function runCommand(command: string, args: string[], signal?: AbortSignal): Promise<CommandResult> {
	const spawned = spawnStep(command, args, { signal });
	let stdout = "";
	let stderr = "";
	spawned.child.stdout?.on("data", (chunk: Buffer) => {
		stdout += chunk.toString();
	});
	spawned.child.stderr?.on("data", (chunk: Buffer) => {
		stderr += chunk.toString();
	});
	spawned.output.resume();
	const code = await spawned.exit;
	return { code, stdout, stderr };
}
