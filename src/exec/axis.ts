import path from "node:path";
import { BackendError, errorMessage } from "../core/errors.js";
import { buildMetadata } from "../core/metadata.js";
import type { MatrixAxis } from "../core/types.js";
import type { ExecOptions } from "./dependencies.js";
import { axisEnvironment, parseEnvOverrides } from "./environ.js";
import { executePlan } from "./lifecycle.js";

export type WorkspaceVolumeInput = {
	volumes: string[];
	prefix: string;
	base: string;
	path: string;
	workspaceRoot: string;
};

/**
 * Caller volumes followed by the shared workspace volume and a bind mount of
 * the real workspace onto the step working directory.
 */
export function workspaceVolumes(input: WorkspaceVolumeInput): string[] {
	return [
		...input.volumes,
		`${input.prefix}_default:${input.base}`,
		`${input.workspaceRoot}:${path.posix.join(input.base, input.path)}`,
	];
}

export async function execAxis(
	raw: string,
	file: string,
	workspaceRoot: string,
	axis: MatrixAxis,
	{ config, deps }: ExecOptions,
): Promise<void> {
	const metadata = buildMetadata(config, axis);
	const { environ, secrets } = axisEnvironment(metadata);
	const extraEnviron = parseEnvOverrides(config.env);

	const resolved = deps.substitute(raw, (name) => environ[name]);
	const definition = deps.parseDefinition(resolved, file);

	let volumes = [...config.volumes];
	if (config.local) {
		volumes = workspaceVolumes({
			volumes,
			prefix: config.prefix,
			base: definition.workspace.base || config.workspace.base,
			path: definition.workspace.path || config.workspace.path,
			workspaceRoot,
		});
	}

	deps.lint(definition, { trusted: true });

	const plan = deps.compile(definition, {
		escalated: config.privileged,
		volumes,
		workspace: config.workspace,
		networks: config.networks,
		prefix: config.prefix,
		proxy: config.proxy,
		local: config.local,
		netrc: config.netrc,
		metadata,
		secrets,
		environ: extraEnviron,
	});

	const backend = deps.findBackend(config.backend);
	try {
		await backend.load();
	} catch (error) {
		throw new BackendError(`Could not load backend "${backend.name}": ${errorMessage(error)}`, {
			cause: error,
		});
	}

	await executePlan(plan, backend, {
		timeoutMs: config.timeout,
		run: deps.run,
		tracer: deps.tracer,
		logger: deps.logger,
		interrupts: deps.interrupts,
		output: deps.output,
	});
}
