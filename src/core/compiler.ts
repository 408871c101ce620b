import path from "node:path";
import type { BuildMetadata } from "./metadata.js";
import { metadataEnviron } from "./metadata.js";
import { generateScript } from "./script.js";
import type {
	CompiledPlan,
	CompiledStage,
	CompiledStep,
	Definition,
	DefinitionStep,
	Secret,
	Workspace,
} from "./types.js";

export type NetrcCredentials = {
	username: string;
	password: string;
	machine: string;
};

export type CompileOptions = {
	escalated: string[];
	volumes: string[];
	workspace: Workspace;
	networks: string[];
	prefix: string;
	proxy: boolean;
	local: boolean;
	netrc?: NetrcCredentials;
	metadata: BuildMetadata;
	secrets: Secret[];
	environ: Record<string, string>;
	hostEnv?: Record<string, string | undefined>;
};

const PROXY_VARIABLES = ["no_proxy", "http_proxy", "https_proxy"];

const DEFAULT_CLONE: DefinitionStep = {
	name: "clone",
	image: "alpine/git:latest",
	commands: [
		"git init",
		'git remote add origin "$CI_REPO_REMOTE"',
		'git fetch origin "$CI_COMMIT_REF"',
		'git checkout -qf "${CI_COMMIT_SHA:-FETCH_HEAD}"',
	],
	entrypoint: [],
	environment: {},
	secrets: [],
	privileged: false,
	volumes: [],
	networks: [],
	detach: false,
	pull: false,
	when: { status: ["success"] },
};

type StepKind = "clone" | "service" | "step";

/**
 * Compiles a linted definition into a backend-agnostic plan: a clone stage
 * unless running locally, one stage holding every service, then one stage
 * per step in declaration order.
 */
export function compile(definition: Definition, options: CompileOptions): CompiledPlan {
	const workspace: Workspace = {
		base: definition.workspace.base || options.workspace.base,
		path: definition.workspace.path || options.workspace.path,
	};
	const defaultName = `${options.prefix}_default`;
	const stages: CompiledStage[] = [];

	if (!options.local) {
		const clone = definition.clone.length > 0 ? definition.clone : [DEFAULT_CLONE];
		stages.push({
			name: `${options.prefix}_clone`,
			alias: "clone",
			steps: clone.map((step, index) =>
				compileStep(step, "clone", `${options.prefix}_clone_${index}`, workspace, options),
			),
		});
	}

	if (definition.services.length > 0) {
		stages.push({
			name: `${options.prefix}_services`,
			alias: "services",
			steps: definition.services.map((service, index) =>
				compileStep(service, "service", `${options.prefix}_services_${index}`, workspace, options),
			),
		});
	}

	definition.steps.forEach((step, index) => {
		stages.push({
			name: `${options.prefix}_stage_${index}`,
			alias: step.name,
			steps: [compileStep(step, "step", `${options.prefix}_step_${index}`, workspace, options)],
		});
	});

	return {
		volumes: [{ name: defaultName }],
		networks: [{ name: defaultName }],
		secrets: options.secrets,
		stages,
	};
}

function compileStep(
	step: DefinitionStep,
	kind: StepKind,
	name: string,
	workspace: Workspace,
	options: CompileOptions,
): CompiledStep {
	const workingDir = path.posix.join(workspace.base, workspace.path);
	const image = normalizeImage(step.image);

	const environment: Record<string, string> = {
		...metadataEnviron(options.metadata),
		CI_WORKSPACE: workingDir,
		CI_WORKSPACE_BASE: workspace.base,
		CI_WORKSPACE_PATH: workspace.path,
		...(options.proxy ? proxyEnviron(options.hostEnv ?? process.env) : {}),
		...step.environment,
		...options.environ,
		...requestedSecrets(step.secrets, options.secrets),
	};
	if (kind === "clone" && options.netrc) {
		environment.CI_NETRC_USERNAME = options.netrc.username;
		environment.CI_NETRC_PASSWORD = options.netrc.password;
		environment.CI_NETRC_MACHINE = options.netrc.machine;
	}

	let entrypoint = step.entrypoint;
	let command: string[] = [];
	if (step.commands.length > 0) {
		entrypoint = ["/bin/sh", "-c"];
		command = [generateScript(step.commands)];
	}

	const detached = kind === "service" || step.detach;
	return {
		name,
		alias: step.name,
		image,
		pull: step.pull,
		detached,
		privileged: step.privileged || options.escalated.includes(imageName(image)),
		workingDir,
		environment,
		entrypoint,
		command,
		volumes: [...step.volumes, ...options.volumes],
		networks: [`${options.prefix}_default`, ...step.networks, ...options.networks],
		networkMode: step.networkMode,
		onSuccess: kind === "service" || step.when.status.includes("success"),
		onFailure: kind === "service" || step.when.status.includes("failure"),
	};
}

function requestedSecrets(requested: string[], secrets: Secret[]): Record<string, string> {
	const environment: Record<string, string> = {};
	for (const name of requested) {
		const secret = secrets.find((item) => item.name.toLowerCase() === name.toLowerCase());
		if (secret) {
			environment[name.toUpperCase()] = secret.value;
		}
	}
	return environment;
}

function proxyEnviron(hostEnv: Record<string, string | undefined>): Record<string, string> {
	const environment: Record<string, string> = {};
	for (const variable of PROXY_VARIABLES) {
		const value = hostEnv[variable] ?? hostEnv[variable.toUpperCase()];
		if (value) {
			environment[variable] = value;
			environment[variable.toUpperCase()] = value;
		}
	}
	return environment;
}

export function normalizeImage(image: string): string {
	const trimmed = image.trim();
	const lastSegment = trimmed.slice(trimmed.lastIndexOf("/") + 1);
	if (trimmed.includes("@") || lastSegment.includes(":")) {
		return trimmed;
	}
	return `${trimmed}:latest`;
}

export function imageName(image: string): string {
	const withoutDigest = image.split("@")[0];
	const slash = withoutDigest.lastIndexOf("/");
	const colon = withoutDigest.lastIndexOf(":");
	return colon > slash ? withoutDigest.slice(0, colon) : withoutDigest;
}
