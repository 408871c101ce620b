export type MatrixAxis = Record<string, string>;

export type Secret = {
	name: string;
	value: string;
};

export type Workspace = {
	base: string;
	path: string;
};

export type StepStatus = "success" | "failure";

export type DefinitionStep = {
	name: string;
	image: string;
	commands: string[];
	entrypoint: string[];
	environment: Record<string, string>;
	secrets: string[];
	privileged: boolean;
	volumes: string[];
	networks: string[];
	networkMode?: string;
	detach: boolean;
	pull: boolean;
	when: { status: StepStatus[] };
};

export type Definition = {
	workspace: Workspace;
	clone: DefinitionStep[];
	services: DefinitionStep[];
	steps: DefinitionStep[];
};

export type CompiledStep = {
	name: string;
	alias: string;
	image: string;
	pull: boolean;
	detached: boolean;
	privileged: boolean;
	workingDir: string;
	environment: Record<string, string>;
	entrypoint: string[];
	command: string[];
	volumes: string[];
	networks: string[];
	networkMode?: string;
	onSuccess: boolean;
	onFailure: boolean;
};

export type CompiledStage = {
	name: string;
	alias: string;
	steps: CompiledStep[];
};

export type CompiledPlan = {
	volumes: { name: string }[];
	networks: { name: string }[];
	secrets: Secret[];
	stages: CompiledStage[];
};
