import YAML from "yaml";
import { z } from "zod";
import { DefinitionError } from "./errors.js";
import type { Definition, DefinitionStep, StepStatus } from "./types.js";

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

const stringList = z
	.union([z.string(), z.array(scalar)])
	.transform((value) => (Array.isArray(value) ? value : [value]));

const environment = z.union([
	z.record(scalar),
	z.array(z.string()).transform((entries) =>
		Object.fromEntries(
			entries.map((entry) => {
				const separator = entry.indexOf("=");
				return separator === -1
					? [entry, ""]
					: [entry.slice(0, separator), entry.slice(separator + 1)];
			}),
		),
	),
]);

const status = z.enum(["success", "failure"]);

const StepSchema = z.object({
	name: z.string().optional(),
	image: z.string().default(""),
	commands: stringList.default([]),
	entrypoint: stringList.default([]),
	environment: environment.default({}),
	secrets: z.array(z.string()).default([]),
	privileged: z.boolean().default(false),
	volumes: z.array(z.string()).default([]),
	networks: z.array(z.string()).default([]),
	network_mode: z.string().optional(),
	detach: z.boolean().default(false),
	pull: z.boolean().default(false),
	when: z
		.object({
			status: z
				.union([status, z.array(status)])
				.transform((value) => (Array.isArray(value) ? value : [value]))
				.optional(),
		})
		.default({}),
	depends_on: stringList.optional(),
});

type StepYaml = z.infer<typeof StepSchema>;

const StepCollection = z
	.union([z.record(StepSchema.nullable()), z.array(StepSchema)])
	.default({});

const DefinitionSchema = z.object({
	workspace: z
		.object({
			base: z.string().default(""),
			path: z.string().default(""),
		})
		.default({}),
	clone: StepCollection,
	services: StepCollection,
	steps: StepCollection.optional(),
	pipeline: StepCollection.optional(),
});

/**
 * Parses resolved definition text. `source` only labels error messages.
 */
export function parseDefinition(text: string, source = "<definition>"): Definition {
	const doc = YAML.parseDocument(text);
	if (doc.errors.length > 0) {
		const error = doc.errors[0];
		const line = error.linePos?.[0]?.line ?? 0;
		const col = error.linePos?.[0]?.col ?? 0;
		throw new DefinitionError(`${source}:${line}:${col} ${error.message}`, { cause: error });
	}

	const result = DefinitionSchema.safeParse(doc.toJSON() ?? {});
	if (!result.success) {
		const issue = result.error.issues[0];
		const where = issue.path.length > 0 ? issue.path.join(".") : "document";
		throw new DefinitionError(`${source}: invalid ${where}: ${issue.message}`, {
			cause: result.error,
		});
	}

	const parsed = result.data;
	return {
		workspace: parsed.workspace,
		clone: toSteps(parsed.clone, "clone"),
		services: toSteps(parsed.services, "service"),
		steps: toSteps(parsed.steps ?? parsed.pipeline ?? {}, "step"),
	};
}

function toSteps(
	collection: Record<string, StepYaml | null> | StepYaml[],
	fallbackPrefix: string,
): DefinitionStep[] {
	const entries: [string, StepYaml | null][] = Array.isArray(collection)
		? collection.map((step, index) => [step.name ?? `${fallbackPrefix}-${index + 1}`, step])
		: Object.entries(collection);

	return entries.map(([key, step]) => toStep(key, step ?? StepSchema.parse({})));
}

function toStep(name: string, step: StepYaml): DefinitionStep {
	const when: StepStatus[] = step.when.status ?? ["success"];
	return {
		name,
		image: step.image,
		commands: step.commands,
		entrypoint: step.entrypoint,
		environment: step.environment,
		secrets: step.secrets,
		privileged: step.privileged,
		volumes: step.volumes,
		networks: step.networks,
		networkMode: step.network_mode,
		detach: step.detach,
		pull: step.pull,
		when: { status: when },
	};
}
