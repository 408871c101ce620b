import { z } from "zod";
import { parseDuration } from "../utils/duration.js";

const AuthorSchema = z.object({
	name: z.string().optional(),
	email: z.string().optional(),
	avatar: z.string().optional(),
});

const CommitSchema = z.object({
	sha: z.string().optional(),
	ref: z.string().optional(),
	refspec: z.string().optional(),
	branch: z.string().optional(),
	message: z.string().optional(),
	author: AuthorSchema.optional(),
});

const BuildSchema = z.object({
	number: z.number().int().optional(),
	parent: z.number().int().optional(),
	created: z.number().int().optional(),
	started: z.number().int().optional(),
	finished: z.number().int().optional(),
	status: z.string().optional(),
	event: z.string().optional(),
	link: z.string().optional(),
	target: z.string().optional(),
	commit: CommitSchema.optional(),
});

const DurationSchema = z.union([z.number().nonnegative(), z.string()]).transform((value, ctx) => {
	if (typeof value === "number") {
		return value;
	}
	const parsed = parseDuration(value);
	if (parsed === null) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration: ${value}` });
		return z.NEVER;
	}
	return parsed;
});

export const ConfigSchema = z.object({
	repo: z
		.object({
			name: z.string().optional(),
			link: z.string().optional(),
			remote: z.string().optional(),
			private: z.boolean().optional(),
		})
		.default({}),
	build: BuildSchema.default({}),
	prev: BuildSchema.default({}),
	job: z.object({ number: z.number().int().optional() }).default({}),
	system: z
		.object({
			name: z.string().optional(),
			link: z.string().optional(),
			arch: z.string().optional(),
		})
		.default({}),
	timeout: DurationSchema.default("1h"),
	backend: z.string().default("auto-detect"),
	local: z.boolean().default(true),
	proxy: z.boolean().default(true),
	volumes: z.array(z.string()).default([]),
	privileged: z.array(z.string()).default(["plugins/docker", "plugins/gcr", "plugins/ecr"]),
	networks: z.array(z.string()).default([]),
	prefix: z.string().default("localflow"),
	netrc: z
		.object({
			username: z.string().default(""),
			password: z.string().default(""),
			machine: z.string().default(""),
		})
		.optional(),
	env: z.array(z.string()).default([]),
	workspace: z
		.object({
			base: z.string().default("/localflow"),
			path: z.string().default("src"),
		})
		.default({}),
});

export type ExecConfig = z.infer<typeof ConfigSchema>;
