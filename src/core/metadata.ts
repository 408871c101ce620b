import type { MatrixAxis } from "./types.js";

export type Author = {
	name: string;
	email: string;
	avatar: string;
};

export type Commit = {
	sha: string;
	ref: string;
	refspec: string;
	branch: string;
	message: string;
	author: Author;
};

export type Build = {
	number: number;
	parent: number;
	created: number;
	started: number;
	finished: number;
	status: string;
	event: string;
	link: string;
	target: string;
	commit: Commit;
};

export type BuildMetadata = {
	repo: {
		name: string;
		link: string;
		remote: string;
		private: boolean;
	};
	curr: Build;
	prev: Build;
	job: {
		number: number;
		matrix: MatrixAxis;
	};
	sys: {
		name: string;
		link: string;
		arch: string;
	};
};

type CommitInput = Partial<Omit<Commit, "author">> & { author?: Partial<Author> };
type BuildInput = Partial<Omit<Build, "commit">> & { commit?: CommitInput };

/**
 * Build-context fields as they arrive from configuration. Every field may be
 * missing; local runs rarely have what a CI server would supply.
 */
export type MetadataInput = {
	repo?: Partial<BuildMetadata["repo"]>;
	build?: BuildInput;
	prev?: BuildInput;
	job?: { number?: number };
	system?: Partial<BuildMetadata["sys"]>;
};

export function buildMetadata(input: MetadataInput, axis: MatrixAxis): BuildMetadata {
	return Object.freeze({
		repo: {
			name: input.repo?.name ?? "",
			link: input.repo?.link ?? "",
			remote: input.repo?.remote ?? "",
			private: input.repo?.private ?? false,
		},
		curr: toBuild(input.build),
		prev: toBuild(input.prev),
		job: {
			number: input.job?.number ?? 0,
			matrix: { ...axis },
		},
		sys: {
			name: input.system?.name ?? "",
			link: input.system?.link ?? "",
			arch: input.system?.arch ?? "",
		},
	});
}

function toBuild(build: BuildInput | undefined): Build {
	const commit = build?.commit;
	return {
		number: build?.number ?? 0,
		parent: build?.parent ?? 0,
		created: build?.created ?? 0,
		started: build?.started ?? 0,
		finished: build?.finished ?? 0,
		status: build?.status ?? "",
		event: build?.event ?? "",
		link: build?.link ?? "",
		target: build?.target ?? "",
		commit: {
			sha: commit?.sha ?? "",
			ref: commit?.ref ?? "",
			refspec: commit?.refspec ?? "",
			branch: commit?.branch ?? "",
			message: commit?.message ?? "",
			author: {
				name: commit?.author?.name ?? "",
				email: commit?.author?.email ?? "",
				avatar: commit?.author?.avatar ?? "",
			},
		},
	};
}

// Flattens metadata into the variables exposed to templates and steps.
export function metadataEnviron(metadata: BuildMetadata): Record<string, string> {
	return {
		CI: metadata.sys.name,
		CI_REPO_NAME: metadata.repo.name,
		CI_REPO_LINK: metadata.repo.link,
		CI_REPO_REMOTE: metadata.repo.remote,
		CI_REPO_PRIVATE: String(metadata.repo.private),
		...buildEnviron("CI_", metadata.curr),
		CI_PARENT_BUILD_NUMBER: String(metadata.curr.parent),
		CI_BUILD_TARGET: metadata.curr.target,
		...buildEnviron("CI_PREV_", metadata.prev),
		CI_JOB_NUMBER: String(metadata.job.number),
		CI_JOB_MATRIX: formatAxis(metadata.job.matrix),
		CI_SYSTEM_NAME: metadata.sys.name,
		CI_SYSTEM_LINK: metadata.sys.link,
		CI_SYSTEM_ARCH: metadata.sys.arch,
	};
}

function buildEnviron(prefix: string, build: Build): Record<string, string> {
	return {
		[`${prefix}BUILD_NUMBER`]: String(build.number),
		[`${prefix}BUILD_CREATED`]: String(build.created),
		[`${prefix}BUILD_STARTED`]: String(build.started),
		[`${prefix}BUILD_FINISHED`]: String(build.finished),
		[`${prefix}BUILD_STATUS`]: build.status,
		[`${prefix}BUILD_EVENT`]: build.event,
		[`${prefix}BUILD_LINK`]: build.link,
		[`${prefix}COMMIT_SHA`]: build.commit.sha,
		[`${prefix}COMMIT_REF`]: build.commit.ref,
		[`${prefix}COMMIT_REFSPEC`]: build.commit.refspec,
		[`${prefix}COMMIT_BRANCH`]: build.commit.branch,
		[`${prefix}COMMIT_MESSAGE`]: build.commit.message,
		[`${prefix}COMMIT_AUTHOR`]: build.commit.author.name,
		[`${prefix}COMMIT_AUTHOR_EMAIL`]: build.commit.author.email,
		[`${prefix}COMMIT_AUTHOR_AVATAR`]: build.commit.author.avatar,
	};
}

export function formatAxis(axis: MatrixAxis): string {
	return Object.entries(axis)
		.map(([key, value]) => `${key}=${value}`)
		.join(",");
}
