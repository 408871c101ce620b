import { InputError } from "../core/errors.js";
import type { BuildMetadata } from "../core/metadata.js";
import { metadataEnviron } from "../core/metadata.js";
import type { Secret } from "../core/types.js";

export type AxisEnvironment = {
	environ: Record<string, string>;
	secrets: Secret[];
};

/**
 * Metadata variables plus the axis's matrix values. A matrix variable that
 * shares a name with a metadata variable replaces it; every matrix value is
 * also offered as a secret of the same name.
 */
export function axisEnvironment(metadata: BuildMetadata): AxisEnvironment {
	const environ = metadataEnviron(metadata);
	const secrets: Secret[] = [];
	for (const [name, value] of Object.entries(metadata.job.matrix)) {
		environ[name] = value;
		secrets.push({ name, value });
	}
	return { environ, secrets };
}

// Splits each KEY=VALUE on its first `=`.
export function parseEnvOverrides(entries: string[]): Record<string, string> {
	const environ: Record<string, string> = {};
	for (const entry of entries) {
		const separator = entry.indexOf("=");
		if (separator === -1) {
			throw new InputError(`Invalid environment override "${entry}": expected KEY=VALUE`);
		}
		environ[entry.slice(0, separator)] = entry.slice(separator + 1);
	}
	return environ;
}
