import type { Backend } from "../core/engine.js";
import { BackendError } from "../core/errors.js";
import { DockerBackend } from "./docker/docker-backend.js";
import { LocalBackend } from "./local/local-backend.js";

type BackendConstructor = new () => Backend;

export const AUTO_DETECT = "auto-detect";

// Registration order is the auto-detect preference order.
const BACKEND_REGISTRY: Record<string, BackendConstructor> = {
	docker: DockerBackend,
	local: LocalBackend,
};

export function findBackend(name: string): Backend {
	const normalized = name.trim().toLowerCase();
	if (normalized === AUTO_DETECT) {
		for (const ctor of Object.values(BACKEND_REGISTRY)) {
			const backend = new ctor();
			if (backend.isAvailable()) {
				return backend;
			}
		}
		throw new BackendError("Could not auto-detect a backend: none of the registered backends is available");
	}

	const ctor = BACKEND_REGISTRY[normalized];
	if (!ctor) {
		throw new BackendError(
			`Unsupported backend "${name}". Available backends: ${listRegisteredBackends().join(", ")}`,
		);
	}
	return new ctor();
}

export function listRegisteredBackends(): string[] {
	return Object.keys(BACKEND_REGISTRY);
}
