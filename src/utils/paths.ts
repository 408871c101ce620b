import path from "node:path";

/**
 * Rewrites a Windows path for container runtimes that expect POSIX paths:
 * `C:\Users\me\proj` becomes `/c/Users/me/proj`.
 */
export function convertPathForWindows(input: string): string {
	const drive = input.match(/^([A-Za-z]):/);
	if (drive) {
		const rest = input.slice(2).replace(/\\/g, "/");
		return `/${drive[1].toLowerCase()}${rest.startsWith("/") ? rest : `/${rest}`}`;
	}
	return input.replace(/\\/g, "/");
}

export function toBackendPath(input: string, platform: NodeJS.Platform = process.platform): string {
	return platform === "win32" ? convertPathForWindows(input) : input;
}

// Absolute parent directory of `target`, in the form backends expect.
export function workspaceRootFor(target: string, platform: NodeJS.Platform = process.platform): string {
	return toBackendPath(path.dirname(path.resolve(target)), platform);
}
