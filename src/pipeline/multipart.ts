import type { Readable } from "node:stream";

export type Part = {
	headers: Record<string, string>;
	body: Readable;
};

export interface MultipartReader {
	nextPart(): Promise<Part>;
}

export class NoMorePartsError extends Error {
	constructor() {
		super("multipart: no more parts");
		this.name = "NoMorePartsError";
	}
}

// Serves parts in order; once exhausted every call rejects.
export function createMultipartReader(parts: Iterable<Part>): MultipartReader {
	const iterator = parts[Symbol.iterator]();
	return {
		async nextPart() {
			const next = iterator.next();
			if (next.done) {
				throw new NoMorePartsError();
			}
			return next.value;
		},
	};
}

export function singlePartReader(body: Readable, headers: Record<string, string> = {}): MultipartReader {
	return createMultipartReader([{ headers, body }]);
}
