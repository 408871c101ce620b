import YAML from "yaml";
import { z } from "zod";
import type { MatrixAxis } from "./types.js";

export const MAX_MATRIX_VARIABLES = 10;
export const MAX_MATRIX_AXES = 25;

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

const MatrixSchema = z.union([
	z
		.object({ include: z.array(z.record(scalar)) })
		.strict()
		.transform((value) => ({ kind: "include" as const, axes: value.include })),
	z
		.record(z.array(scalar))
		.transform((value) => ({ kind: "product" as const, variables: value })),
]);

const DocumentSchema = z
	.object({
		matrix: MatrixSchema.optional(),
	})
	.passthrough()
	.nullable();

/**
 * Reads the top-level `matrix` block of a raw definition and expands it into
 * one axis per combination. Definitions without a matrix yield no axes.
 */
export function parseMatrix(raw: string): MatrixAxis[] {
	const parsed = DocumentSchema.parse(YAML.parse(raw));
	const matrix = parsed?.matrix;
	if (!matrix) {
		return [];
	}
	if (matrix.kind === "include") {
		return matrix.axes.slice(0, MAX_MATRIX_AXES).map((axis) => ({ ...axis }));
	}
	return expandAxes(matrix.variables);
}

// The first declared variable varies slowest.
export function expandAxes(matrix: Record<string, string[]>): MatrixAxis[] {
	const names = Object.keys(matrix).slice(0, MAX_MATRIX_VARIABLES);
	if (names.length === 0) {
		return [];
	}
	const total = names.reduce((count, name) => count * matrix[name].length, 1);

	const axes: MatrixAxis[] = [];
	for (let index = 0; index < Math.min(total, MAX_MATRIX_AXES); index += 1) {
		const axis: MatrixAxis = {};
		let divisor = total;
		for (const name of names) {
			const values = matrix[name];
			divisor = divisor / values.length;
			axis[name] = values[Math.floor(index / divisor) % values.length];
		}
		axes.push(axis);
	}
	return axes;
}
