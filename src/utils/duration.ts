const UNIT_MS: Record<string, number> = {
	ms: 1,
	s: 1000,
	m: 60_000,
	h: 3_600_000,
};

/**
 * Parses durations such as `90s`, `1h30m` or `250ms` into milliseconds. A
 * bare number is read as milliseconds. Returns null when the input is not a
 * duration.
 */
export function parseDuration(input: string): number | null {
	const value = input.trim();
	if (/^\d+$/.test(value)) {
		return Number(value);
	}
	if (!/^(\d+(\.\d+)?(ms|s|m|h))+$/.test(value)) {
		return null;
	}

	let total = 0;
	for (const match of value.matchAll(/(\d+(?:\.\d+)?)(ms|s|m|h)/g)) {
		total += Number(match[1]) * UNIT_MS[match[2]];
	}
	return Math.round(total);
}
