export type RedactRule = {
	flag: string;
	keepKey: boolean;
};

const DEFAULT_RULES: RedactRule[] = [
	{ flag: "-e", keepKey: true },
	{ flag: "--env", keepKey: true },
	{ flag: "--password", keepKey: false },
];

/**
 * Masks the value following each listed flag. For KEY=VALUE flags the key
 * stays readable.
 */
export function redactArgs(args: string[], rules: RedactRule[] = DEFAULT_RULES): string[] {
	const redacted = [...args];
	const byFlag = new Map(rules.map((rule) => [rule.flag, rule]));

	for (let i = 0; i < redacted.length; i += 1) {
		const current = redacted[i];
		const rule = byFlag.get(current);
		if (rule && i + 1 < redacted.length) {
			redacted[i + 1] = maskValue(redacted[i + 1], rule.keepKey);
			i += 1;
			continue;
		}
		for (const candidate of rules) {
			if (current.startsWith(`${candidate.flag}=`)) {
				const value = current.slice(candidate.flag.length + 1);
				redacted[i] = `${candidate.flag}=${maskValue(value, candidate.keepKey)}`;
				break;
			}
		}
	}

	return redacted;
}

function maskValue(value: string, keepKey: boolean): string {
	const separator = value.indexOf("=");
	if (keepKey && separator !== -1) {
		return `${value.slice(0, separator)}=<redacted>`;
	}
	return "<redacted>";
}
