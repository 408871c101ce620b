import { LintError } from "./errors.js";
import type { Definition, DefinitionStep } from "./types.js";

export type LintOptions = {
	trusted: boolean;
};

type Rule = {
	id: string;
	untrustedOnly: boolean;
	check: (step: DefinitionStep, section: string) => string | null;
};

const STEP_RULES: Rule[] = [
	{
		id: "image-required",
		untrustedOnly: false,
		check: (step, section) =>
			step.image.trim() === "" ? `Invalid or missing image in ${section} "${step.name}"` : null,
	},
	{
		id: "commands-entrypoint",
		untrustedOnly: false,
		check: (step, section) =>
			step.commands.length > 0 && step.entrypoint.length > 0
				? `Cannot configure both commands and entrypoint in ${section} "${step.name}"`
				: null,
	},
	{
		id: "privileged",
		untrustedOnly: true,
		check: (step) =>
			step.privileged ? `Insufficient privileges to use privileged mode in "${step.name}"` : null,
	},
	{
		id: "volumes",
		untrustedOnly: true,
		check: (step) =>
			step.volumes.length > 0 ? `Insufficient privileges to use volumes in "${step.name}"` : null,
	},
	{
		id: "network-mode",
		untrustedOnly: true,
		check: (step) =>
			step.networkMode ? `Insufficient privileges to use network_mode in "${step.name}"` : null,
	},
];

/**
 * Checks a parsed definition and throws on the first violated rule. Rules
 * marked untrustedOnly are skipped for trusted callers.
 */
export function lint(definition: Definition, options: LintOptions): void {
	if (definition.steps.length === 0) {
		throw new LintError("steps-required", "Definition must contain at least one step");
	}

	const sections: [string, DefinitionStep[]][] = [
		["clone", definition.clone],
		["service", definition.services],
		["step", definition.steps],
	];
	for (const [section, steps] of sections) {
		for (const step of steps) {
			for (const rule of STEP_RULES) {
				if (rule.untrustedOnly && options.trusted) {
					continue;
				}
				const violation = rule.check(step, section);
				if (violation) {
					throw new LintError(rule.id, violation);
				}
			}
		}
	}

	const serviceNames = new Set(definition.services.map((service) => service.name));
	const clash = definition.steps.find((step) => serviceNames.has(step.name));
	if (clash) {
		throw new LintError("unique-names", `Step "${clash.name}" has the same name as a service`);
	}
}
