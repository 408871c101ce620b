// Turns a step's commands into a POSIX shell script that echoes each command
// before running it and stops at the first failure.
export function generateScript(commands: string[]): string {
	const lines = ["set -e"];
	for (const command of commands) {
		lines.push(`echo + ${shellQuote(command)}`);
		lines.push(command);
	}
	return `${lines.join("\n")}\n`;
}

export function shellQuote(value: string): string {
	return `'${value.replace(/'/g, `'\\''`)}'`;
}
