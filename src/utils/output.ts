import { log } from "@clack/prompts";

export type Output = {
	print(line: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
};

export const consoleOutput: Output = {
	print: (line) => {
		process.stdout.write(`${line}\n`);
	},
	info: (message) => log.info(message),
	warn: (message) => log.warn(message),
	error: (message) => log.error(message),
};
