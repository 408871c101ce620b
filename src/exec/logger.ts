import { pipeline } from "node:stream/promises";
import type { LogFunc } from "../pipeline/runtime.js";
import type { LineSink } from "./line-writer.js";
import { LineWriter, formatLogLine } from "./line-writer.js";

/**
 * Builds the per-step log callback. Only the first part of a step's stream is
 * read; its bytes are split into lines and handed to the step's sink.
 */
export function createLogger(sinkFor: (alias: string) => LineSink): LogFunc {
	return async (step, reader) => {
		const part = await reader.nextPart();
		await pipeline(part.body, new LineWriter(step.alias, sinkFor(step.alias)));
	};
}

export const stderrSink: LineSink = (line) => {
	process.stderr.write(formatLogLine(line));
};

export const defaultLogger: LogFunc = createLogger(() => stderrSink);
