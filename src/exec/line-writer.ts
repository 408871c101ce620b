import { StringDecoder } from "node:string_decoder";
import { Writable } from "node:stream";

export type LogLine = {
	step: string;
	position: number;
	elapsedSeconds: number;
	text: string;
};

export type LineSink = (line: LogLine) => void;

/**
 * Buffers bytes written for one step and hands complete lines to the sink. A
 * trailing line without a newline is emitted when the stream ends.
 */
export class LineWriter extends Writable {
	private buffer = "";
	private position = 0;
	private readonly decoder = new StringDecoder("utf8");
	private readonly startedAt = Date.now();

	constructor(
		readonly step: string,
		private readonly sink: LineSink,
	) {
		super();
	}

	override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
		const text = typeof chunk === "string" ? chunk : this.decoder.write(chunk);
		this.collect(text, false);
		callback();
	}

	override _final(callback: (error?: Error | null) => void): void {
		this.collect(this.decoder.end(), true);
		callback();
	}

	private collect(input: string, flushRemainder: boolean): void {
		this.buffer += input;
		const lines = this.buffer.split("\n");
		const remainder = lines.pop() ?? "";
		this.buffer = flushRemainder ? "" : remainder;

		for (const line of lines) {
			this.pushLine(line);
		}
		if (flushRemainder && remainder.length > 0) {
			this.pushLine(remainder);
		}
	}

	private pushLine(line: string): void {
		this.position += 1;
		this.sink({
			step: this.step,
			position: this.position,
			elapsedSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
			text: line.replace(/\r$/, ""),
		});
	}
}

export function formatLogLine(line: LogLine): string {
	return `[${line.step}:L${line.position}:${line.elapsedSeconds}s] ${line.text}\n`;
}
