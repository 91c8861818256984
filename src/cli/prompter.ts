/**
 * Terminal I/O for the conversation loop.
 */

import * as readline from "node:readline";

export interface Prompter {
	/** Resolves to undefined when input has ended */
	input(prompt: string): Promise<string | undefined>;
	print(text: string): void;
	close(): void;
}

/**
 * Readline-backed prompter. Lines that arrive while nobody is waiting (piped
 * input) are queued so no turn is lost while an extraction is running.
 */
export function createTerminalPrompter(
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stdout,
): Prompter {
	const rl = readline.createInterface({ input, terminal: false });
	const queued: string[] = [];
	let waiting: ((line: string | undefined) => void) | undefined;
	let ended = false;

	rl.on("line", (line) => {
		if (waiting) {
			const resolve = waiting;
			waiting = undefined;
			resolve(line);
		} else {
			queued.push(line);
		}
	});
	rl.on("close", () => {
		ended = true;
		if (waiting) {
			const resolve = waiting;
			waiting = undefined;
			resolve(undefined);
		}
	});

	return {
		input(prompt) {
			output.write(prompt);
			const next = queued.shift();
			if (next !== undefined) return Promise.resolve(next);
			if (ended) return Promise.resolve(undefined);
			return new Promise((resolve) => {
				waiting = resolve;
			});
		},
		print(text) {
			output.write(`${text}\n`);
		},
		close() {
			rl.close();
		},
	};
}
