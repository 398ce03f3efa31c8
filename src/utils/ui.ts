import * as p from "@clack/prompts";
import color from "picocolors";

export const PROGRAM = "hpm";

let silentMode = false;

export function setSilentMode(silent: boolean) {
	silentMode = silent;
}

export function isSilentMode() {
	return silentMode;
}

/**
 * Where hpm talks to the user. Progress goes to stdout and is muted in
 * silent mode; errors and hints always go to stderr.
 */
export interface Reporter {
	step(message: string): void;
	success(message: string): void;
	error(message: string): void;
	hint(message: string): void;
	/** Raw output of the external utility. */
	forward(output: string): void;
}

export function createReporter(): Reporter {
	return {
		step: (message) => {
			if (!silentMode) p.log.step(message);
		},
		success: (message) => {
			if (!silentMode) p.log.success(color.green(message));
		},
		error: (message) => {
			process.stderr.write(`${color.red(`${PROGRAM}:`)} ${message}\n`);
		},
		hint: (message) => {
			process.stderr.write(`${color.dim(message)}\n`);
		},
		forward: (output) => {
			process.stdout.write(output);
		},
	};
}
