import { constants } from "node:os";
import { type Action, formatCommandLine } from "../types/action";
import type { Spawner } from "../utils/process";
import { ExecutionFailedError } from "./errors";

export interface ExecutionResult {
	action: Action;
	/** Standard output of the utility, forwarded to the user. */
	stdout: string;
}

const INTERRUPTED_EXIT_CODE = 130;

function isKnownSignal(
	signal: string,
): signal is keyof typeof constants.signals {
	return Object.prototype.hasOwnProperty.call(constants.signals, signal);
}

function signalExitCode(signal: string): number {
	return isKnownSignal(signal)
		? 128 + constants.signals[signal]
		: INTERRUPTED_EXIT_CODE;
}

/**
 * Run the utility behind `action` once and wait for it. Never retried.
 *
 * @throws ExecutionFailedError when the utility cannot be launched, exits
 * with a non-zero code, or is killed by a signal.
 */
export async function executeAction(
	action: Action,
	spawner: Spawner,
): Promise<ExecutionResult> {
	const commandLine = formatCommandLine(action);
	const outcome = await spawner(action.command, action.args);

	switch (outcome.kind) {
		case "exited": {
			if (outcome.code === 0) {
				return { action, stdout: outcome.stdout };
			}

			const stderr = outcome.stderr.trim();
			const message = `${commandLine} exited with code ${outcome.code}`;
			throw new ExecutionFailedError(
				stderr ? `${message}\n${stderr}` : message,
				action.command,
				outcome.code,
			);
		}
		case "signaled":
			throw new ExecutionFailedError(
				`${commandLine} was interrupted by ${outcome.signal}`,
				action.command,
				signalExitCode(outcome.signal),
			);
		case "failed-to-launch":
			throw new ExecutionFailedError(
				`failed to run ${action.command}: ${outcome.reason}`,
				action.command,
				1,
			);
	}
}
