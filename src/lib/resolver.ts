import { type ActionName, isActionName } from "../types/action";
import { InvalidInvocationError } from "./errors";

/** What commander parsed from argv. */
export interface Invocation {
	command?: string;
	interactive: boolean;
}

export type Resolution =
	| { kind: "action"; name: ActionName }
	| { kind: "prompt" };

/**
 * Map a parsed invocation to an action, or to a request to prompt for one.
 * A subcommand combined with --interactive is rejected rather than letting
 * either one win.
 */
export function resolveInvocation(invocation: Invocation): Resolution {
	const { command, interactive } = invocation;

	if (command === undefined) {
		if (interactive) {
			return { kind: "prompt" };
		}
		throw new InvalidInvocationError("no command given");
	}

	if (!isActionName(command)) {
		throw new InvalidInvocationError(`unknown command "${command}"`);
	}

	if (interactive) {
		throw new InvalidInvocationError(
			`"${command}" cannot be combined with --interactive`,
		);
	}

	return { kind: "action", name: command };
}
