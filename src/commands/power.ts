import {
	type ActionContext,
	buildAction,
	formatCommandLine,
} from "../types/action";
import { errorMessage, exitCodeFor, InvalidInvocationError } from "../lib/errors";
import { executeAction } from "../lib/executor";
import type { ActionPrompter } from "../lib/prompt";
import { type Invocation, resolveInvocation } from "../lib/resolver";
import type { Spawner } from "../utils/process";
import { PROGRAM, type Reporter } from "../utils/ui";

export interface PowerDeps {
	spawner: Spawner;
	prompter: ActionPrompter;
	reporter: Reporter;
	context: ActionContext;
}

export function reportFailure(error: unknown, reporter: Reporter): number {
	reporter.error(errorMessage(error));

	if (error instanceof InvalidInvocationError) {
		reporter.hint(`Run "${PROGRAM} --help" for usage.`);
	}

	return exitCodeFor(error);
}

/**
 * Resolve the invocation (prompting when asked to), run the matching
 * utility once, and return the exit code for the process.
 */
export async function powerCommand(
	invocation: Invocation,
	deps: PowerDeps,
): Promise<number> {
	const { spawner, prompter, reporter, context } = deps;

	try {
		const resolution = resolveInvocation(invocation);
		const name =
			resolution.kind === "prompt" ? await prompter() : resolution.name;
		const action = buildAction(name, context);

		reporter.step(`Running ${formatCommandLine(action)}`);
		const result = await executeAction(action, spawner);

		if (result.stdout) {
			reporter.forward(result.stdout);
		}
		reporter.success(`${action.title} requested`);
		return 0;
	} catch (error) {
		return reportFailure(error, reporter);
	}
}
