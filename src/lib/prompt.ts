import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import * as p from "@clack/prompts";
import { ACTIONS, type ActionName, isActionName } from "../types/action";
import { InteractionAbortedError } from "./errors";

/** Asks the user for one action. Never spawns anything itself. */
export type ActionPrompter = () => Promise<ActionName>;

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface LinePrompterOptions {
	input: Readable;
	output: Writable;
	maxAttempts?: number;
}

const NAME_WIDTH = Math.max(...ACTIONS.map((a) => a.name.length));

export function formatMenu(): string {
	const rows = ACTIONS.map(
		(a, i) => `  ${i + 1}) ${a.name.padEnd(NAME_WIDTH)}  ${a.description}`,
	);
	return ["Select the action to perform:", ...rows].join("\n");
}

/**
 * Parse one answer: a 1-based index into the menu or an action name.
 * @example parseSelection("2") // "restart"
 * @example parseSelection(" Logout ") // "logout"
 * @example parseSelection("0") // null
 */
export function parseSelection(answer: string): ActionName | null {
	const trimmed = answer.trim();

	if (/^\d+$/.test(trimmed)) {
		const entry = ACTIONS[Number(trimmed) - 1];
		return entry ? entry.name : null;
	}

	const name = trimmed.toLowerCase();
	return isActionName(name) ? name : null;
}

/**
 * Prompt on plain streams, one line per answer.
 * Used when stdin is not a terminal (pipes, scripts, tests).
 */
export function createLinePrompter(
	options: LinePrompterOptions,
): ActionPrompter {
	const { input, output, maxAttempts = DEFAULT_MAX_ATTEMPTS } = options;

	return async () => {
		const rl = createInterface({ input, terminal: false });
		const lines = rl[Symbol.asyncIterator]();

		try {
			output.write(`${formatMenu()}\n`);

			for (let attempt = 1; attempt <= maxAttempts; attempt++) {
				output.write("> ");
				const next = await lines.next();

				if (next.done) {
					output.write("\n");
					throw new InteractionAbortedError(
						"input closed before a selection was made",
					);
				}

				const selected = parseSelection(next.value);
				if (selected) {
					return selected;
				}

				output.write(
					`Invalid selection "${next.value.trim()}": enter a number from 1 to ${ACTIONS.length} or an action name\n`,
				);
			}

			throw new InteractionAbortedError(
				`no valid selection after ${maxAttempts} attempts`,
			);
		} finally {
			rl.close();
		}
	};
}

/** Arrow-key selection list for interactive terminals. */
export function createSelectPrompter(): ActionPrompter {
	const options: { value: ActionName; label: string; hint: string }[] =
		ACTIONS.map((a) => ({ value: a.name, label: a.title, hint: a.description }));

	return async () => {
		const selected = await p.select<ActionName>({
			message: "Select the action to perform:",
			options,
		});

		if (p.isCancel(selected)) {
			throw new InteractionAbortedError("selection cancelled");
		}

		return selected;
	};
}

export function createDefaultPrompter(maxAttempts: number): ActionPrompter {
	if (process.stdin.isTTY) {
		return createSelectPrompter();
	}

	return createLinePrompter({
		input: process.stdin,
		output: process.stdout,
		maxAttempts,
	});
}
