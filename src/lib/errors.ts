export type HpmErrorKind =
	| "invalid-invocation"
	| "interaction-aborted"
	| "execution-failed";

/**
 * Base class for every failure hpm reports to the user.
 * Each subclass maps to a fixed exit code, except execution failures,
 * which mirror the external utility.
 */
export abstract class HpmError extends Error {
	abstract readonly kind: HpmErrorKind;
	abstract readonly exitCode: number;

	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/** Malformed or ambiguous command-line arguments. Nothing was spawned. */
export class InvalidInvocationError extends HpmError {
	readonly kind = "invalid-invocation";
	readonly exitCode = 2;
}

/** The interactive prompt could not obtain a valid selection. */
export class InteractionAbortedError extends HpmError {
	readonly kind = "interaction-aborted";
	readonly exitCode = 1;
}

/** The external utility could not be launched or exited with a failure. */
export class ExecutionFailedError extends HpmError {
	readonly kind = "execution-failed";
	readonly exitCode: number;
	readonly command: string;

	constructor(message: string, command: string, exitCode: number) {
		super(message);
		this.command = command;
		this.exitCode = exitCode;
	}
}

export function isHpmError(error: unknown): error is HpmError {
	return error instanceof HpmError;
}

export function exitCodeFor(error: unknown): number {
	return isHpmError(error) ? error.exitCode : 1;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
