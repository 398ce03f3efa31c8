import { execFile } from "node:child_process";

/** How a spawned utility ended. */
export type SpawnOutcome =
	| { kind: "exited"; code: number; stdout: string; stderr: string }
	| { kind: "signaled"; signal: string }
	| { kind: "failed-to-launch"; reason: string };

/**
 * Runs `command` with `args` and waits for it to end.
 * Implementations resolve with an outcome and never reject.
 */
export type Spawner = (
	command: string,
	args: readonly string[],
) => Promise<SpawnOutcome>;

const MAX_BUFFER = 1024 * 1024;
const KILL_SIGNAL = "SIGTERM";
const MAX_BUFFER_EXCEEDED = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

interface ExecFailure {
	code?: unknown;
	signal?: unknown;
	killed?: unknown;
	message: string;
}

function describeLaunchFailure(code: string, message: string): string {
	switch (code) {
		case "ENOENT":
			return "command not found on PATH";
		case "EACCES":
			return "permission denied";
		default:
			return message;
	}
}

function toOutcome(
	error: ExecFailure | null,
	stdout: string,
	stderr: string,
): SpawnOutcome {
	if (!error) {
		return { kind: "exited", code: 0, stdout, stderr };
	}

	if (typeof error.code === "number") {
		return { kind: "exited", code: error.code, stdout, stderr };
	}

	if (typeof error.signal === "string") {
		return { kind: "signaled", signal: error.signal };
	}

	// execFile killed a child that had already started
	if (error.code === MAX_BUFFER_EXCEEDED || error.killed === true) {
		return { kind: "signaled", signal: KILL_SIGNAL };
	}

	if (typeof error.code === "string") {
		return {
			kind: "failed-to-launch",
			reason: describeLaunchFailure(error.code, error.message),
		};
	}

	return { kind: "failed-to-launch", reason: error.message };
}

/**
 * Default spawner: execFile without a shell, so the executable is looked
 * up on PATH and arguments are passed through untouched.
 */
export const spawnCommand: Spawner = (command, args) =>
	new Promise((resolve) => {
		execFile(
			command,
			[...args],
			{ maxBuffer: MAX_BUFFER, killSignal: KILL_SIGNAL, encoding: "utf8" },
			(error, stdout, stderr) => {
				resolve(toOutcome(error, stdout, stderr));
			},
		);
	});
