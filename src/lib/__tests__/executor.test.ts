import { describe, expect, it, vi } from "vitest";
import { type Action, buildAction } from "../../types/action";
import type { SpawnOutcome, Spawner } from "../../utils/process";
import { ExecutionFailedError } from "../errors";
import { executeAction } from "../executor";

const context = {
	serviceManager: "systemctl",
	sessionManager: "loginctl",
	user: "tester",
};

function fakeSpawner(outcome: SpawnOutcome) {
	return vi.fn<Spawner>(async () => outcome);
}

async function captureFailure(
	action: Action,
	spawner: Spawner,
): Promise<ExecutionFailedError> {
	try {
		await executeAction(action, spawner);
	} catch (error) {
		if (error instanceof ExecutionFailedError) {
			return error;
		}
		throw error;
	}
	throw new Error("expected executeAction to fail");
}

describe("executeAction", () => {
	it("spawns the utility once with its fixed arguments", async () => {
		const spawner = fakeSpawner({
			kind: "exited",
			code: 0,
			stdout: "",
			stderr: "",
		});

		await executeAction(buildAction("restart", context), spawner);

		expect(spawner).toHaveBeenCalledTimes(1);
		expect(spawner).toHaveBeenCalledWith("systemctl", ["reboot"]);
	});

	it.each(["kill", "restart", "logout"] as const)(
		"succeeds for %s when the utility exits 0",
		async (name) => {
			const spawner = fakeSpawner({
				kind: "exited",
				code: 0,
				stdout: "done\n",
				stderr: "",
			});
			const action = buildAction(name, context);

			await expect(executeAction(action, spawner)).resolves.toEqual({
				action,
				stdout: "done\n",
			});
		},
	);

	it("mirrors a non-zero exit code and keeps the utility's stderr", async () => {
		const spawner = fakeSpawner({
			kind: "exited",
			code: 3,
			stdout: "",
			stderr: "Access denied\n",
		});

		const error = await captureFailure(buildAction("kill", context), spawner);

		expect(error.exitCode).toBe(3);
		expect(error.command).toBe("systemctl");
		expect(error.kind).toBe("execution-failed");
		expect(error.message).toBe(
			"systemctl poweroff exited with code 3\nAccess denied",
		);
	});

	it("omits empty stderr from the message", async () => {
		const spawner = fakeSpawner({
			kind: "exited",
			code: 1,
			stdout: "",
			stderr: "  \n",
		});

		const error = await captureFailure(buildAction("logout", context), spawner);

		expect(error.message).toBe(
			"loginctl terminate-user tester exited with code 1",
		);
	});

	it("maps a known signal to 128 + its number", async () => {
		const spawner = fakeSpawner({ kind: "signaled", signal: "SIGTERM" });

		const error = await captureFailure(buildAction("kill", context), spawner);

		expect(error.exitCode).toBe(143);
		expect(error.message).toBe("systemctl poweroff was interrupted by SIGTERM");
	});

	it("falls back to 130 for an unknown signal", async () => {
		const spawner = fakeSpawner({ kind: "signaled", signal: "SIGBOGUS" });

		const error = await captureFailure(buildAction("kill", context), spawner);

		expect(error.exitCode).toBe(130);
	});

	it("reports a launch failure with exit code 1", async () => {
		const spawner = fakeSpawner({
			kind: "failed-to-launch",
			reason: "command not found on PATH",
		});

		const error = await captureFailure(buildAction("restart", context), spawner);

		expect(error.exitCode).toBe(1);
		expect(error.message).toBe(
			"failed to run systemctl: command not found on PATH",
		);
	});

	it("does not retry after a failure", async () => {
		const spawner = fakeSpawner({
			kind: "exited",
			code: 5,
			stdout: "",
			stderr: "",
		});

		await expect(
			executeAction(buildAction("kill", context), spawner),
		).rejects.toBeInstanceOf(ExecutionFailedError);
		expect(spawner).toHaveBeenCalledTimes(1);
	});
});
