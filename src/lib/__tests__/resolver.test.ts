import { describe, expect, it } from "vitest";
import { InvalidInvocationError } from "../errors";
import { resolveInvocation } from "../resolver";

describe("resolveInvocation", () => {
	it.each(["kill", "restart", "logout"] as const)(
		"resolves %s directly",
		(command) => {
			expect(resolveInvocation({ command, interactive: false })).toEqual({
				kind: "action",
				name: command,
			});
		},
	);

	it("asks for a prompt when only --interactive is given", () => {
		expect(resolveInvocation({ interactive: true })).toEqual({
			kind: "prompt",
		});
	});

	it("rejects an unknown command and names it", () => {
		expect(() => resolveInvocation({ command: "foo", interactive: false })).toThrow(
			new InvalidInvocationError('unknown command "foo"'),
		);
	});

	it("rejects a command combined with --interactive", () => {
		expect(() =>
			resolveInvocation({ command: "kill", interactive: true }),
		).toThrow('"kill" cannot be combined with --interactive');
	});

	it("reports an unknown command before a flag conflict", () => {
		expect(() =>
			resolveInvocation({ command: "foo", interactive: true }),
		).toThrow('unknown command "foo"');
	});

	it("rejects an empty invocation", () => {
		expect(() => resolveInvocation({ interactive: false })).toThrow(
			"no command given",
		);
	});

	it("is case-sensitive", () => {
		expect(() =>
			resolveInvocation({ command: "KILL", interactive: false }),
		).toThrow(InvalidInvocationError);
	});
});
