/**
 * Power actions hpm can dispatch, in display order.
 *
 * The order is shared by the subcommand list, the help text and the
 * interactive prompt, so prompt index i always means subcommand i.
 */
export const ACTIONS = [
	{ name: "kill", title: "Kill", description: "Power off the system" },
	{ name: "restart", title: "Restart", description: "Restart the system" },
	{ name: "logout", title: "Logout", description: "Log out the current user" },
] as const;

export type ActionName = (typeof ACTIONS)[number]["name"];

export const ACTION_NAMES: readonly ActionName[] = ACTIONS.map((a) => a.name);

export interface Action {
	readonly name: ActionName;
	readonly title: string;
	readonly command: string;
	readonly args: readonly string[];
}

/** Utility names and the account that a resolved action binds to. */
export interface ActionContext {
	serviceManager: string;
	sessionManager: string;
	user: string;
}

export function isActionName(value: string): value is ActionName {
	return ACTION_NAMES.some((name) => name === value);
}

export function getActionTitle(name: ActionName): string {
	const entry = ACTIONS.find((a) => a.name === name);
	return entry ? entry.title : name;
}

export function buildAction(name: ActionName, context: ActionContext): Action {
	const title = getActionTitle(name);

	switch (name) {
		case "kill":
			return { name, title, command: context.serviceManager, args: ["poweroff"] };
		case "restart":
			return { name, title, command: context.serviceManager, args: ["reboot"] };
		case "logout":
			return {
				name,
				title,
				command: context.sessionManager,
				args: ["terminate-user", context.user],
			};
		default: {
			const unreachable: never = name;
			throw new Error(`Unhandled action: ${String(unreachable)}`);
		}
	}
}

export function formatCommandLine(action: Action): string {
	return [action.command, ...action.args].join(" ");
}
