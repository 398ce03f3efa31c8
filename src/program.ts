import { userInfo } from "node:os";
import { Command, CommanderError } from "commander";
import { powerCommand, reportFailure } from "./commands/power";
import { getConfigDir, type HpmConfig, loadConfig } from "./lib/config";
import { InvalidInvocationError } from "./lib/errors";
import { type ActionPrompter, createDefaultPrompter } from "./lib/prompt";
import { ACTIONS } from "./types/action";
import { type Spawner, spawnCommand } from "./utils/process";
import { createReporter, PROGRAM, type Reporter, setSilentMode } from "./utils/ui";

export const VERSION = "0.1.0";

interface CliOptions {
	interactive?: boolean;
	silent?: boolean;
}

/** Everything runCli touches outside the process, replaceable in tests. */
export interface CliDeps {
	spawner?: Spawner;
	prompter?: ActionPrompter;
	reporter?: Reporter;
	config?: HpmConfig;
	env?: NodeJS.ProcessEnv;
}

/**
 * The account `logout` terminates: $USER, or the OS account when unset.
 */
export function resolveUser(env: NodeJS.ProcessEnv): string {
	return env.USER || userInfo().username;
}

function formatCommandsHelp(): string {
	const width = Math.max(...ACTIONS.map((a) => a.name.length));
	const rows = ACTIONS.map((a) => `  ${a.name.padEnd(width)}  ${a.description}`);
	return `\nCommands:\n${rows.join("\n")}\n`;
}

function toInvalidInvocation(error: CommanderError): InvalidInvocationError {
	return new InvalidInvocationError(error.message.replace(/^error:\s*/, ""));
}

/**
 * Parse argv and run the requested power action.
 * Resolves with the exit code; help and version resolve with 0.
 */
export async function runCli(
	argv: readonly string[],
	deps: CliDeps = {},
): Promise<number> {
	const reporter = deps.reporter ?? createReporter();
	const env = deps.env ?? process.env;
	const config =
		deps.config ??
		loadConfig({ configDir: getConfigDir(env), warn: reporter.error });
	let exitCode = 0;

	const program = new Command()
		.name(PROGRAM)
		.description("Shut down, restart or log out through systemd")
		.version(VERSION)
		.argument("[command]", "Action to perform (kill, restart, logout)")
		.option("-i, --interactive", "Choose the action from a menu")
		.option("-s, --silent", "Suppress progress output")
		.allowExcessArguments(false)
		.exitOverride()
		.configureOutput({
			writeOut: (str) => reporter.forward(str),
			writeErr: (str) => reporter.forward(str),
			outputError: () => {},
		})
		.addHelpText("after", formatCommandsHelp())
		.action(async (command: string | undefined, options: CliOptions) => {
			setSilentMode(options.silent === true || config.general.silent);

			exitCode = await powerCommand(
				{ command, interactive: options.interactive === true },
				{
					spawner: deps.spawner ?? spawnCommand,
					prompter:
						deps.prompter ??
						createDefaultPrompter(config.interactive.maxAttempts),
					reporter,
					context: {
						serviceManager: config.commands.serviceManager,
						sessionManager: config.commands.sessionManager,
						user: resolveUser(env),
					},
				},
			);
		});

	try {
		await program.parseAsync([...argv]);
	} catch (error) {
		if (!(error instanceof CommanderError)) {
			throw error;
		}
		if (error.exitCode === 0) {
			return 0;
		}
		return reportFailure(toInvalidInvocation(error), reporter);
	}

	return exitCode;
}
