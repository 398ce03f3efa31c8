/**
 * Configuration file management for hpm
 *
 * Reads the global ~/.hpm/config.json. The file is optional; missing
 * keys fall back to the defaults below.
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

const CONFIG_DIR = ".hpm";
const JSON_CONFIG_FILE = "config.json";

export const HpmConfigSchema = z.object({
	commands: z
		.object({
			serviceManager: z.string().min(1, "serviceManager must not be empty"),
			sessionManager: z.string().min(1, "sessionManager must not be empty"),
		})
		.partial()
		.optional(),
	interactive: z
		.object({
			maxAttempts: z.number().int().positive(),
		})
		.partial()
		.optional(),
	general: z
		.object({
			silent: z.boolean(),
		})
		.partial()
		.optional(),
});

export type PartialHpmConfig = z.infer<typeof HpmConfigSchema>;

export interface HpmConfig {
	commands: {
		serviceManager: string;
		sessionManager: string;
	};
	interactive: {
		maxAttempts: number;
	};
	general: {
		silent: boolean;
	};
}

export const DEFAULT_CONFIG: HpmConfig = {
	commands: {
		serviceManager: "systemctl",
		sessionManager: "loginctl",
	},
	interactive: {
		maxAttempts: 3,
	},
	general: {
		silent: false,
	},
};

/**
 * Merge a file config over the defaults, one level deep.
 */
export function mergeConfig(
	base: HpmConfig,
	override: PartialHpmConfig,
): HpmConfig {
	return {
		commands: { ...base.commands, ...override.commands },
		interactive: { ...base.interactive, ...override.interactive },
		general: { ...base.general, ...override.general },
	};
}

/**
 * Directory holding config.json: $HPM_CONFIG_DIR, or ~/.hpm
 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
	return env.HPM_CONFIG_DIR || join(homedir(), CONFIG_DIR);
}

export interface LoadConfigOptions {
	configDir?: string;
	warn?: (message: string) => void;
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
		.join("; ");
}

/**
 * Load the JSON config:
 * 1. Start with defaults
 * 2. Merge <configDir>/config.json if it exists and is valid
 *
 * A file that cannot be read or does not validate is reported through
 * `warn` and ignored.
 */
export function loadConfig(options: LoadConfigOptions = {}): HpmConfig {
	const configDir = options.configDir ?? getConfigDir();
	const warn =
		options.warn ?? ((message: string) => console.warn(`[hpm] ${message}`));
	const configPath = join(configDir, JSON_CONFIG_FILE);

	if (!existsSync(configPath)) {
		return DEFAULT_CONFIG;
	}

	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(configPath, "utf-8"));
	} catch (error) {
		warn(
			`Warning: Could not parse config at '${configPath}'. Using defaults. Error: ${error instanceof Error ? error.message : String(error)}`,
		);
		return DEFAULT_CONFIG;
	}

	const parsed = HpmConfigSchema.safeParse(raw);
	if (!parsed.success) {
		warn(
			`Warning: Invalid config at '${configPath}'. Using defaults. ${formatIssues(parsed.error)}`,
		);
		return DEFAULT_CONFIG;
	}

	return mergeConfig(DEFAULT_CONFIG, parsed.data);
}
