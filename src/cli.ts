#!/usr/bin/env node

import { runCli } from "./program";
import { createReporter } from "./utils/ui";

runCli(process.argv).then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		createReporter().error(error instanceof Error ? error.message : String(error));
		process.exitCode = 1;
	},
);
