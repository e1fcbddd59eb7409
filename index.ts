#!/usr/bin/env node
import { main } from "./src/cli/index.js";

void main().then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		console.error("Fatal error:", err instanceof Error ? err.message : String(err));
		process.exit(1);
	},
);
