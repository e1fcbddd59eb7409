import { existsSync, readdirSync } from "node:fs";
import { extname, join, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { Tool } from "./types.js";

// Plain Node imports the plugins, so they must be compiled JavaScript.
const PLUGIN_EXTENSIONS = new Set([".js", ".mjs"]);

export interface PluginLoadError {
	file: string;
	error: string;
}

export interface PluginLoadResult {
	tools: Tool[];
	errors: PluginLoadError[];
}

export function isTool(value: unknown): value is Tool {
	if (value === null || typeof value !== "object") {
		return false;
	}
	return (
		"name" in value &&
		typeof value.name === "string" &&
		"description" in value &&
		typeof value.description === "string" &&
		"parameters" in value &&
		typeof value.parameters === "object" &&
		value.parameters !== null &&
		"execute" in value &&
		typeof value.execute === "function"
	);
}

function toolsFromExport(exported: unknown): Tool[] {
	if (Array.isArray(exported)) {
		return exported.filter(isTool);
	}
	return isTool(exported) ? [exported] : [];
}

async function loadPluginFile(filePath: string): Promise<Tool[]> {
	try {
		const mod: unknown = await import(pathToFileURL(filePath).href);
		if (mod === null || typeof mod !== "object" || !("default" in mod)) {
			return [];
		}
		return toolsFromExport(mod.default);
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new Error(`Failed to load plugin ${filePath}: ${message}`);
	}
}

/**
 * Imports every plugin module in `dir`. A module contributes the tool (or
 * array of tools) it default-exports; anything else is ignored. A missing
 * directory yields no tools.
 */
export async function loadPlugins(dir: string): Promise<PluginLoadResult> {
	const result: PluginLoadResult = { tools: [], errors: [] };
	const root = resolve(dir);

	if (!existsSync(root)) {
		return result;
	}

	const files = readdirSync(root)
		.filter((file) => PLUGIN_EXTENSIONS.has(extname(file)))
		.sort();

	for (const file of files) {
		try {
			result.tools.push(...(await loadPluginFile(join(root, file))));
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			result.errors.push({ file, error: message });
			console.warn(`[Plugins] Failed to load plugin from ${file}: ${message}`);
		}
	}

	if (result.errors.length > 0) {
		console.warn(
			`[Plugins] Failed to load ${result.errors.length} plugin(s): ${result.errors.map((e) => e.file).join(", ")}`,
		);
	}

	return result;
}
