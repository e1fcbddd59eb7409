export { HELP_TEXT, main } from "./main.js";
export { parseArgs, type CliOptions, type ParsedArgs } from "./shared.js";
