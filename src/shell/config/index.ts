export type { CliCommand } from "./cli.js";
export { parseCliArgs } from "./cli.js";
export { HELP_TEXT } from "./help.js";
