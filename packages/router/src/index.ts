/**
 * @switchboard/router - Main exports
 *
 * Stdio connection manager and command router for tool servers.
 */

export * from './downstream/index.js';
export { runCli, parseArgs, parseTarget, exitCodeFor, USAGE } from './cli.js';
export type { CliArgs, CliIo, ParsedCli } from './cli.js';
