import { CommanderError } from "commander";
import { chainContains, findInChain } from "./chain";

/**
 * Sentinel for "help was requested". `node:util` `parseArgs` has no sentinel
 * of its own, so argument handlers built on it throw (or wrap) this one.
 */
export const ErrHelp: Error = new Error("help requested");

const commanderHelpCodes: ReadonlySet<string> = new Set([
  "commander.helpDisplayed",
  "commander.help",
]);

function isCommanderHelp(link: unknown): boolean {
  return link instanceof CommanderError && commanderHelpCodes.has(link.code);
}

export function isHelpRequested(err: unknown): boolean {
  return chainContains(err, ErrHelp) || findInChain(err, isCommanderHelp) !== undefined;
}
