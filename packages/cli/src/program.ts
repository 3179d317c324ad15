import { Command } from "commander";
import { createMergeCommand } from "./commands/merge.js";
import { createSplitCommand } from "./commands/split.js";
import { version } from "./version.js";

/**
 * Build the codebundle command tree.
 */
export function createProgram(): Command {
  return new Command()
    .name("codebundle")
    .description("Bundle a source tree into one annotated text file and split it back")
    .version(version)
    .addCommand(createMergeCommand())
    .addCommand(createSplitCommand());
}
