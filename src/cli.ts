#!/usr/bin/env node
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { Command } from "commander";
import * as p from "@clack/prompts";
import pc from "picocolors";
import updateNotifier from "update-notifier";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { createPickerDisplay, createPreviewDisplay } from "./display.js";
import { CommitMessageGenerator } from "./generator.js";
import { createCommitExecutor } from "./git.js";
import { runInit } from "./init.js";
import { createNotifier, trackOutcome } from "./notify.js";
import { parseCount, toOverrides, type CliOptions } from "./options.js";

// Read and parse package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const pkgPath = join(__dirname, "..", "package.json");
const pkg = z
  .object({ name: z.string(), version: z.string() })
  .parse(JSON.parse(readFileSync(pkgPath, "utf-8")));

// Check for updates and notify the user if a new version is available.
updateNotifier({ pkg }).notify();

async function askExtraInfo(preset?: string): Promise<string | null> {
  if (preset !== undefined) return preset;

  const info = await p.text({
    message: `Extra info to include ${pc.dim("(optional, Enter to skip)")}`,
    placeholder: "e.g. closes #42, part of the auth rewrite",
  });
  if (p.isCancel(info)) return null;
  return info;
}

const program = new Command();

program
  .name("diffscribe")
  .usage("[options]")
  .description("Conventional commit messages for your staged changes, written by an LLM via OpenRouter")
  .version(pkg.version)
  .option("-m, --model <name>", "OpenRouter model identifier")
  .option("--push", "Push after a successful commit")
  .option("--no-push", "Do not push after committing")
  .option("--prompt <template>", "Prompt template; %s marks where the diff goes")
  .option("-i, --info <text>", "Additional information for the model (skips the question)")
  .option("--diff-command <command>", "Shell command whose output replaces the built-in staged diff")
  .option("--context <lines>", "Context lines around each change", parseCount)
  .option("--max-lines <lines>", "Cap each file's diff at this many lines (0 = no cap)", parseCount)
  .option("--include <patterns...>", "Only describe files matching these globs")
  .option("--exclude <patterns...>", "Leave out files matching these globs")
  .option("--dry-run", "Show the message without committing")
  .option("--verbose", "Print the request payload and git errors")
  .addHelpText(
    "after",
    `
    Examples:
      $ diffscribe                                # Generate, pick and commit
      $ diffscribe --push                         # Also push after committing
      $ diffscribe -i "closes #42"                # Give the model extra context
      $ diffscribe --exclude "*.lock" --dry-run   # Preview only, skipping lock files
      $ diffscribe init                           # Write a .diffscriberc
  `
  )
  .action(async (options: CliOptions) => {
    console.clear();
    p.intro(pc.bgCyan(pc.black(" diffscribe ")));

    try {
      const config = await loadConfig(toOverrides(options), {
        notifier: createNotifier({ verbose: options.verbose }),
      });
      const notifier = trackOutcome(createNotifier({ verbose: config.verbose }));

      const executor = createCommitExecutor({
        notifier,
        autoPush: config.autoPush,
      });
      const display = config.dryRun
        ? createPreviewDisplay()
        : createPickerDisplay({
            notifier,
            onSelect: async (candidate) => {
              await executor.commit(candidate);
            },
          });

      const generator = new CommitMessageGenerator({
        config,
        notifier,
        display,
        askExtraInfo: () => askExtraInfo(options.info),
      });
      await generator.generate();

      if (notifier.outcome === "failed") {
        p.outro(pc.red("Failed"));
        process.exitCode = 1;
      } else if (notifier.outcome === "cancelled") {
        p.outro(pc.yellow("Cancelled"));
      } else {
        p.outro(pc.green("✓ Done!"));
      }
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      p.log.error(pc.red(`Error: ${msg}`));
      p.outro(pc.red("Failed"));
      process.exit(1);
    }
  });

program
  .command("init")
  .description("Create a .diffscriberc in the current directory")
  .action(async () => {
    await runInit();
  });

await program.parseAsync();
