import { InvalidArgumentError } from "commander";
import type { ConfigOverrides } from "./config.js";

export interface CliOptions {
  model?: string;
  // --push / --no-push; undefined when neither is given
  push?: boolean;
  prompt?: string;
  info?: string;
  diffCommand?: string;
  context?: number;
  maxLines?: number;
  include?: string[];
  exclude?: string[];
  dryRun?: boolean;
  verbose?: boolean;
}

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

export function toOverrides(options: CliOptions): ConfigOverrides {
  return {
    model: options.model,
    autoPush: options.push,
    customPrompt: options.prompt,
    dryRun: options.dryRun,
    verbose: options.verbose,
    diffCommand: options.diffCommand,
    diff: {
      contextLines: options.context,
      maxLinesPerFile: options.maxLines,
      include: options.include,
      exclude: options.exclude,
    },
  };
}
