import { execa } from "execa";
import { minimatch } from "minimatch";
import type { Config, DiffOptions } from "./config.js";
import type { Notifier } from "./notify.js";

export interface GitData {
  diff: string;
  // Recent history is not collected yet
  commits: string;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  shell?: boolean;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: RunOptions
) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (file, args, options = {}) => {
  const result = await execa(file, args, {
    reject: false,
    shell: options.shell ?? false,
  });
  return {
    exitCode: result.exitCode ?? 1,
    stdout: result.stdout,
    stderr: result.stderr,
  };
};

export interface StagedFile {
  status: string;
  path: string;
}

interface FileStats {
  binary: boolean;
  additions: number;
  deletions: number;
}

const STATUS_LABELS: Record<string, string> = {
  A: "Added",
  M: "Modified",
  D: "Deleted",
  R: "Renamed",
  C: "Copied",
  T: "Type changed",
  U: "Unmerged",
};

export function formatStatus(status: string): string {
  return STATUS_LABELS[status.charAt(0)] ?? status;
}

export function parseNameStatus(output: string): StagedFile[] {
  const files: StagedFile[] = [];
  for (const line of output.split("\n")) {
    if (!line.trim()) continue;
    const parts = line.split("\t");
    if (parts.length < 2) continue;
    // Renames and copies list "old<TAB>new"; the new path is what gets committed
    files.push({ status: parts[0], path: parts[parts.length - 1] });
  }
  return files;
}

function matchesPattern(path: string, pattern: string): boolean {
  return (
    minimatch(path, pattern, { dot: true, matchBase: true }) ||
    minimatch(path, `**/${pattern}`, { dot: true })
  );
}

export function shouldIncludeFile(
  path: string,
  include: readonly string[],
  exclude: readonly string[]
): boolean {
  if (exclude.some((pattern) => matchesPattern(path, pattern))) return false;
  if (include.length > 0) {
    return include.some((pattern) => matchesPattern(path, pattern));
  }
  return true;
}

function extensionOf(path: string): string {
  const name = path.split("/").pop() ?? path;
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(dot).toLowerCase() : "no_extension";
}

async function readStats(
  root: string,
  path: string,
  runner: CommandRunner
): Promise<FileStats | undefined> {
  const { exitCode, stdout } = await runner("git", [
    "-C",
    root,
    "diff",
    "--cached",
    "--numstat",
    "--",
    path,
  ]);
  if (exitCode !== 0 || !stdout.trim()) return undefined;

  const [additions, deletions] = stdout.trim().split("\t");
  if (additions === "-" || deletions === "-") {
    return { binary: true, additions: 0, deletions: 0 };
  }
  return {
    binary: false,
    additions: parseInt(additions, 10) || 0,
    deletions: parseInt(deletions, 10) || 0,
  };
}

async function describeFile(
  file: StagedFile,
  root: string,
  options: DiffOptions,
  runner: CommandRunner
): Promise<string[]> {
  const label = formatStatus(file.status);
  const stats = await readStats(root, file.path, runner);

  if (stats?.binary) {
    return ["", `Binary file ${label}: ${file.path}`];
  }

  const statsText =
    options.includeStats && stats
      ? ` (+${stats.additions}/-${stats.deletions})`
      : "";
  const header = `${file.path} (${label})${statsText}`;
  const lines = ["", header, "-".repeat(Math.min(header.length, 80))];

  const diff = await runner("git", [
    "-C",
    root,
    "diff",
    "--cached",
    `--unified=${options.contextLines}`,
    "--",
    file.path,
  ]);
  const diffLines =
    diff.exitCode === 0 && diff.stdout ? diff.stdout.split("\n") : [];

  if (diffLines.length === 0) {
    lines.push("No diff available.");
  } else if (
    options.maxLinesPerFile > 0 &&
    diffLines.length > options.maxLinesPerFile
  ) {
    lines.push(...diffLines.slice(0, options.maxLinesPerFile));
    lines.push(`... (diff truncated at ${options.maxLinesPerFile} lines)`);
  } else {
    lines.push(...diffLines);
  }

  lines.push("");
  return lines;
}

/**
 * Renders the staged changes as a per-file summary followed by each file's
 * diff. Returns "" outside a repository or when nothing staged survives the
 * include/exclude patterns.
 */
export async function buildStagedDiff(
  options: DiffOptions,
  runner: CommandRunner = runCommand
): Promise<string> {
  const toplevel = await runner("git", ["rev-parse", "--show-toplevel"]);
  if (toplevel.exitCode !== 0) return "";
  const root = toplevel.stdout.trim();

  const status = await runner("git", [
    "-C",
    root,
    "diff",
    "--cached",
    "--name-status",
  ]);
  if (status.exitCode !== 0) return "";

  const seen = new Set<string>();
  const files = parseNameStatus(status.stdout).filter((file) => {
    if (seen.has(file.path)) return false;
    seen.add(file.path);
    return shouldIncludeFile(file.path, options.include, options.exclude);
  });
  if (files.length === 0) return "";

  const output = ["=== Staged Changes Summary ==="];
  if (options.groupByType) {
    const types = [...new Set(files.map((file) => extensionOf(file.path)))];
    output.push("", `File types: ${types.sort().join(", ")}`);
  }
  output.push("", `Total files: ${files.length}`, "=".repeat(50));

  for (const file of files) {
    output.push(...(await describeFile(file, root, options, runner)));
  }

  return output.join("\n");
}

async function runDiffCommand(
  command: string,
  runner: CommandRunner,
  notifier: Notifier
): Promise<string> {
  const result = await runner(command, [], { shell: true });
  if (result.exitCode !== 0) {
    notifier.debug(`${command} exited with ${result.exitCode}: ${result.stderr}`);
    return "";
  }
  return result.stdout;
}

export interface CollectOptions {
  notifier: Notifier;
  runner?: CommandRunner;
}

export async function collectGitData(
  config: Config,
  { notifier, runner = runCommand }: CollectOptions
): Promise<GitData | undefined> {
  const diff = config.diffCommand
    ? await runDiffCommand(config.diffCommand, runner, notifier)
    : await buildStagedDiff(config.diff, runner);

  if (diff === "") {
    notifier.error(
      "Failed to get commit data: nothing is staged or the diff command produced no output"
    );
    return undefined;
  }

  if (config.diffWarnChars > 0 && diff.length > config.diffWarnChars) {
    notifier.warn(
      `The diff is ${diff.length} characters long (warning threshold ${config.diffWarnChars}); it is sent unmodified`
    );
  }

  return { diff, commits: "" };
}

/**
 * One `-m` per non-empty line: the first becomes the subject and every
 * following line its own body paragraph.
 */
export function buildCommitArgs(message: string): string[] {
  const lines = message.split(/[\r\n]+/).filter((line) => line.trim() !== "");
  if (lines.length === 0) return ["commit", "-m", message];
  return ["commit", ...lines.flatMap((line) => ["-m", line])];
}

export interface CommitExecutor {
  commit(message: string): Promise<boolean>;
  push(): Promise<boolean>;
}

export interface CommitExecutorOptions {
  notifier: Notifier;
  autoPush: boolean;
  runner?: CommandRunner;
}

export function createCommitExecutor({
  notifier,
  autoPush,
  runner = runCommand,
}: CommitExecutorOptions): CommitExecutor {
  let committing = false;

  async function push(): Promise<boolean> {
    notifier.info("Pushing changes...");
    const result = await runner("git", ["push"]);
    if (result.exitCode !== 0) {
      notifier.debug(result.stderr);
      notifier.error("Failed to push changes");
      return false;
    }
    notifier.success("Changes pushed successfully!");
    return true;
  }

  async function commit(message: string): Promise<boolean> {
    if (committing) {
      notifier.warn("A commit is already in progress");
      return false;
    }

    committing = true;
    try {
      const result = await runner("git", buildCommitArgs(message));
      if (result.exitCode !== 0) {
        notifier.debug(result.stderr);
        notifier.error("Failed to create commit");
        return false;
      }
      notifier.success("Commit created successfully!");
    } finally {
      committing = false;
    }

    // The push reports its own outcome; the commit already succeeded
    if (autoPush) await push();
    return true;
  }

  return { commit, push };
}
