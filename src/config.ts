import { readFile } from "fs/promises";
import { existsSync } from "fs";
import { join } from "path";
import { z } from "zod";
import type { Notifier } from "./notify.js";

export const RC_FILE = ".diffscriberc";
export const API_KEY_ENV = "OPENROUTER_API_KEY";
export const MODEL_ENV = "DIFFSCRIBE_MODEL";

export interface DiffOptions {
  readonly contextLines: number;
  // 0 means no cap
  readonly maxLinesPerFile: number;
  readonly includeStats: boolean;
  readonly include: readonly string[];
  readonly exclude: readonly string[];
  readonly groupByType: boolean;
}

export interface Config {
  readonly apiKey?: string;
  readonly model: string;
  readonly autoPush: boolean;
  // Prompt template; "%s" marks where the diff goes
  readonly customPrompt?: string;
  readonly dryRun: boolean;
  readonly verbose: boolean;
  // Replaces the built-in staged diff with the stdout of this shell command
  readonly diffCommand?: string;
  readonly diffWarnChars: number;
  readonly diff: DiffOptions;
}

export const DEFAULT_CONFIG: Config = {
  model: "google/gemini-2.5-flash-preview",
  autoPush: false,
  dryRun: false,
  verbose: false,
  diffWarnChars: 100_000,
  diff: {
    contextLines: 3,
    maxLinesPerFile: 0,
    includeStats: true,
    include: [],
    exclude: ["*.pyc", "*.pyo", "__pycache__/*", ".git/*", "*.so", "*.dylib", "*.dll"],
    groupByType: false,
  },
};

const diffOptionsSchema = z
  .object({
    contextLines: z.number().int().nonnegative(),
    maxLinesPerFile: z.number().int().nonnegative(),
    includeStats: z.boolean(),
    include: z.array(z.string()),
    exclude: z.array(z.string()),
    groupByType: z.boolean(),
  })
  .partial();

export const configOverridesSchema = z
  .object({
    apiKey: z.string().min(1),
    model: z.string().min(1),
    autoPush: z.boolean(),
    customPrompt: z.string().min(1),
    dryRun: z.boolean(),
    verbose: z.boolean(),
    diffCommand: z.string().min(1),
    diffWarnChars: z.number().int().nonnegative(),
    diff: diffOptionsSchema,
  })
  .partial();

export type ConfigOverrides = z.infer<typeof configOverridesSchema>;

const packageFieldSchema = z.object({ diffscribe: z.unknown().optional() });

export interface LoadConfigOptions {
  notifier: Notifier;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Deep-merges `override` over `base`. Defined override values win; the
 * nested diff options merge key by key and lists are replaced whole.
 */
export function mergeConfig(base: Config, override: ConfigOverrides): Config {
  const diff: NonNullable<ConfigOverrides["diff"]> = override.diff ?? {};
  return {
    apiKey: override.apiKey ?? base.apiKey,
    model: override.model ?? base.model,
    autoPush: override.autoPush ?? base.autoPush,
    customPrompt: override.customPrompt ?? base.customPrompt,
    dryRun: override.dryRun ?? base.dryRun,
    verbose: override.verbose ?? base.verbose,
    diffCommand: override.diffCommand ?? base.diffCommand,
    diffWarnChars: override.diffWarnChars ?? base.diffWarnChars,
    diff: {
      contextLines: diff.contextLines ?? base.diff.contextLines,
      maxLinesPerFile: diff.maxLinesPerFile ?? base.diff.maxLinesPerFile,
      includeStats: diff.includeStats ?? base.diff.includeStats,
      include: diff.include ?? base.diff.include,
      exclude: diff.exclude ?? base.diff.exclude,
      groupByType: diff.groupByType ?? base.diff.groupByType,
    },
  };
}

/**
 * Builds the configuration once per run.
 *
 * Merge order: defaults < .diffscriberc < package.json#diffscribe <
 * DIFFSCRIBE_MODEL < CLI options. Invalid files are skipped with a warning.
 */
export async function loadConfig(
  cliOptions: ConfigOverrides,
  { notifier, cwd = process.cwd(), env = process.env }: LoadConfigOptions
): Promise<Config> {
  let config = DEFAULT_CONFIG;

  const rc = await readJsonIfExists(join(cwd, RC_FILE), notifier);
  if (rc !== undefined) {
    config = mergeConfig(config, parseOverrides(rc, RC_FILE, notifier));
  }

  const pkg = await readJsonIfExists(join(cwd, "package.json"), notifier);
  const pkgField = packageFieldSchema.safeParse(pkg);
  if (pkgField.success && pkgField.data.diffscribe !== undefined) {
    config = mergeConfig(
      config,
      parseOverrides(pkgField.data.diffscribe, 'package.json "diffscribe" field', notifier)
    );
  }

  const envModel = env[MODEL_ENV]?.trim();
  if (envModel) {
    config = mergeConfig(config, { model: envModel });
  }

  return freezeConfig(mergeConfig(config, cliOptions));
}

/**
 * Explicit configuration first, then the environment. Reports and returns
 * undefined when neither has a key.
 */
export function resolveApiKey(
  config: Config,
  notifier: Notifier,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  const apiKey = config.apiKey?.trim() || env[API_KEY_ENV]?.trim();
  if (!apiKey) {
    notifier.error(
      `OpenRouter API key not found. Set the ${API_KEY_ENV} environment variable or add "apiKey" to ${RC_FILE}`
    );
    return undefined;
  }
  return apiKey;
}

async function readJsonIfExists(
  path: string,
  notifier: Notifier
): Promise<unknown> {
  if (!existsSync(path)) return undefined;
  const content = await readFile(path, "utf-8");
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    notifier.warn(`Ignoring ${path}: ${reason}`);
    return undefined;
  }
}

function parseOverrides(
  value: unknown,
  source: string,
  notifier: Notifier
): ConfigOverrides {
  const result = configOverridesSchema.safeParse(value);
  if (result.success) return result.data;

  const issues = result.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  notifier.warn(`Ignoring invalid ${source}: ${issues}`);
  return {};
}

function freezeConfig(config: Config): Config {
  return Object.freeze({
    ...config,
    diff: Object.freeze({
      ...config.diff,
      include: Object.freeze([...config.diff.include]),
      exclude: Object.freeze([...config.diff.exclude]),
    }),
  });
}
