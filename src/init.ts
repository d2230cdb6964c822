import { writeFileSync, existsSync } from "fs";
import { join } from "path";
import * as p from "@clack/prompts";
import pc from "picocolors";
import { DEFAULT_CONFIG, RC_FILE, type ConfigOverrides } from "./config.js";
import { DIFF_PLACEHOLDER } from "./prompt.js";

export interface InitAnswers {
  model: string;
  autoPush: boolean;
  customPrompt?: string;
}

export function toRcConfig(answers: InitAnswers): ConfigOverrides {
  const config: ConfigOverrides = {
    model: answers.model.trim(),
    autoPush: answers.autoPush,
  };

  const customPrompt = answers.customPrompt?.trim();
  if (customPrompt) {
    config.customPrompt = customPrompt;
  }

  return config;
}

export async function runInit(cwd: string = process.cwd()): Promise<void> {
  console.clear();
  p.intro(pc.bgCyan(pc.black(" diffscribe init ")));

  const configPath = join(cwd, RC_FILE);

  if (existsSync(configPath)) {
    const shouldOverwrite = await p.confirm({
      message: `${RC_FILE} already exists. Overwrite?`,
      initialValue: false,
    });

    if (p.isCancel(shouldOverwrite) || !shouldOverwrite) {
      p.outro(pc.yellow("Operation cancelled"));
      return;
    }
  }

  const answers = await p.group(
    {
      model: () =>
        p.text({
          message: "OpenRouter model:",
          initialValue: DEFAULT_CONFIG.model,
          placeholder: DEFAULT_CONFIG.model,
          validate: (value) => {
            if (!value.trim()) return "Model name is required";
          },
        }),
      autoPush: () =>
        p.confirm({
          message: "Push automatically after committing?",
          initialValue: DEFAULT_CONFIG.autoPush,
        }),
      customPrompt: () =>
        p.text({
          message: `Prompt template (optional, ${DIFF_PLACEHOLDER} marks the diff):`,
          placeholder: "",
        }),
    },
    {
      onCancel: () => {
        p.outro(pc.yellow("Operation cancelled"));
        process.exit(0);
      },
    }
  );

  const config = toRcConfig({
    model: answers.model,
    autoPush: answers.autoPush,
    customPrompt: answers.customPrompt,
  });

  writeFileSync(configPath, JSON.stringify(config, null, 2) + "\n");

  p.note(JSON.stringify(config, null, 2), `Generated ${RC_FILE}`);
  p.outro(pc.green("Configuration initialized successfully!"));
}
