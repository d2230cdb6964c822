import type { Config } from './config.js';
import { resolveApiKey } from './config.js';
import type { CandidateDisplay } from './display.js';
import type { CommandRunner } from './git.js';
import { collectGitData } from './git.js';
import type { Notifier } from './notify.js';
import { sendChatCompletion } from './openrouter/client.js';
import { handleApiResponse } from './openrouter/response.js';
import { composeRequest, createPrompt, DEFAULT_PROMPT_TEMPLATE } from './prompt.js';

export interface GeneratorDeps {
  config: Config;
  notifier: Notifier;
  display: CandidateDisplay;
  // Free-text context for the model; null means the user cancelled
  askExtraInfo: () => Promise<string | null>;
  runner?: CommandRunner;
  fetch?: typeof fetch;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs one generate flow at a time: key, diff, extra info, prompt, request,
 * response. A call made while another is outstanding is rejected.
 */
export class CommitMessageGenerator {
  private inFlight = false;

  constructor(private readonly deps: GeneratorDeps) {}

  get busy(): boolean {
    return this.inFlight;
  }

  async generate(): Promise<void> {
    if (this.inFlight) {
      this.deps.notifier.warn('A commit message is already being generated; wait for it to finish');
      return;
    }

    this.inFlight = true;
    try {
      await this.run();
    } finally {
      this.inFlight = false;
    }
  }

  private async run(): Promise<void> {
    const { config, notifier, display, askExtraInfo, runner, env } = this.deps;

    const apiKey = resolveApiKey(config, notifier, env);
    if (!apiKey) return;

    const gitData = await collectGitData(config, { notifier, runner });
    if (!gitData) return;

    const extraInfo = await askExtraInfo();
    if (extraInfo === null) {
      notifier.cancel('Cancelled');
      return;
    }

    const prompt = createPrompt(gitData, config.customPrompt ?? DEFAULT_PROMPT_TEMPLATE, extraInfo);
    const payload = composeRequest(prompt, config.model);

    const response = await sendChatCompletion(apiKey, payload, { notifier, fetch: this.deps.fetch });
    if (!response) return;

    await handleApiResponse(response, { notifier, display });
  }
}
