import type { GitData } from "./git.js";

export const DIFF_PLACEHOLDER = "%s";

// The instructions live in the system message; the template only frames the diff.
export const DEFAULT_PROMPT_TEMPLATE = `${DIFF_PLACEHOLDER}\n`;

export const SYSTEM_PROMPT =
  "You are a helpful assistant that generates git commit messages following the conventional commits specification. " +
  "You will be given the output of a git diff; process it and generate ONE (1) MULTILINE commit message describing the changes, following the specification. " +
  "Sometimes you will be given additional information; adapt the commit message to it.";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: [ChatMessage, ChatMessage];
}

export function createPrompt(
  gitData: GitData,
  template: string = DEFAULT_PROMPT_TEMPLATE,
  extraInfo?: string
): string {
  // A function replacer keeps "$&" and friends in the diff literal
  let prompt = template.replace(DIFF_PLACEHOLDER, () => gitData.diff);

  if (extraInfo && extraInfo.trim() !== "") {
    prompt += `\n\nAdditional information:\n${extraInfo}`;
  }

  return prompt;
}

export function composeRequest(
  prompt: string,
  model: string
): ChatCompletionRequest {
  return {
    model,
    messages: [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: prompt },
    ],
  };
}
