import type { Notifier } from '../notify.js';
import type { ChatCompletionRequest } from '../prompt.js';

export const OPENROUTER_API = 'https://openrouter.ai/api/v1/chat/completions';

export interface ApiResponse {
    status: number;
    body: string;
}

export interface SendOptions {
    notifier: Notifier;
    fetch?: typeof fetch;
}

/**
 * Sends one chat-completion request. Every HTTP status resolves to an
 * ApiResponse so the response handler sees the raw body; only a transport
 * failure is reported here.
 */
export async function sendChatCompletion(
    apiKey: string,
    payload: ChatCompletionRequest,
    { notifier, fetch: fetchImpl = fetch }: SendOptions
): Promise<ApiResponse | undefined> {
    notifier.info('Generating commit message...');

    const body = JSON.stringify(payload);
    notifier.debug(`JSON payload sent to API:\n${body}`);

    try {
        const response = await fetchImpl(OPENROUTER_API, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${apiKey}` },
            body,
        });
        return { status: response.status, body: await response.text() };
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        notifier.error(`Failed to generate commit message: network error calling OpenRouter (${reason})`);
        return undefined;
    }
}
