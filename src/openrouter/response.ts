import { z } from 'zod';
import type { CandidateDisplay } from '../display.js';
import type { Notifier } from '../notify.js';
import type { ApiResponse } from './client.js';

const completionSchema = z.object({
    choices: z.array(z.unknown()).optional(),
});

// Only the first choice is read; later ones may be any shape
const choiceSchema = z.object({
    message: z.object({ content: z.string().nullish() }).nullish(),
});

// Metadata and message are best effort; a malformed field never hides the code
const errorBodySchema = z.object({
    error: z.object({
        code: z.union([z.number(), z.string()]).nullish(),
        message: z.string().nullish().catch(undefined),
        metadata: z
            .object({
                reasons: z.array(z.string()).nullish().catch(undefined),
                flagged_input: z.string().nullish().catch(undefined),
                provider_name: z.string().nullish().catch(undefined),
            })
            .passthrough()
            .nullish()
            .catch(undefined),
    }),
});

export const EMPTY_RESPONSE_WARNING =
    'Received empty response from model. The model may be warming up, try again in a few moments.';
export const NO_MESSAGES_WARNING = 'No commit messages were generated. Try again or modify your changes.';

function parseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

function isBlank(line: string): boolean {
    return line.trim() === '';
}

export function splitMessageLines(text: string): string[] {
    return text
        .split('\n')
        .map((line) => line.replace(/\r$/, ''))
        .filter((line) => !isBlank(line));
}

/**
 * Joins contiguous lines into paragraphs; blank entries separate them. An
 * entry that already spans several lines is kept as a paragraph of its own,
 * so grouped output groups to itself.
 */
export function groupParagraphs(lines: readonly string[]): string[] {
    const paragraphs: string[] = [];
    let current: string[] = [];

    const flush = () => {
        if (current.length > 0) {
            paragraphs.push(current.join('\n'));
            current = [];
        }
    };

    for (const line of lines) {
        if (isBlank(line)) {
            flush();
        } else if (line.includes('\n')) {
            flush();
            paragraphs.push(line);
        } else {
            current.push(line);
        }
    }
    flush();

    return paragraphs;
}

export function describeApiError(status: number, body: string): string {
    const parsed = errorBodySchema.safeParse(parseJson(body));
    if (!parsed.success) return `Error ${status}: ${body}`;

    const { error } = parsed.data;
    const code = error.code ?? status;
    const message = error.message ?? 'No error message provided';
    const metadata = error.metadata;

    switch (Number(code)) {
        case 402:
            return `insufficient credits: ${message}`;
        case 403:
            if (metadata?.reasons) {
                const reasons = `content moderation error: ${metadata.reasons.join(', ')}`;
                return metadata.flagged_input ? `${reasons} (flagged input: '${metadata.flagged_input}')` : reasons;
            }
            break;
        case 408:
            return 'request timed out, try again later';
        case 429:
            return 'rate limited, wait before trying again';
        case 502:
            return metadata?.provider_name
                ? `model provider error: ${message} (provider: ${metadata.provider_name})`
                : `model provider error: ${message}`;
        case 503:
            return `no available model provider: ${message}`;
    }

    return `Error ${code}: ${message}`;
}

function firstChoiceContent(data: unknown): string | null | undefined {
    const completion = completionSchema.safeParse(data);
    if (!completion.success) return undefined;
    const choice = choiceSchema.safeParse(completion.data.choices?.[0]);
    return choice.success ? choice.data.message?.content : undefined;
}

export interface ResponseHandlerDeps {
    notifier: Notifier;
    display: CandidateDisplay;
}

export async function handleApiResponse(
    response: ApiResponse,
    { notifier, display }: ResponseHandlerDeps
): Promise<void> {
    if (response.status !== 200) {
        notifier.error(`Failed to generate commit message: ${describeApiError(response.status, response.body)}`);
        return;
    }

    const data = parseJson(response.body);
    if (data === undefined) {
        notifier.debug(response.body);
        notifier.error('Failed to generate commit message: unexpected response body');
        return;
    }

    const content = firstChoiceContent(data);
    if (!content) {
        notifier.warn(EMPTY_RESPONSE_WARNING);
        return;
    }

    const candidates = groupParagraphs(splitMessageLines(content));
    if (candidates.length === 0) {
        notifier.warn(NO_MESSAGES_WARNING);
        return;
    }

    await display.show(candidates);
}
