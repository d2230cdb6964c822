import { describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG, mergeConfig, type ConfigOverrides } from './config.js';
import { CommitMessageGenerator, type GeneratorDeps } from './generator.js';
import type { CommandRunner } from './git.js';
import { SYSTEM_PROMPT } from './prompt.js';

function createTestNotifier() {
  return {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    cancel: vi.fn(),
    debug: vi.fn(),
  };
}

const COMPLETION = JSON.stringify({
  choices: [{ message: { content: 'feat: add X\n\nBody line' } }],
});

function setup(overrides: ConfigOverrides = {}, diff = 'DIFF') {
  const config = mergeConfig(DEFAULT_CONFIG, {
    apiKey: 'test-key',
    diffCommand: 'print-diff',
    ...overrides,
  });
  const notifier = createTestNotifier();
  const display = { show: vi.fn(async (_candidates: readonly string[]) => {}) };
  const runner = vi.fn<CommandRunner>(async () => ({ exitCode: 0, stdout: diff, stderr: '' }));
  const fetchMock = vi.fn<typeof fetch>(async () => new Response(COMPLETION, { status: 200 }));
  const askExtraInfo = vi.fn(async (): Promise<string | null> => '');

  const deps: GeneratorDeps = {
    config,
    notifier,
    display,
    askExtraInfo,
    runner,
    fetch: fetchMock,
    env: {},
  };
  return { deps, notifier, display, runner, fetchMock, askExtraInfo };
}

function sentBody(fetchMock: ReturnType<typeof setup>['fetchMock']): unknown {
  return JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
}

describe('CommitMessageGenerator', () => {
  it('runs the diff through the model and shows the candidates', async () => {
    const { deps, display, fetchMock } = setup();

    await new CommitMessageGenerator(deps).generate();

    expect(sentBody(fetchMock)).toEqual({
      model: DEFAULT_CONFIG.model,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: 'DIFF\n' },
      ],
    });
    expect(display.show).toHaveBeenCalledWith(['feat: add X\nBody line']);
  });

  it('adds the extra information to the user message', async () => {
    const { deps, fetchMock, askExtraInfo } = setup();
    askExtraInfo.mockResolvedValueOnce('closes #7');

    await new CommitMessageGenerator(deps).generate();

    expect(sentBody(fetchMock)).toMatchObject({
      messages: [{ role: 'system' }, { role: 'user', content: 'DIFF\n\n\nAdditional information:\ncloses #7' }],
    });
  });

  it('uses the configured template and model', async () => {
    const { deps, fetchMock } = setup({ customPrompt: 'Staged:\n%s', model: 'openai/gpt-4o-mini' });

    await new CommitMessageGenerator(deps).generate();

    expect(sentBody(fetchMock)).toMatchObject({
      model: 'openai/gpt-4o-mini',
      messages: [{ role: 'system' }, { role: 'user', content: 'Staged:\nDIFF' }],
    });
  });

  it('stops before any network call when the diff is empty', async () => {
    const { deps, notifier, fetchMock, askExtraInfo } = setup({}, '');

    await new CommitMessageGenerator(deps).generate();

    expect(fetchMock).not.toHaveBeenCalled();
    expect(askExtraInfo).not.toHaveBeenCalled();
    expect(notifier.error).toHaveBeenCalledTimes(1);
  });

  it('stops before collecting the diff without an API key', async () => {
    const { deps, runner, fetchMock } = setup();
    const generator = new CommitMessageGenerator({
      ...deps,
      config: mergeConfig(DEFAULT_CONFIG, { diffCommand: 'print-diff' }),
    });

    await generator.generate();

    expect(runner).not.toHaveBeenCalled();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('stops when the user cancels the extra information question', async () => {
    const { deps, notifier, fetchMock, askExtraInfo } = setup();
    askExtraInfo.mockResolvedValueOnce(null);

    await new CommitMessageGenerator(deps).generate();

    expect(fetchMock).not.toHaveBeenCalled();
    expect(notifier.cancel).toHaveBeenCalledWith('Cancelled');
  });

  it('rejects a second generation while one is outstanding', async () => {
    const { deps, notifier, fetchMock, askExtraInfo } = setup();
    let answer: (info: string | null) => void = () => {};
    askExtraInfo.mockImplementationOnce(() => new Promise<string | null>((resolve) => (answer = resolve)));
    const generator = new CommitMessageGenerator(deps);

    const first = generator.generate();
    expect(generator.busy).toBe(true);
    await generator.generate();
    expect(notifier.warn).toHaveBeenCalledWith('A commit message is already being generated; wait for it to finish');

    await vi.waitFor(() => expect(askExtraInfo).toHaveBeenCalled());
    answer('');
    await first;
    expect(generator.busy).toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
