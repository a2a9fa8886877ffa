import { beforeEach, describe, expect, it, vi } from 'vitest';
import { EMPTY_SUMMARY_TEXT, SummarizationOrchestrator } from '../src/pipeline/summarizer.js';
import { buildSummaryPrompt } from '../src/pipeline/prompts.js';
import { ProviderRegistry } from '../src/providers/registry.js';
import type { SummarizationProvider } from '../src/types/summarization.js';
import { FakeSummarizer, noRetry } from './helpers.js';

const transcript = { text: 'We shipped the release on Monday.' };
const prompts = { language: 'English' };

describe('pipeline/summarizer', () => {
  let registry: ProviderRegistry<SummarizationProvider>;

  beforeEach(() => {
    registry = new ProviderRegistry<SummarizationProvider>();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('fills the prompt templates', () => {
    const prompt = buildSummaryPrompt('hello', { language: 'German', systemPrompt: 'Answer in {language}.', userPrompt: 'Summarize.' });
    expect(prompt).toEqual({ systemInstruction: 'Answer in German.', userText: 'Summarize.\n\nhello' });

    const defaults = buildSummaryPrompt('hello', { language: 'German' });
    expect(defaults.systemInstruction).toContain('Always answer in German.');
    expect(defaults.userText).toContain('\n\nhello\n\n');
  });

  it('returns the trimmed summary of the default provider', async () => {
    const provider = new FakeSummarizer('fake', 'Fake', async () => '\n**Key** point\n');
    registry.register(provider);

    const summary = await new SummarizationOrchestrator(registry, 'fake', prompts, noRetry).summarize(transcript);

    expect(summary).toEqual({ markupText: '**Key** point', outcome: 'generated', providerId: 'fake' });
    expect(provider.requests[0]?.model).toBe('sum-main');
    expect(provider.requests[0]?.request.userText).toContain(transcript.text);
  });

  it('uses the provider chosen for the session when it exists', async () => {
    const fallback = new FakeSummarizer('fake', 'Fake', async () => 'default');
    const chosen = new FakeSummarizer('other', 'Other', async () => 'chosen');
    registry.register(fallback);
    registry.register(chosen);
    const orchestrator = new SummarizationOrchestrator(registry, 'fake', prompts, noRetry);

    expect((await orchestrator.summarize(transcript, { summarizerId: 'other' })).markupText).toBe('chosen');
    expect((await orchestrator.summarize(transcript, { summarizerId: 'missing' })).markupText).toBe('default');
  });

  it('marks an empty answer', async () => {
    registry.register(new FakeSummarizer('fake', 'Fake', async () => '  '));
    const summary = await new SummarizationOrchestrator(registry, 'fake', prompts, noRetry).summarize(transcript);
    expect(summary).toEqual({ markupText: EMPTY_SUMMARY_TEXT, outcome: 'empty', providerId: 'fake' });
  });

  it('turns provider failures into an error text', async () => {
    const provider = new FakeSummarizer('fake', 'Fake', async () => {
      throw new Error('Invalid request');
    });
    registry.register(provider);

    const summary = await new SummarizationOrchestrator(registry, 'fake', prompts, noRetry).summarize(transcript);

    expect(summary).toEqual({ markupText: 'Summary failed: Invalid request', outcome: 'failed', providerId: 'fake' });
    expect(provider.requests.map((r) => r.model)).toEqual(['sum-main', 'sum-backup']);
  });

  it('reports a missing provider', async () => {
    const summary = await new SummarizationOrchestrator(registry, 'gemini', prompts, noRetry).summarize(transcript);
    expect(summary).toEqual({
      markupText: 'Summary unavailable: no summarization provider is configured.',
      outcome: 'failed',
      providerId: 'gemini',
    });
  });
});
