import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ProviderRegistry, initializeProviders } from '../src/providers/registry.js';
import { loadConfig } from '../src/config.js';
import type { SummarizationProvider } from '../src/types/summarization.js';
import { FakeSummarizer } from './helpers.js';

describe('providers/registry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('registers providers by id', () => {
    const registry = new ProviderRegistry<SummarizationProvider>();
    registry.register(new FakeSummarizer('a', 'First', async () => ''));
    registry.register(new FakeSummarizer('b', 'Second', async () => ''));
    registry.register(new FakeSummarizer('a', 'Replaced', async () => ''));

    expect(registry.size).toBe(2);
    expect(registry.get('a')?.displayName).toBe('Replaced');
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.list()).toEqual([
      { id: 'a', displayName: 'Replaced' },
      { id: 'b', displayName: 'Second' },
    ]);
  });

  it('registers only the providers that have keys', () => {
    const providers = initializeProviders(
      loadConfig({ ASSEMBLYAI_API_KEY: 'test-secret', GOOGLE_API_KEY: 'test-secret', OPENAI_API_KEY: 'test-secret' })
    );

    expect(providers.stt.list().map((p) => p.id)).toEqual(['assemblyai', 'gemini']);
    expect(providers.summarizers.list().map((p) => p.id)).toEqual(['gemini', 'openai']);
    expect(providers.summarizers.get('gemini')?.models).toEqual({ primary: 'gemini-2.5-flash', fallback: 'gemini-2.0-flash' });
  });

  it('warns about missing keys', () => {
    const providers = initializeProviders(loadConfig({}));

    expect(providers.stt.size).toBe(0);
    expect(providers.summarizers.size).toBe(0);
    expect(console.warn).toHaveBeenCalledWith('ASSEMBLYAI_API_KEY not found in environment');
    expect(console.warn).toHaveBeenCalledWith('GOOGLE_API_KEY not found in environment');
  });
});
