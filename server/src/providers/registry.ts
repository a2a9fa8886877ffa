import type { AppConfig } from '../config.js';
import type { SpeechToTextProvider } from '../types/transcription.js';
import type { SummarizationProvider } from '../types/summarization.js';
import { AssemblyAIProvider } from './assemblyai.js';
import { GeminiProvider } from './gemini.js';
import { OpenAIProvider } from './openai.js';

interface RegisteredProvider {
  id: string;
  displayName: string;
}

export class ProviderRegistry<P extends RegisteredProvider> {
  private providers = new Map<string, P>();

  register(provider: P): void {
    this.providers.set(provider.id, provider);
  }

  get(providerId: string): P | undefined {
    return this.providers.get(providerId);
  }

  list(): Array<{ id: string; displayName: string }> {
    return Array.from(this.providers.values()).map((p) => ({
      id: p.id,
      displayName: p.displayName,
    }));
  }

  get size(): number {
    return this.providers.size;
  }
}

export interface Providers {
  stt: ProviderRegistry<SpeechToTextProvider>;
  summarizers: ProviderRegistry<SummarizationProvider>;
}

// Initialize providers
export function initializeProviders(config: AppConfig): Providers {
  const stt = new ProviderRegistry<SpeechToTextProvider>();
  const summarizers = new ProviderRegistry<SummarizationProvider>();

  // Register AssemblyAI if API key is available
  const assemblyAIKey = config.stt.assemblyai.apiKey;
  if (assemblyAIKey) {
    stt.register(new AssemblyAIProvider(assemblyAIKey, config.stt.assemblyai.models));
  } else {
    console.warn('ASSEMBLYAI_API_KEY not found in environment');
  }

  const googleKey = config.gemini.apiKey;
  if (googleKey) {
    const gemini = new GeminiProvider(googleKey, config.gemini.models);
    stt.register(gemini);
    summarizers.register(gemini);
  } else {
    console.warn('GOOGLE_API_KEY not found in environment');
  }

  const openAIKey = config.openai.apiKey;
  if (openAIKey) {
    summarizers.register(
      new OpenAIProvider({ apiKey: openAIKey, baseUrl: config.openai.baseUrl, models: config.openai.models })
    );
  }

  return { stt, summarizers };
}
