import OpenAI from 'openai';
import type { ModelPair } from '../types/transcription.js';
import type { SummarizationProvider, SummarizationRequest } from '../types/summarization.js';

export interface OpenAIProviderOptions {
  apiKey: string;
  baseUrl?: string;
  models: ModelPair;
}

// Any OpenAI-compatible chat completions endpoint
export class OpenAIProvider implements SummarizationProvider {
  id = 'openai';
  displayName = 'OpenAI';
  readonly models: ModelPair;
  private client: OpenAI;

  constructor(options: OpenAIProviderOptions) {
    if (!options.apiKey) {
      throw new Error('OpenAI API key is required');
    }
    this.models = options.models;
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl });
  }

  async summarize(request: SummarizationRequest, model: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model,
      temperature: 0.5,
      max_tokens: 4096,
      messages: [
        { role: 'system', content: request.systemInstruction },
        { role: 'user', content: request.userText },
      ],
    });
    return completion.choices[0]?.message?.content ?? '';
  }
}
