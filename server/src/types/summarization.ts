import type { ModelPair } from './transcription.js';

export interface SummarizationRequest {
  systemInstruction: string;
  userText: string;
}

export interface SummarizationProvider {
  id: string;
  displayName: string;
  models: ModelPair;
  /** Returns lightweight-markup text. */
  summarize(request: SummarizationRequest, model: string): Promise<string>;
}
