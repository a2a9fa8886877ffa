import { GoogleGenerativeAI } from '@google/generative-ai';
import type { ModelPair, SpeechToTextProvider, SpeechToTextRequest } from '../types/transcription.js';
import type { SummarizationProvider, SummarizationRequest } from '../types/summarization.js';

const TRANSCRIBE_INSTRUCTION =
  'Transcribe this audio file in the language spoken in the recording. ' +
  'Return only the transcript text without any comments. ' +
  'If the recording contains no speech, return an empty response.';

/** Google Gemini, usable both for transcription (audio parts) and summaries. */
export class GeminiProvider implements SpeechToTextProvider, SummarizationProvider {
  id = 'gemini';
  displayName = 'Google Gemini';
  private client: GoogleGenerativeAI;

  constructor(apiKey: string, readonly models: ModelPair) {
    if (!apiKey) {
      throw new Error('Google API key is required');
    }
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async transcribe(request: SpeechToTextRequest, model: string): Promise<string> {
    const generative = this.client.getGenerativeModel({ model });
    const { response } = await generative.generateContent([
      { text: TRANSCRIBE_INSTRUCTION },
      { inlineData: { mimeType: request.mimeType, data: request.audio.toString('base64') } },
    ]);
    return response.text();
  }

  async summarize(request: SummarizationRequest, model: string): Promise<string> {
    const generative = this.client.getGenerativeModel({
      model,
      systemInstruction: request.systemInstruction,
      generationConfig: { temperature: 0.5 },
    });
    const { response } = await generative.generateContent(request.userText);
    return response.text();
  }
}
