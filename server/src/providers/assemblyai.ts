import { AssemblyAI } from 'assemblyai';
import type { SpeechModel } from 'assemblyai';
import type { ModelPair, SpeechToTextProvider, SpeechToTextRequest } from '../types/transcription.js';

const SPEECH_MODELS: readonly SpeechModel[] = ['best', 'nano'];

export class AssemblyAIProvider implements SpeechToTextProvider {
  id = 'assemblyai';
  displayName = 'AssemblyAI';
  private client: AssemblyAI;

  constructor(apiKey: string, readonly models: ModelPair) {
    if (!apiKey) {
      throw new Error('AssemblyAI API key is required');
    }
    this.client = new AssemblyAI({ apiKey });
  }

  async transcribe(request: SpeechToTextRequest, model: string): Promise<string> {
    const speechModel = SPEECH_MODELS.find((m) => m === model);
    if (!speechModel) {
      throw new Error(`Unknown AssemblyAI speech model '${model}'`);
    }

    // The SDK uploads the buffer and polls until the transcript is ready.
    // Voice notes come in any language, so let the service detect it.
    const transcript = await this.client.transcripts.transcribe({
      audio: request.audio,
      speech_model: speechModel,
      language_detection: true,
      punctuate: true,
      format_text: true,
    });

    if (transcript.status === 'error') {
      throw new Error(`AssemblyAI transcription failed: ${transcript.error ?? 'unknown error'}`);
    }

    return transcript.text ?? '';
  }
}
