import { readFile } from 'fs/promises';
import { basename } from 'path';
import type { CanonicalAudio, Transcript } from '../types/media.js';
import { targetPair } from '../types/media.js';
import type { SpeechToTextProvider } from '../types/transcription.js';
import { EmptyTranscriptError } from '../errors.js';
import { extensionOf } from './normalizer.js';
import { withPolicy, type RetryPolicyOptions } from './policy.js';

const MIME_TYPES: Record<string, string> = {
  mp3: 'audio/mpeg',
  wav: 'audio/wav',
  oga: 'audio/ogg',
  ogg: 'audio/ogg',
  m4a: 'audio/mp4',
  aac: 'audio/aac',
};

export function mimeTypeFor(filePath: string): string {
  const ext = extensionOf(filePath);
  return (ext && MIME_TYPES[ext]) || 'audio/mpeg';
}

export type TranscriberRetryOptions = Omit<RetryPolicyOptions, 'label'>;

export class TranscriptionOrchestrator {
  constructor(
    private readonly provider: SpeechToTextProvider,
    private readonly retry: TranscriberRetryOptions
  ) {}

  get providerName(): string {
    return this.provider.displayName;
  }

  /** Throws EmptyTranscriptError when the provider hears no speech. */
  async transcribe(audio: CanonicalAudio): Promise<Transcript> {
    const bytes = await readFile(audio.localPath);
    const request = {
      audio: bytes,
      mimeType: mimeTypeFor(audio.localPath),
      fileName: basename(audio.localPath),
    };

    const text = await withPolicy(
      (target) => this.provider.transcribe(request, target.name),
      targetPair(this.provider.models.primary, this.provider.models.fallback),
      { ...this.retry, label: `stt:${this.provider.id}` }
    );

    const trimmed = text.trim();
    if (!trimmed) {
      throw new EmptyTranscriptError();
    }
    return { text: trimmed };
  }
}
