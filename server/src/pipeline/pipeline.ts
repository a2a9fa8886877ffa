import type { CanonicalAudio, FormattedMessage, MediaItem, PipelineContext, Summary, Transcript } from '../types/media.js';
import { PipelineError, errorMessage } from '../errors.js';
import { formatMarkup } from '../format/markup.js';
import { MediaNormalizer, releaseCanonicalAudio } from './normalizer.js';
import type { SummarizationOrchestrator } from './summarizer.js';
import type { TranscriptionOrchestrator } from './transcriber.js';

/** Receives results as soon as each stage finishes. */
export interface PipelineSink {
  onTranscript?(transcript: Transcript): Promise<void>;
  onSummary?(summary: Summary, formatted: FormattedMessage): Promise<void>;
}

export type PipelineOutcome =
  | { status: 'rejected'; error: PipelineError }
  | { status: 'no-speech' }
  | { status: 'failed'; stage: 'normalize' | 'transcribe'; error: unknown }
  | { status: 'completed'; transcript: Transcript; summary: Summary; formatted: FormattedMessage };

export class MediaPipeline {
  constructor(
    private readonly normalizer: MediaNormalizer,
    private readonly transcriber: TranscriptionOrchestrator,
    private readonly summarizer: SummarizationOrchestrator
  ) {}

  get transcriberName(): string {
    return this.transcriber.providerName;
  }

  /**
   * normalize → transcribe → (deliver transcript) → summarize → format.
   * The canonical audio is released before this resolves, whatever happens.
   */
  async run(item: MediaItem, context: PipelineContext = {}, sink: PipelineSink = {}): Promise<PipelineOutcome> {
    try {
      this.normalizer.validate(item);
    } catch (error) {
      if (error instanceof PipelineError) {
        return { status: 'rejected', error };
      }
      throw error;
    }

    let audio: CanonicalAudio;
    try {
      audio = await this.normalizer.normalize(item);
    } catch (error) {
      console.error(`[Pipeline] Normalizing ${item.kind} failed: ${errorMessage(error)}`);
      return { status: 'failed', stage: 'normalize', error };
    }

    let transcript: Transcript;
    try {
      transcript = await this.transcriber.transcribe(audio);
    } catch (error) {
      if (error instanceof PipelineError && error.code === 'EMPTY_TRANSCRIPT') {
        return { status: 'no-speech' };
      }
      console.error(`[Pipeline] Transcription failed: ${errorMessage(error)}`);
      return { status: 'failed', stage: 'transcribe', error };
    } finally {
      await releaseCanonicalAudio(audio);
    }

    console.log(`[Pipeline] Transcribed ${transcript.text.length} characters with ${this.transcriber.providerName}`);
    await sink.onTranscript?.(transcript);

    const summary = await this.summarizer.summarize(transcript, context);
    const formatted = formatMarkup(summary.markupText);
    if (!formatted.wellFormed) {
      console.warn('[Pipeline] Summary markup was not well-formed, sending it as plain text');
    }
    await sink.onSummary?.(summary, formatted);

    return { status: 'completed', transcript, summary, formatted };
  }
}
