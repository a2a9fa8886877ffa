// Media flowing through the summary pipeline
export type MediaKind = 'voice' | 'audio' | 'video' | 'video_note' | 'document';

export interface MediaItem {
  readonly kind: MediaKind;
  /** Opaque handle understood by the MediaSource that delivered the item. */
  readonly sourceRef: string;
  readonly declaredSize: number;
  readonly fileExtensionHint?: string;
}

export interface CanonicalAudio {
  localPath: string;
  encoding: 'mp3';
  /** Scoped directory owning localPath; removed by releaseCanonicalAudio. */
  workDir: string;
}

export interface Transcript {
  text: string;
}

export type SummaryOutcome = 'generated' | 'empty' | 'failed';

export interface Summary {
  markupText: string;
  outcome: SummaryOutcome;
  providerId: string;
}

export interface FormattedMessage {
  safeMarkupText: string;
  wellFormed: boolean;
}

export interface ProviderTarget {
  name: string;
  isPrimary: boolean;
}

export interface TargetPair {
  primary: ProviderTarget;
  fallback: ProviderTarget;
}

export function targetPair(primaryModel: string, fallbackModel: string): TargetPair {
  return {
    primary: { name: primaryModel, isPrimary: true },
    fallback: { name: fallbackModel, isPrimary: false },
  };
}

// Per-request values threaded through the pipeline
export interface PipelineContext {
  userId?: number;
  summarizerId?: string;
}
