import { mkdtemp, rm } from 'fs/promises';
import { join, extname } from 'path';
import type { CanonicalAudio, MediaItem } from '../types/media.js';
import type { Transcoder, TranscodeProfile } from './ffmpeg.js';
import { TooLargeError, UnsupportedFormatError, errorMessage } from '../errors.js';

export const DOCUMENT_EXTENSIONS = ['mp3', 'wav', 'oga'] as const;

export interface FetchedMedia {
  /** Extension of the remote file when the source knows it (e.g. from a Telegram file path). */
  extension?: string;
}

// Where the raw bytes of a MediaItem come from
export interface MediaSource {
  fetch(item: MediaItem, destinationPath: string): Promise<FetchedMedia>;
}

export interface NormalizerOptions {
  maxFileSize: number;
  tempDir: string;
}

/** "clip.MP4" -> "mp4"; undefined when the name has no extension. */
export function extensionOf(fileName: string | undefined): string | undefined {
  if (!fileName) return undefined;
  return extname(fileName).slice(1).toLowerCase() || undefined;
}

function normalizeHint(hint: string | undefined): string | undefined {
  return hint?.trim().replace(/^\./, '').toLowerCase() || undefined;
}

function defaultExtension(item: MediaItem): string {
  switch (item.kind) {
    case 'voice':
      return 'oga';
    case 'video':
    case 'video_note':
      return 'mp4';
    default:
      return 'mp3';
  }
}

function profileFor(item: MediaItem, extension: string): TranscodeProfile {
  if (item.kind === 'video' || item.kind === 'video_note') return 'video';
  return extension === 'oga' ? 'voice' : 'audio';
}

export class MediaNormalizer {
  constructor(
    private readonly source: MediaSource,
    private readonly transcoder: Transcoder,
    private readonly options: NormalizerOptions
  ) {}

  /** Reject an item before anything is downloaded. */
  validate(item: MediaItem): void {
    if (item.declaredSize > this.options.maxFileSize) {
      throw new TooLargeError(item.declaredSize, this.options.maxFileSize);
    }
    if (item.kind === 'document') {
      const ext = normalizeHint(item.fileExtensionHint);
      if (!ext || !DOCUMENT_EXTENSIONS.some((allowed) => allowed === ext)) {
        throw new UnsupportedFormatError(ext, DOCUMENT_EXTENSIONS);
      }
    }
  }

  /**
   * Produce canonical mp3 audio for an item. The raw download never outlives
   * this call; on failure nothing is left in the temp directory.
   */
  async normalize(item: MediaItem): Promise<CanonicalAudio> {
    this.validate(item);

    const workDir = await mkdtemp(join(this.options.tempDir, 'voicebrief-'));
    try {
      const hintedExt = normalizeHint(item.fileExtensionHint) ?? defaultExtension(item);
      const rawPath = join(workDir, `input.${hintedExt}`);
      const outputPath = join(workDir, 'audio.mp3');

      try {
        const fetched = await this.source.fetch(item, rawPath);
        const sourceExt = normalizeHint(fetched.extension) ?? hintedExt;
        await this.transcoder.transcode(rawPath, outputPath, profileFor(item, sourceExt));
      } finally {
        await rm(rawPath, { force: true });
      }

      return { localPath: outputPath, encoding: 'mp3', workDir };
    } catch (error) {
      await removeWorkDir(workDir);
      throw error;
    }
  }
}

async function removeWorkDir(workDir: string): Promise<void> {
  try {
    await rm(workDir, { recursive: true, force: true });
  } catch (error) {
    console.error(`[Pipeline] Failed to remove ${workDir}: ${errorMessage(error)}`);
  }
}

export async function releaseCanonicalAudio(audio: CanonicalAudio): Promise<void> {
  await removeWorkDir(audio.workDir);
}
