import type { MediaItem } from '../types/media.js';
import type { FetchedMedia, MediaSource } from '../pipeline/normalizer.js';
import { extensionOf } from '../pipeline/normalizer.js';
import type { BotApi } from './client.js';
import type { TelegramMessage } from './types.js';

/** The media attachment of a message, or undefined when it carries none we handle. */
export function mediaItemFromMessage(message: TelegramMessage): MediaItem | undefined {
  if (message.voice) {
    return { kind: 'voice', sourceRef: message.voice.file_id, declaredSize: message.voice.file_size ?? 0 };
  }
  if (message.audio) {
    return {
      kind: 'audio',
      sourceRef: message.audio.file_id,
      declaredSize: message.audio.file_size ?? 0,
      fileExtensionHint: extensionOf(message.audio.file_name),
    };
  }
  if (message.video) {
    return {
      kind: 'video',
      sourceRef: message.video.file_id,
      declaredSize: message.video.file_size ?? 0,
      fileExtensionHint: extensionOf(message.video.file_name),
    };
  }
  if (message.video_note) {
    return { kind: 'video_note', sourceRef: message.video_note.file_id, declaredSize: message.video_note.file_size ?? 0 };
  }
  if (message.document) {
    return {
      kind: 'document',
      sourceRef: message.document.file_id,
      declaredSize: message.document.file_size ?? 0,
      fileExtensionHint: extensionOf(message.document.file_name),
    };
  }
  return undefined;
}

// Downloads Telegram files by file_id
export class TelegramMediaSource implements MediaSource {
  constructor(private readonly api: BotApi) {}

  async fetch(item: MediaItem, destinationPath: string): Promise<FetchedMedia> {
    const file = await this.api.getFile(item.sourceRef);
    if (!file.file_path) {
      throw new Error('Telegram did not return a download path for this file');
    }
    console.log(`[Bot] Downloading ${file.file_path}`);
    await this.api.downloadFile(file.file_path, destinationPath);
    return { extension: extensionOf(file.file_path) };
  }
}
