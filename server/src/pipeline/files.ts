import { copyFile } from 'fs/promises';
import type { MediaItem, MediaKind } from '../types/media.js';
import { extensionOf, type FetchedMedia, type MediaSource } from './normalizer.js';

export interface UploadedFile {
  path: string;
  originalname: string;
  mimetype: string;
  size: number;
}

function kindForMimeType(mimeType: string): MediaKind {
  if (mimeType.startsWith('video/')) return 'video';
  if (mimeType.startsWith('audio/')) return 'audio';
  return 'document';
}

/** Uploads without an audio or video MIME type are treated as documents and checked by extension. */
export function mediaItemFromUpload(file: UploadedFile): MediaItem {
  return {
    kind: kindForMimeType(file.mimetype),
    sourceRef: file.path,
    declaredSize: file.size,
    fileExtensionHint: extensionOf(file.originalname),
  };
}

// Items whose sourceRef is a path on local disk, such as HTTP uploads
export class LocalFileSource implements MediaSource {
  async fetch(item: MediaItem, destinationPath: string): Promise<FetchedMedia> {
    await copyFile(item.sourceRef, destinationPath);
    return {};
  }
}
