import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { MediaItem } from '../src/types/media.js';
import type { FetchedMedia, MediaSource } from '../src/pipeline/normalizer.js';
import type { Transcoder, TranscodeProfile } from '../src/pipeline/ffmpeg.js';
import type { SpeechToTextProvider, SpeechToTextRequest } from '../src/types/transcription.js';
import type { SummarizationProvider, SummarizationRequest } from '../src/types/summarization.js';
import type { BotApi } from '../src/telegram/client.js';
import type { SendMessageParams, TelegramFile, TelegramMessage } from '../src/telegram/types.js';
import { TranscodeFailedError } from '../src/errors.js';

export const MiB = 1024 * 1024;

export const noRetry = { primaryAttempts: 1, fallbackAttempts: 1, backoffMs: 0, sleep: async () => {} };

export function makeTempRoot(): string {
  return mkdtempSync(join(tmpdir(), 'voicebrief-test-'));
}

export class FakeSource implements MediaSource {
  fetched: MediaItem[] = [];

  constructor(private readonly result: FetchedMedia = {}) {}

  async fetch(item: MediaItem, destinationPath: string): Promise<FetchedMedia> {
    this.fetched.push(item);
    writeFileSync(destinationPath, Buffer.alloc(512, 1));
    return this.result;
  }
}

export class FakeTranscoder implements Transcoder {
  calls: Array<{ inputPath: string; outputPath: string; profile: TranscodeProfile }> = [];

  constructor(private readonly failure?: TranscodeFailedError) {}

  async transcode(inputPath: string, outputPath: string, profile: TranscodeProfile): Promise<void> {
    this.calls.push({ inputPath, outputPath, profile });
    // ffmpeg leaves a partial file behind when it fails mid-way
    writeFileSync(outputPath, 'ID3');
    if (this.failure) {
      throw this.failure;
    }
  }
}

export class FakeSpeechToText implements SpeechToTextProvider {
  id = 'fake-stt';
  displayName = 'Fake STT';
  models = { primary: 'stt-main', fallback: 'stt-backup' };
  requests: Array<{ request: SpeechToTextRequest; model: string }> = [];

  constructor(private readonly respond: (model: string) => Promise<string>) {}

  transcribe(request: SpeechToTextRequest, model: string): Promise<string> {
    this.requests.push({ request, model });
    return this.respond(model);
  }
}

export class FakeSummarizer implements SummarizationProvider {
  models = { primary: 'sum-main', fallback: 'sum-backup' };
  requests: Array<{ request: SummarizationRequest; model: string }> = [];

  constructor(
    readonly id: string,
    readonly displayName: string,
    private readonly respond: (model: string) => Promise<string>
  ) {}

  summarize(request: SummarizationRequest, model: string): Promise<string> {
    this.requests.push({ request, model });
    return this.respond(model);
  }
}

export class FakeBotApi implements BotApi {
  sent: SendMessageParams[] = [];
  answered: Array<{ id: string; text?: string }> = [];
  fileRequests: string[] = [];
  failHtmlOnce = false;

  async sendMessage(params: SendMessageParams): Promise<TelegramMessage> {
    if (this.failHtmlOnce && params.parseMode === 'HTML') {
      this.failHtmlOnce = false;
      throw new Error("Bad Request: can't parse entities");
    }
    this.sent.push(params);
    return { message_id: 1000 + this.sent.length, chat: { id: params.chatId }, text: params.text };
  }

  async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void> {
    this.answered.push({ id: callbackQueryId, text });
  }

  async getFile(fileId: string): Promise<TelegramFile> {
    this.fileRequests.push(fileId);
    return { file_id: fileId, file_unique_id: `u-${fileId}`, file_path: `voice/${fileId}.oga` };
  }

  async downloadFile(_filePath: string, destinationPath: string): Promise<void> {
    writeFileSync(destinationPath, Buffer.alloc(256, 2));
  }
}
