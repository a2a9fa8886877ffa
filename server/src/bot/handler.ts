import type { MediaPipeline, PipelineOutcome } from '../pipeline/pipeline.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type { SummarizationProvider } from '../types/summarization.js';
import type { FormattedMessage, Summary, Transcript } from '../types/media.js';
import type { BotApi } from '../telegram/client.js';
import type { TelegramCallbackQuery, TelegramMessage, TelegramUpdate } from '../telegram/types.js';
import { mediaItemFromMessage } from '../telegram/media.js';
import { escapeHtml } from '../format/markup.js';
import { TranscodeFailedError, errorMessage, formatMegabytes } from '../errors.js';
import { buildMessageParts, sendParts } from './delivery.js';
import type { SessionStore } from './sessions.js';

export const MODEL_CALLBACK_PREFIX = 'model_';

export interface BotHandlerOptions {
  maxFileSize: number;
  maxMessageLength: number;
  summarySpoiler: boolean;
  transcriberName: string;
  defaultSummarizerId: string;
}

export interface BotHandlerDeps {
  api: BotApi;
  pipeline: MediaPipeline;
  sessions: SessionStore;
  summarizers: ProviderRegistry<SummarizationProvider>;
  options: BotHandlerOptions;
}

export const HELP_TEXT =
  'Send me a voice message, an audio file, a video or a video note and I will transcribe and summarize it.';
export const NO_SPEECH_TEXT = 'No speech detected in this message.';
export const NO_SPEECH_MEDIA_TEXT = 'Animations and stickers have no speech to transcribe. ' + HELP_TEXT;

/** "/change_model@my_bot args" -> "/change_model" */
function commandOf(text: string): string | undefined {
  const match = /^\/([a-z_]+)(?:@\S+)?(?:\s|$)/i.exec(text.trim());
  return match ? `/${match[1].toLowerCase()}` : undefined;
}

export function describeOutcome(outcome: Exclude<PipelineOutcome, { status: 'completed' }>): string {
  switch (outcome.status) {
    case 'rejected':
      return outcome.error.message;
    case 'no-speech':
      return NO_SPEECH_TEXT;
    case 'failed':
      if (outcome.error instanceof TranscodeFailedError) {
        return `Could not convert the media to audio: ${outcome.error.message}`;
      }
      if (outcome.stage === 'normalize') {
        return `Could not download the file: ${errorMessage(outcome.error)}`;
      }
      return `Transcription failed: ${errorMessage(outcome.error)}`;
  }
}

export class BotHandler {
  constructor(private readonly deps: BotHandlerDeps) {}

  /** Handles one update. Failures are logged here and never reach the caller. */
  async handleUpdate(update: TelegramUpdate): Promise<void> {
    try {
      if (update.callback_query) {
        await this.handleCallback(update.callback_query);
      } else if (update.message) {
        await this.handleMessage(update.message);
      }
    } catch (error) {
      console.error(`[Bot] Update ${update.update_id} failed:`, error);
    }
  }

  private async reply(message: TelegramMessage, text: string): Promise<void> {
    await this.deps.api.sendMessage({ chatId: message.chat.id, text, replyTo: message.message_id });
  }

  private async handleMessage(message: TelegramMessage): Promise<void> {
    // Animations also carry a document field
    if (message.animation || message.sticker) {
      await this.reply(message, NO_SPEECH_MEDIA_TEXT);
      return;
    }

    if (message.text !== undefined) {
      const command = commandOf(message.text);
      if (command === '/start') {
        await this.reply(message, this.welcomeText());
      } else if (command === '/change_model') {
        await this.sendModelKeyboard(message);
      } else {
        await this.reply(message, HELP_TEXT);
      }
      return;
    }

    if (mediaItemFromMessage(message)) {
      await this.processMedia(message);
    }
  }

  private welcomeText(): string {
    const { maxFileSize, transcriberName, defaultSummarizerId } = this.deps.options;
    const summarizer = this.deps.summarizers.get(defaultSummarizerId)?.displayName ?? 'not configured';
    return [
      'Hi! ' + HELP_TEXT,
      '',
      `Files up to ${formatMegabytes(maxFileSize)}. Documents must be .mp3, .wav or .oga.`,
      `Transcription: ${transcriberName}`,
      `Summaries: ${summarizer}`,
      '',
      'Use /change_model to pick the summarization model.',
    ].join('\n');
  }

  private async sendModelKeyboard(message: TelegramMessage): Promise<void> {
    const providers = this.deps.summarizers.list();
    if (providers.length === 0) {
      await this.reply(message, 'No summarization providers are configured.');
      return;
    }
    await this.deps.api.sendMessage({
      chatId: message.chat.id,
      text: 'Choose the summarization model:',
      replyTo: message.message_id,
      replyMarkup: {
        inline_keyboard: providers.map((p) => [{ text: p.displayName, callback_data: `${MODEL_CALLBACK_PREFIX}${p.id}` }]),
      },
    });
  }

  private async handleCallback(query: TelegramCallbackQuery): Promise<void> {
    const data = query.data ?? '';
    if (!data.startsWith(MODEL_CALLBACK_PREFIX)) {
      await this.deps.api.answerCallbackQuery(query.id);
      return;
    }

    const provider = this.deps.summarizers.get(data.slice(MODEL_CALLBACK_PREFIX.length));
    if (!provider) {
      await this.deps.api.answerCallbackQuery(query.id, 'This model is no longer available');
      return;
    }

    await this.deps.sessions.update(query.from.id, { summarizerId: provider.id });
    console.log(`[Bot] User ${query.from.id} switched summaries to ${provider.id}`);
    await this.deps.api.answerCallbackQuery(query.id, `Model set to ${provider.displayName}`);
    if (query.message) {
      await this.deps.api.sendMessage({
        chatId: query.message.chat.id,
        text: `Summaries will now use ${provider.displayName}.`,
      });
    }
  }

  private async processMedia(message: TelegramMessage): Promise<void> {
    const item = mediaItemFromMessage(message);
    if (!item) return;

    const { api, pipeline, sessions, options } = this.deps;
    const chatId = message.chat.id;
    const userId = message.from?.id;
    console.log(`[Bot] ${item.kind} (${item.declaredSize} bytes) from chat ${chatId}`);

    const session = userId !== undefined ? await sessions.get(userId) : undefined;

    const outcome = await pipeline.run(
      item,
      { userId, summarizerId: session?.summarizerId },
      {
        onTranscript: async (transcript: Transcript) => {
          const parts = buildMessageParts('Transcription', escapeHtml(transcript.text), {
            maxLength: options.maxMessageLength,
          });
          await sendParts(api, chatId, message.message_id, parts);
        },
        onSummary: async (_summary: Summary, formatted: FormattedMessage) => {
          const parts = buildMessageParts('Summary', formatted.safeMarkupText, {
            maxLength: options.maxMessageLength,
            spoiler: options.summarySpoiler,
          });
          await sendParts(api, chatId, message.message_id, parts);
        },
      }
    );

    if (outcome.status !== 'completed') {
      await this.reply(message, describeOutcome(outcome));
    }
  }
}
