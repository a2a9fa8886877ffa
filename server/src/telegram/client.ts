import { writeFile } from 'fs/promises';
import type {
  SendMessageParams,
  TelegramFile,
  TelegramMessage,
  TelegramResponse,
  TelegramUpdate,
} from './types.js';

export class TelegramApiError extends Error {
  constructor(readonly method: string, readonly errorCode: number, readonly description: string) {
    super(`Telegram ${method} failed (${errorCode}): ${description}`);
    this.name = 'TelegramApiError';
  }
}

/** The Bot API calls the handlers depend on. */
export interface BotApi {
  sendMessage(params: SendMessageParams): Promise<TelegramMessage>;
  answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void>;
  getFile(fileId: string): Promise<TelegramFile>;
  downloadFile(filePath: string, destinationPath: string): Promise<void>;
}

export interface TelegramClientOptions {
  apiBaseUrl: string;
}

export class TelegramClient implements BotApi {
  private readonly baseUrl: string;

  constructor(private readonly token: string, options: TelegramClientOptions) {
    if (!token) {
      throw new Error('Telegram bot token is required');
    }
    this.baseUrl = options.apiBaseUrl.replace(/\/+$/, '');
  }

  private async call<T>(method: string, payload: Record<string, unknown> = {}, timeoutMs = 30_000): Promise<T> {
    const res = await fetch(`${this.baseUrl}/bot${this.token}/${method}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(timeoutMs),
    });

    const body = await res.text();
    let parsed: TelegramResponse<T>;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new TelegramApiError(method, res.status, body.slice(0, 200) || res.statusText);
    }

    if (!parsed.ok || parsed.result === undefined) {
      throw new TelegramApiError(method, parsed.error_code ?? res.status, parsed.description ?? 'unknown error');
    }
    return parsed.result;
  }

  getUpdates(offset: number, timeoutSeconds: number): Promise<TelegramUpdate[]> {
    return this.call<TelegramUpdate[]>(
      'getUpdates',
      { offset, timeout: timeoutSeconds, allowed_updates: ['message', 'callback_query'] },
      (timeoutSeconds + 10) * 1000
    );
  }

  getFile(fileId: string): Promise<TelegramFile> {
    return this.call<TelegramFile>('getFile', { file_id: fileId });
  }

  async downloadFile(filePath: string, destinationPath: string): Promise<void> {
    const res = await fetch(`${this.baseUrl}/file/bot${this.token}/${filePath}`, {
      signal: AbortSignal.timeout(120_000),
    });
    if (!res.ok) {
      throw new TelegramApiError('downloadFile', res.status, res.statusText);
    }
    await writeFile(destinationPath, Buffer.from(await res.arrayBuffer()));
  }

  sendMessage(params: SendMessageParams): Promise<TelegramMessage> {
    return this.call<TelegramMessage>('sendMessage', {
      chat_id: params.chatId,
      text: params.text,
      parse_mode: params.parseMode,
      reply_markup: params.replyMarkup,
      reply_parameters: params.replyTo
        ? { message_id: params.replyTo, allow_sending_without_reply: true }
        : undefined,
      link_preview_options: { is_disabled: true },
    });
  }

  async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void> {
    await this.call<boolean>('answerCallbackQuery', { callback_query_id: callbackQueryId, text });
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    await this.call<boolean>('setWebhook', {
      url,
      secret_token: secretToken,
      allowed_updates: ['message', 'callback_query'],
    });
  }

  async deleteWebhook(): Promise<void> {
    await this.call<boolean>('deleteWebhook', { drop_pending_updates: false });
  }
}
