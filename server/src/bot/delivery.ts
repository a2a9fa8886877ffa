import { chunkText } from '../format/chunk.js';
import { escapeHtml, isWellFormedMarkup, toPlainText } from '../format/markup.js';
import type { BotApi } from '../telegram/client.js';
import type { ParseMode } from '../telegram/types.js';
import { errorMessage } from '../errors.js';

export interface OutgoingPart {
  text: string;
  parseMode?: ParseMode;
}

export interface MessagePartOptions {
  maxLength: number;
  /** Hide each part's body behind a spoiler. */
  spoiler?: boolean;
}

const SPOILER_OPEN = '<tg-spoiler>';
const SPOILER_CLOSE = '</tg-spoiler>';

/**
 * Split an HTML body into Telegram messages. The bold title goes in front of
 * the first part and every part stays within `maxLength`. A part whose tags
 * were cut apart by the split is sent as plain text.
 */
export function buildMessageParts(title: string | undefined, bodyHtml: string, options: MessagePartOptions): OutgoingPart[] {
  const header = title ? `<b>${escapeHtml(title)}</b>\n\n` : '';
  const open = options.spoiler ? SPOILER_OPEN : '';
  const close = options.spoiler ? SPOILER_CLOSE : '';
  const budget = options.maxLength - header.length - open.length - close.length;
  if (budget < 1) {
    throw new RangeError(`maxLength ${options.maxLength} leaves no room for the message body`);
  }

  const chunks = chunkText(bodyHtml, budget).filter((chunk) => chunk.text.trim().length > 0);
  if (chunks.length === 0) {
    return header ? [{ text: header.trimEnd(), parseMode: 'HTML' }] : [];
  }

  return chunks.map((chunk, index) => {
    const html = `${index === 0 ? header : ''}${open}${chunk.text}${close}`;
    if (isWellFormedMarkup(html)) {
      return { text: html, parseMode: 'HTML' };
    }
    return { text: toPlainText(html) };
  });
}

/**
 * Send parts in order as replies. A part Telegram refuses to parse as HTML is
 * sent again without a parse mode.
 */
export async function sendParts(api: BotApi, chatId: number, replyTo: number, parts: OutgoingPart[]): Promise<void> {
  for (const part of parts) {
    try {
      await api.sendMessage({ chatId, text: part.text, replyTo, parseMode: part.parseMode });
    } catch (error) {
      if (!part.parseMode) throw error;
      console.warn(`[Bot] HTML message rejected in chat ${chatId}, resending as plain text: ${errorMessage(error)}`);
      await api.sendMessage({ chatId, text: toPlainText(part.text), replyTo });
    }
  }
}
