// Subset of the Telegram Bot API objects this bot reads

export interface TelegramUser {
  id: number;
  first_name?: string;
  username?: string;
}

export interface TelegramChat {
  id: number;
  type?: string;
}

export interface TelegramFileBase {
  file_id: string;
  file_unique_id: string;
  file_size?: number;
}

export interface TelegramVoice extends TelegramFileBase {
  duration?: number;
  mime_type?: string;
}

export interface TelegramAudio extends TelegramFileBase {
  duration?: number;
  file_name?: string;
  mime_type?: string;
}

export interface TelegramVideo extends TelegramFileBase {
  duration?: number;
  file_name?: string;
  mime_type?: string;
}

export interface TelegramVideoNote extends TelegramFileBase {
  duration?: number;
  length?: number;
}

export interface TelegramDocument extends TelegramFileBase {
  file_name?: string;
  mime_type?: string;
}

export interface TelegramMessage {
  message_id: number;
  from?: TelegramUser;
  chat: TelegramChat;
  text?: string;
  voice?: TelegramVoice;
  audio?: TelegramAudio;
  video?: TelegramVideo;
  video_note?: TelegramVideoNote;
  document?: TelegramDocument;
  animation?: TelegramFileBase;
  sticker?: TelegramFileBase;
}

export interface TelegramCallbackQuery {
  id: string;
  from: TelegramUser;
  message?: TelegramMessage;
  data?: string;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
  callback_query?: TelegramCallbackQuery;
}

export interface TelegramFile {
  file_id: string;
  file_unique_id: string;
  file_size?: number;
  file_path?: string;
}

export interface InlineKeyboardButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboardMarkup {
  inline_keyboard: InlineKeyboardButton[][];
}

export type ParseMode = 'HTML';

export interface SendMessageParams {
  chatId: number;
  text: string;
  replyTo?: number;
  parseMode?: ParseMode;
  replyMarkup?: InlineKeyboardMarkup;
}

export interface TelegramResponse<T> {
  ok: boolean;
  result?: T;
  error_code?: number;
  description?: string;
}
