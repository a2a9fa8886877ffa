import { tmpdir } from 'os';
import type { ModelPair } from './types/transcription.js';

export interface AppConfig {
  port: number;
  /** Guards the HTTP summarize endpoint when set. */
  apiKey?: string;
  telegram: {
    botToken?: string;
    apiBaseUrl: string;
    webhookUrl?: string;
    webhookSecret?: string;
    pollTimeoutSeconds: number;
  };
  media: {
    maxFileSize: number;
    ffmpegPath: string;
    transcodeTimeoutMs: number;
    tempDir: string;
  };
  delivery: {
    maxMessageLength: number;
    summarySpoiler: boolean;
  };
  retry: {
    primaryAttempts: number;
    fallbackAttempts: number;
    backoffMs: number;
  };
  stt: {
    provider: string;
    assemblyai: { apiKey?: string; models: ModelPair };
  };
  summarization: {
    defaultProvider: string;
    language: string;
    systemPrompt?: string;
    userPrompt?: string;
  };
  gemini: { apiKey?: string; models: ModelPair };
  openai: { apiKey?: string; baseUrl?: string; models: ModelPair };
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, key: string, fallback: number, min = 0): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new Error(`${key} must be a boolean, got '${raw}'`);
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readInt(env, 'PORT', 3000),
    apiKey: readString(env, 'API_KEY'),
    telegram: {
      botToken: readString(env, 'BOT_TOKEN'),
      apiBaseUrl: readString(env, 'TELEGRAM_API_BASE_URL') ?? 'https://api.telegram.org',
      webhookUrl: readString(env, 'TELEGRAM_WEBHOOK_URL'),
      webhookSecret: readString(env, 'TELEGRAM_WEBHOOK_SECRET'),
      pollTimeoutSeconds: readInt(env, 'TELEGRAM_POLL_TIMEOUT_SECONDS', 50),
    },
    media: {
      maxFileSize: readInt(env, 'MAX_FILE_SIZE_MB', 20, 1) * 1024 * 1024,
      ffmpegPath: readString(env, 'FFMPEG_PATH') ?? 'ffmpeg',
      transcodeTimeoutMs: readInt(env, 'TRANSCODE_TIMEOUT_SECONDS', 120, 1) * 1000,
      tempDir: readString(env, 'MEDIA_TEMP_DIR') ?? tmpdir(),
    },
    delivery: {
      maxMessageLength: readInt(env, 'MAX_MESSAGE_LENGTH', 4096, 256),
      summarySpoiler: readBool(env, 'SUMMARY_SPOILER', true),
    },
    retry: {
      primaryAttempts: readInt(env, 'PRIMARY_ATTEMPTS', 3, 1),
      fallbackAttempts: readInt(env, 'FALLBACK_ATTEMPTS', 5, 1),
      backoffMs: readInt(env, 'RETRY_BACKOFF_SECONDS', 3) * 1000,
    },
    stt: {
      provider: readString(env, 'STT_PROVIDER') ?? 'assemblyai',
      assemblyai: {
        apiKey: readString(env, 'ASSEMBLYAI_API_KEY'),
        models: {
          primary: readString(env, 'ASSEMBLYAI_PRIMARY_MODEL') ?? 'best',
          fallback: readString(env, 'ASSEMBLYAI_FALLBACK_MODEL') ?? 'nano',
        },
      },
    },
    summarization: {
      defaultProvider: readString(env, 'SUMMARY_PROVIDER') ?? 'gemini',
      language: readString(env, 'SUMMARY_LANGUAGE') ?? 'Russian',
      systemPrompt: readString(env, 'SUMMARY_SYSTEM_PROMPT'),
      userPrompt: readString(env, 'SUMMARY_USER_PROMPT'),
    },
    gemini: {
      apiKey: readString(env, 'GOOGLE_API_KEY'),
      models: {
        primary: readString(env, 'GEMINI_PRIMARY_MODEL') ?? 'gemini-2.5-flash',
        fallback: readString(env, 'GEMINI_FALLBACK_MODEL') ?? 'gemini-2.0-flash',
      },
    },
    openai: {
      apiKey: readString(env, 'OPENAI_API_KEY'),
      baseUrl: readString(env, 'OPENAI_BASE_URL'),
      models: {
        primary: readString(env, 'OPENAI_PRIMARY_MODEL') ?? 'gpt-4o-mini',
        fallback: readString(env, 'OPENAI_FALLBACK_MODEL') ?? 'gpt-4.1-mini',
      },
    },
  };
}
