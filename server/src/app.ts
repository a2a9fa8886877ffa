import express from 'express';
import cors from 'cors';
import multer from 'multer';
import { randomUUID } from 'crypto';
import { extname } from 'path';
import { rm } from 'fs/promises';
import type { AppConfig } from './config.js';
import type { Providers } from './providers/registry.js';
import type { MediaPipeline, PipelineOutcome } from './pipeline/pipeline.js';
import type { UpdateHandler } from './bot/polling.js';
import type { TelegramUpdate } from './telegram/types.js';
import { mediaItemFromUpload } from './pipeline/files.js';
import { chunkText } from './format/chunk.js';
import { TranscodeFailedError, errorMessage, formatMegabytes } from './errors.js';

export interface AppDeps {
  config: AppConfig;
  providers: Providers;
  /** Pipeline reading uploads from local disk. */
  pipeline: MediaPipeline;
  /** Receives webhook updates; the webhook route answers 404 without it. */
  botHandler?: UpdateHandler;
}

export const WEBHOOK_SECRET_HEADER = 'x-telegram-bot-api-secret-token';

function isTelegramUpdate(value: unknown): value is TelegramUpdate {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'update_id') === 'number';
}

export function errorStatus(outcome: Exclude<PipelineOutcome, { status: 'completed' }>): { status: number; error: string; message: string } {
  switch (outcome.status) {
    case 'rejected':
      return {
        status: outcome.error.code === 'TOO_LARGE' ? 413 : 400,
        error: outcome.error.code,
        message: outcome.error.message,
      };
    case 'no-speech':
      return { status: 422, error: 'EMPTY_TRANSCRIPT', message: 'No speech detected' };
    case 'failed': {
      const message = errorMessage(outcome.error);
      if (outcome.error instanceof TranscodeFailedError) {
        return { status: 500, error: 'TRANSCODE_FAILED', message };
      }
      if (outcome.stage === 'normalize') {
        return { status: 500, error: 'FETCH_FAILED', message };
      }
      return { status: 502, error: 'TRANSCRIPTION_FAILED', message };
    }
  }
}

export function createApp({ config, providers, pipeline, botHandler }: AppDeps): express.Express {
  const app = express();

  // Auth middleware for protected endpoints
  const requireAuth: express.RequestHandler = (req, res, next) => {
    if (!config.apiKey) {
      // No key configured, allow all requests
      return next();
    }
    if (req.get('x-api-key') !== config.apiKey) {
      return res.status(401).json({ error: 'Unauthorized', message: 'Valid API key required' });
    }
    next();
  };

  const upload = multer({
    storage: multer.diskStorage({
      destination: config.media.tempDir,
      filename: (_req, file, cb) => {
        cb(null, `voicebrief-upload-${randomUUID()}${extname(file.originalname).toLowerCase()}`);
      },
    }),
    limits: { fileSize: config.media.maxFileSize, files: 1 },
  });

  const acceptUpload: express.RequestHandler = (req, res, next) => {
    upload.single('file')(req, res, (err: unknown) => {
      if (!err) return next();
      if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
        return res.status(413).json({
          error: 'TOO_LARGE',
          message: `File exceeds the ${formatMegabytes(config.media.maxFileSize)} limit`,
        });
      }
      res.status(400).json({ error: 'UPLOAD_FAILED', message: errorMessage(err) });
    });
  };

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Get available providers
  app.get('/api/providers', (_req, res) => {
    res.json({
      stt: providers.stt.list(),
      summarizers: providers.summarizers.list(),
      defaultSummarizer: config.summarization.defaultProvider,
    });
  });

  // Transcribe and summarize an uploaded media file (protected)
  app.post('/api/summarize', requireAuth, acceptUpload, async (req, res) => {
    const file = req.file;
    if (!file) {
      return res.status(400).json({ error: 'NO_FILE', message: 'Upload a media file in the "file" field' });
    }

    try {
      const requested: unknown = req.body?.provider;
      const summarizerId = typeof requested === 'string' && requested ? requested : undefined;
      if (summarizerId && !providers.summarizers.get(summarizerId)) {
        return res.status(400).json({ error: 'UNKNOWN_PROVIDER', message: `Provider ${summarizerId} is not available` });
      }

      console.log(`[HTTP] Summarizing ${file.originalname} (${file.size} bytes)`);
      const outcome = await pipeline.run(mediaItemFromUpload(file), { summarizerId });
      if (outcome.status !== 'completed') {
        const { status, ...body } = errorStatus(outcome);
        return res.status(status).json(body);
      }

      const html = outcome.formatted.safeMarkupText;
      res.json({
        success: true,
        transcript: outcome.transcript.text,
        summary: {
          html,
          wellFormed: outcome.formatted.wellFormed,
          outcome: outcome.summary.outcome,
          providerId: outcome.summary.providerId,
        },
        chunks: chunkText(html, config.delivery.maxMessageLength).map((chunk) => chunk.text),
      });
    } catch (error) {
      console.error('[HTTP] Summarize error:', error);
      res.status(500).json({ error: 'INTERNAL', message: errorMessage(error) });
    } finally {
      await rm(file.path, { force: true }).catch((error: unknown) => {
        console.error(`[HTTP] Failed to remove upload ${file.path}: ${errorMessage(error)}`);
      });
    }
  });

  // Telegram webhook: acknowledge first, process in the background
  app.post('/telegram/webhook', (req, res) => {
    if (!botHandler) {
      return res.status(404).json({ error: 'NOT_FOUND', message: 'Bot is not enabled' });
    }
    const secret = config.telegram.webhookSecret;
    if (secret && req.get(WEBHOOK_SECRET_HEADER) !== secret) {
      return res.status(401).json({ error: 'Unauthorized', message: 'Invalid webhook secret' });
    }
    const update: unknown = req.body;
    if (!isTelegramUpdate(update)) {
      return res.status(400).json({ error: 'BAD_UPDATE', message: 'Expected a Telegram update' });
    }

    res.sendStatus(200);
    botHandler.handleUpdate(update).catch((error: unknown) => {
      console.error(`[Bot] Update ${update.update_id} failed:`, error);
    });
  });

  return app;
}
