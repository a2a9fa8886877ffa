import dotenv from 'dotenv';
import { loadConfig, type AppConfig } from './config.js';
import { initializeProviders, type Providers } from './providers/registry.js';
import { createApp } from './app.js';
import { FfmpegTranscoder } from './pipeline/ffmpeg.js';
import { MediaNormalizer, type MediaSource } from './pipeline/normalizer.js';
import { TranscriptionOrchestrator } from './pipeline/transcriber.js';
import { SummarizationOrchestrator } from './pipeline/summarizer.js';
import { MediaPipeline } from './pipeline/pipeline.js';
import { LocalFileSource } from './pipeline/files.js';
import { TelegramClient } from './telegram/client.js';
import { TelegramMediaSource } from './telegram/media.js';
import { BotHandler } from './bot/handler.js';
import { InMemorySessionStore } from './bot/sessions.js';
import { UpdatePoller } from './bot/polling.js';

// Load environment variables
dotenv.config();

function buildPipeline(config: AppConfig, providers: Providers, source: MediaSource): MediaPipeline {
  const stt = providers.stt.get(config.stt.provider);
  if (!stt) {
    throw new Error(`Speech-to-text provider '${config.stt.provider}' is not configured; check its API key`);
  }
  if (!providers.summarizers.get(config.summarization.defaultProvider)) {
    console.warn(`Summarization provider '${config.summarization.defaultProvider}' is not configured`);
  }

  const transcoder = new FfmpegTranscoder({
    binaryPath: config.media.ffmpegPath,
    timeoutMs: config.media.transcodeTimeoutMs,
  });
  const normalizer = new MediaNormalizer(source, transcoder, {
    maxFileSize: config.media.maxFileSize,
    tempDir: config.media.tempDir,
  });
  const { language, systemPrompt, userPrompt } = config.summarization;

  return new MediaPipeline(
    normalizer,
    new TranscriptionOrchestrator(stt, config.retry),
    new SummarizationOrchestrator(
      providers.summarizers,
      config.summarization.defaultProvider,
      { language, systemPrompt, userPrompt },
      config.retry
    )
  );
}

async function main(): Promise<void> {
  const config = loadConfig();
  const providers = initializeProviders(config);

  let botHandler: BotHandler | undefined;
  let poller: UpdatePoller | undefined;
  const token = config.telegram.botToken;

  if (token) {
    const client = new TelegramClient(token, { apiBaseUrl: config.telegram.apiBaseUrl });
    const pipeline = buildPipeline(config, providers, new TelegramMediaSource(client));
    botHandler = new BotHandler({
      api: client,
      pipeline,
      sessions: new InMemorySessionStore(),
      summarizers: providers.summarizers,
      options: {
        maxFileSize: config.media.maxFileSize,
        maxMessageLength: config.delivery.maxMessageLength,
        summarySpoiler: config.delivery.summarySpoiler,
        transcriberName: pipeline.transcriberName,
        defaultSummarizerId: config.summarization.defaultProvider,
      },
    });

    if (config.telegram.webhookUrl) {
      await client.setWebhook(config.telegram.webhookUrl, config.telegram.webhookSecret);
      console.log(`[Bot] Webhook set to ${config.telegram.webhookUrl}`);
    } else {
      await client.deleteWebhook();
      poller = new UpdatePoller(client, botHandler, { timeoutSeconds: config.telegram.pollTimeoutSeconds });
    }
  } else {
    console.warn('BOT_TOKEN not found in environment, running the HTTP API only');
  }

  const app = createApp({
    config,
    providers,
    pipeline: buildPipeline(config, providers, new LocalFileSource()),
    botHandler,
  });

  const server = app.listen(config.port, () => {
    console.log(`Transcription: ${providers.stt.list().map((p) => p.displayName).join(', ') || 'none'}`);
    console.log(`Summaries: ${providers.summarizers.list().map((p) => p.displayName).join(', ') || 'none'}`);
    console.log(`Server running on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, shutting down`);
    poller?.stop();
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  if (poller) {
    await poller.run();
    await poller.drain();
  }
}

main().catch((error: unknown) => {
  console.error('Failed to start:', error);
  process.exit(1);
});
