import { setTimeout as sleep } from 'timers/promises';
import type { TelegramUpdate } from '../telegram/types.js';
import { errorMessage } from '../errors.js';

export interface UpdateSource {
  getUpdates(offset: number, timeoutSeconds: number): Promise<TelegramUpdate[]>;
}

export interface UpdateHandler {
  handleUpdate(update: TelegramUpdate): Promise<void>;
}

export interface PollerOptions {
  timeoutSeconds: number;
  /** Pause after a failed getUpdates call. */
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Long-polls getUpdates and hands each update to the handler without waiting
 * for it, so one slow transcription does not hold back other chats.
 */
export class UpdatePoller {
  private offset = 0;
  private running = false;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly source: UpdateSource,
    private readonly handler: UpdateHandler,
    private readonly options: PollerOptions
  ) {}

  get pending(): number {
    return this.inFlight.size;
  }

  async run(): Promise<void> {
    this.running = true;
    const wait = this.options.sleep ?? sleep;
    console.log('[Bot] Polling for updates');

    while (this.running) {
      let updates: TelegramUpdate[];
      try {
        updates = await this.source.getUpdates(this.offset, this.options.timeoutSeconds);
      } catch (error) {
        console.error(`[Bot] getUpdates failed: ${errorMessage(error)}`);
        await wait(this.options.retryDelayMs ?? 5000);
        continue;
      }

      for (const update of updates) {
        this.offset = Math.max(this.offset, update.update_id + 1);
        this.dispatch(update);
      }
    }
  }

  /** Stops after the current getUpdates call returns. */
  stop(): void {
    this.running = false;
  }

  /** Resolves once every dispatched update has been handled. */
  async drain(): Promise<void> {
    await Promise.all(this.inFlight);
  }

  private dispatch(update: TelegramUpdate): void {
    const task: Promise<void> = this.handler
      .handleUpdate(update)
      .catch((error: unknown) => {
        console.error(`[Bot] Update ${update.update_id} failed:`, error);
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }
}
