import { describe, expect, it, vi } from 'vitest';
import { UpdatePoller, type UpdateSource } from '../src/bot/polling.js';
import type { TelegramUpdate } from '../src/telegram/types.js';

describe('bot/polling', () => {
  it('advances the offset and dispatches every update', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const offsets: number[] = [];
    const handled: number[] = [];
    const batches: TelegramUpdate[][] = [[{ update_id: 5 }, { update_id: 6 }], [{ update_id: 7 }]];
    let poller: UpdatePoller | undefined;
    let failedOnce = false;

    const source: UpdateSource = {
      async getUpdates(offset) {
        offsets.push(offset);
        if (!failedOnce) {
          failedOnce = true;
          throw new Error('ETIMEDOUT');
        }
        const batch = batches.shift();
        if (!batch) {
          poller?.stop();
          return [];
        }
        return batch;
      },
    };

    const sleep = vi.fn(async () => {});
    poller = new UpdatePoller(
      source,
      {
        async handleUpdate(update) {
          handled.push(update.update_id);
        },
      },
      { timeoutSeconds: 50, retryDelayMs: 1000, sleep }
    );

    await poller.run();
    await poller.drain();

    expect(offsets).toEqual([0, 0, 7, 8]);
    expect(handled).toEqual([5, 6, 7]);
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(poller.pending).toBe(0);
  });
});
