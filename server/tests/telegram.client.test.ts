import { readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { TelegramApiError, TelegramClient } from '../src/telegram/client.js';
import { makeTempRoot } from './helpers.js';

interface FetchInit {
  method?: string;
  body?: string;
}

function stubFetch(respond: () => Response) {
  const fetchMock = vi.fn(async (_url: string, _init?: FetchInit) => respond());
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

const client = () => new TelegramClient('test-token', { apiBaseUrl: 'https://api.telegram.test/' });

describe('telegram/client', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the payload and returns the result', async () => {
    const fetchMock = stubFetch(
      () => new Response(JSON.stringify({ ok: true, result: { file_id: 'f1', file_unique_id: 'u1', file_path: 'voice/f1.oga' } }))
    );

    await expect(client().getFile('f1')).resolves.toEqual({ file_id: 'f1', file_unique_id: 'u1', file_path: 'voice/f1.oga' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.telegram.test/bottest-token/getFile');
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
    expect(JSON.parse(fetchMock.mock.calls[0]?.[1]?.body ?? '')).toEqual({ file_id: 'f1' });
  });

  it('sends replies without link previews', async () => {
    const fetchMock = stubFetch(() => new Response(JSON.stringify({ ok: true, result: { message_id: 5, chat: { id: 7 } } })));

    await client().sendMessage({ chatId: 7, text: '<b>hi</b>', replyTo: 3, parseMode: 'HTML' });

    expect(JSON.parse(fetchMock.mock.calls[0]?.[1]?.body ?? '')).toEqual({
      chat_id: 7,
      text: '<b>hi</b>',
      parse_mode: 'HTML',
      reply_parameters: { message_id: 3, allow_sending_without_reply: true },
      link_preview_options: { is_disabled: true },
    });
  });

  it('raises the error Telegram reports', async () => {
    stubFetch(
      () =>
        new Response(JSON.stringify({ ok: false, error_code: 400, description: 'Bad Request: chat not found' }), { status: 400 })
    );

    const failure = client().sendMessage({ chatId: 7, text: 'hi' });
    await expect(failure).rejects.toBeInstanceOf(TelegramApiError);
    await expect(failure).rejects.toMatchObject({
      method: 'sendMessage',
      errorCode: 400,
      message: 'Telegram sendMessage failed (400): Bad Request: chat not found',
    });
  });

  it('raises the HTTP status when the body is not JSON', async () => {
    stubFetch(() => new Response('<html>bad gateway</html>', { status: 502 }));

    await expect(client().getFile('f1')).rejects.toThrow('Telegram getFile failed (502): <html>bad gateway</html>');
  });

  it('downloads files to disk', async () => {
    const fetchMock = stubFetch(() => new Response('OggS-bytes'));
    const tempRoot = makeTempRoot();
    try {
      const destination = join(tempRoot, 'input.oga');
      await client().downloadFile('voice/f1.oga', destination);

      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.telegram.test/file/bottest-token/voice/f1.oga');
      expect(readFileSync(destination, 'utf-8')).toBe('OggS-bytes');
    } finally {
      rmSync(tempRoot, { recursive: true, force: true });
    }
  });

  it('fails a download with a non-OK status', async () => {
    stubFetch(() => new Response('', { status: 404, statusText: 'Not Found' }));

    await expect(client().downloadFile('voice/gone.oga', '/nonexistent/input.oga')).rejects.toThrow(
      'Telegram downloadFile failed (404): Not Found'
    );
  });
});
