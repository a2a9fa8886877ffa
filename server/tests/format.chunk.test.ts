import { describe, expect, it } from 'vitest';
import { chunkText, joinChunks } from '../src/format/chunk.js';

function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

function isHighSurrogate(text: string, index: number): boolean {
  const code = text.charCodeAt(index);
  return code >= 0xd800 && code <= 0xdbff;
}

function longSummary(): string {
  const paragraphs = Array.from({ length: 22 }, (_, i) => String.fromCharCode(97 + i).repeat(400));
  paragraphs.push('w'.repeat(356));
  return paragraphs.join('\n\n');
}

describe('format/chunk', () => {
  it('packs paragraphs into three bounded chunks', () => {
    const text = longSummary();
    expect(text).toHaveLength(9200);

    const chunks = chunkText(text, 4096);
    expect(chunks.map((c) => c.text.length)).toEqual([4018, 4018, 1160]);
    expect(chunks.map((c) => c.separator)).toEqual(['\n\n', '\n\n', '']);
    expect(joinChunks(chunks)).toBe(text);
  });

  it('splits an over-long paragraph at the last space', () => {
    expect(chunkText('aaa bbb ccc', 7)).toEqual([
      { text: 'aaa bbb', separator: ' ' },
      { text: 'ccc', separator: '' },
    ]);
  });

  it('cuts at the limit when there is no space', () => {
    expect(chunkText('x'.repeat(10), 4).map((c) => c.text)).toEqual(['xxxx', 'xxxx', 'xx']);
  });

  it('never separates a surrogate pair', () => {
    const chunks = chunkText('😀😀😀', 3);
    expect(chunks.map((c) => c.text)).toEqual(['😀', '😀', '😀']);
    expect(joinChunks(chunks)).toBe('😀😀😀');
  });

  it('starts a new chunk after a hard-split paragraph', () => {
    const chunks = chunkText('aaaaaa\n\nbb', 4);
    expect(chunks.map((c) => c.text)).toEqual(['aaaa', 'aa', 'bb']);
    expect(joinChunks(chunks)).toBe('aaaaaa\n\nbb');
  });

  it('stays within the limit and rejoins exactly for arbitrary input', () => {
    const alphabet = ['a', 'b', 'c', ' ', ' ', '\n', '\n\n', '😀', 'ж'];
    const random = seededRandom(4096);

    for (let run = 0; run < 2000; run++) {
      const parts = Math.floor(random() * 120);
      let text = '';
      for (let i = 0; i < parts; i++) {
        text += alphabet[Math.floor(random() * alphabet.length)];
      }
      const maxLength = 2 + Math.floor(random() * 40);

      const chunks = chunkText(text, maxLength);
      const label = JSON.stringify({ text, maxLength });
      expect(joinChunks(chunks), label).toBe(text);
      for (const chunk of chunks) {
        expect(chunk.text.length, label).toBeLessThanOrEqual(maxLength);
        expect(chunk.text.length > 0 && isHighSurrogate(chunk.text, chunk.text.length - 1), label).toBe(false);
      }
    }
  });

  it('keeps short text whole', () => {
    expect(chunkText('one\n\ntwo', 4096)).toEqual([{ text: 'one\n\ntwo', separator: '' }]);
    expect(chunkText('', 10)).toEqual([]);
  });

  it('rejects a non-positive limit', () => {
    expect(() => chunkText('abc', 0)).toThrow(RangeError);
  });
});
