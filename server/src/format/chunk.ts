export const PARAGRAPH_SEPARATOR = '\n\n';

export interface MessageChunk {
  text: string;
  /** Original text between this chunk and the next one ('' after the last). */
  separator: string;
}

export function joinChunks(chunks: readonly MessageChunk[]): string {
  return chunks.map((chunk) => chunk.text + chunk.separator).join('');
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Split an over-long paragraph at the last whitespace at or before `maxLength`,
 * or exactly at the limit when there is none. The whitespace character becomes
 * the separator so nothing is lost.
 */
function hardSplit(paragraph: string, maxLength: number): { pieces: MessageChunk[]; rest: string } {
  const pieces: MessageChunk[] = [];
  let rest = paragraph;

  while (rest.length > maxLength) {
    const boundary = Math.max(rest.lastIndexOf(' ', maxLength), rest.lastIndexOf('\n', maxLength));
    if (boundary > 0) {
      pieces.push({ text: rest.slice(0, boundary), separator: rest[boundary] });
      rest = rest.slice(boundary + 1);
      continue;
    }
    let cut = maxLength;
    if (cut > 1 && isHighSurrogate(rest.charCodeAt(cut - 1))) {
      cut -= 1;
    }
    pieces.push({ text: rest.slice(0, cut), separator: '' });
    rest = rest.slice(cut);
  }

  return { pieces, rest };
}

/**
 * Pack paragraphs greedily into chunks of at most `maxLength` characters.
 * `joinChunks(chunkText(text, n)) === text` for every input.
 */
export function chunkText(text: string, maxLength: number): MessageChunk[] {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
  }
  if (text.length === 0) return [];

  const chunks: MessageChunk[] = [];
  let current: string | null = null;

  const flush = (separator: string) => {
    if (current !== null) {
      chunks.push({ text: current, separator });
      current = null;
    }
  };

  for (const paragraph of text.split(PARAGRAPH_SEPARATOR)) {
    if (current !== null && current.length + PARAGRAPH_SEPARATOR.length + paragraph.length <= maxLength) {
      current += PARAGRAPH_SEPARATOR + paragraph;
      continue;
    }

    flush(PARAGRAPH_SEPARATOR);

    if (paragraph.length <= maxLength) {
      current = paragraph;
      continue;
    }

    const { pieces, rest } = hardSplit(paragraph, maxLength);
    chunks.push(...pieces);
    current = rest;
  }

  flush('');
  return chunks;
}
