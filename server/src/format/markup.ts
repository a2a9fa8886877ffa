/**
 * Lightweight markup (the dialect LLMs answer in) to Telegram's HTML subset.
 *
 * Each stage is a pure rewrite over a draft. Code produced by the earlier
 * stages is parked in `fragments` behind NUL-delimited placeholders, so later
 * stages never italicize or re-escape it.
 */
import type { FormattedMessage } from '../types/media.js';

export const ALLOWED_TAGS = [
  'b', 'strong', 'i', 'em', 'u', 'ins', 's', 'strike', 'del', 'code', 'pre', 'tg-spoiler',
] as const;

const ALLOWED_TAG_SET: ReadonlySet<string> = new Set(ALLOWED_TAGS);

export interface MarkupDraft {
  text: string;
  fragments: string[];
}

const PLACEHOLDER = '\u0000';
const PLACEHOLDER_PATTERN = /\u0000(\d+)\u0000/g;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function unescapeHtml(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');
}

/** Tags removed and entities decoded, for sending without a parse mode. */
export function toPlainText(html: string): string {
  return unescapeHtml(html.replace(/<\/?[a-zA-Z][\w-]*(?:\s[^<>]*)?>/g, ''));
}

function park(draft: MarkupDraft, html: string): string {
  draft.fragments.push(html);
  return `${PLACEHOLDER}${draft.fragments.length - 1}${PLACEHOLDER}`;
}

function codeBlockHtml(language: string | undefined, code: string): string {
  const cls = language ? ` class="language-${language}"` : '';
  return `<pre><code${cls}>${escapeHtml(code.trim())}</code></pre>`;
}

export function createDraft(text: string): MarkupDraft {
  return { text: text.replace(/\u0000/g, ''), fragments: [] };
}

// 1. ```lang\n...``` and `lang\n...` blocks
export function convertCodeBlocks(input: MarkupDraft): MarkupDraft {
  const draft = { text: input.text, fragments: [...input.fragments] };
  draft.text = draft.text
    .replace(/```(\w+)?\n([\s\S]*?)```/g, (_m, lang: string | undefined, code: string) =>
      park(draft, codeBlockHtml(lang, code))
    )
    .replace(/`(\w+)\n([\s\S]*?)`/g, (_m, lang: string, code: string) => park(draft, codeBlockHtml(lang, code)));
  return draft;
}

// 2. "* item" -> "• item"
export function convertListMarkers(input: MarkupDraft): MarkupDraft {
  return { ...input, text: input.text.replace(/^([ \t]*)\* /gm, '$1• ') };
}

// 3. `code`, ***bold italic***, **bold**, *italic*
export function convertInlineMarkup(input: MarkupDraft): MarkupDraft {
  const draft = { text: input.text, fragments: [...input.fragments] };
  draft.text = draft.text
    .replace(/`([^`\n]+)`/g, (_m, code: string) => park(draft, `<code>${escapeHtml(code)}</code>`))
    .replace(/\*\*\*(?=\S)(.+?)\*\*\*/g, '<b><i>$1</i></b>')
    .replace(/\*\*(?=\S)(.+?)\*\*/g, '<b>$1</b>')
    .replace(/\*(?=\S)([^*\n]*?\S)\*/g, '<i>$1</i>');
  return draft;
}

// 4. "## Title" -> "Title"
export function stripHeaders(input: MarkupDraft): MarkupDraft {
  return { ...input, text: input.text.replace(/^[ \t]*#{1,6}[ \t]+/gm, '') };
}

const CODE_LANGUAGE_TAG = /&lt;code class="language-([\w-]+)"&gt;/g;

// 5. escape everything, then let the fixed tag set through again
export function escapeAndRestore(input: MarkupDraft): string {
  const tagNames = ALLOWED_TAGS.join('|');
  const allowedTag = new RegExp(`&lt;(/?(?:${tagNames}))&gt;`, 'g');
  return escapeHtml(input.text)
    .replace(allowedTag, '<$1>')
    // the only attribute codeBlockHtml emits
    .replace(CODE_LANGUAGE_TAG, '<code class="language-$1">')
    .replace(PLACEHOLDER_PATTERN, (match, index: string) => input.fragments[Number(index)] ?? match);
}

const TAG_PATTERN = /<(\/?)([a-zA-Z][\w-]*)((?:\s+[\w-]+="[^"<>]*")*)\s*>/y;

/**
 * True when every tag belongs to the allowed vocabulary and tags close in
 * reverse order of opening. A stray "<" makes the text invalid.
 */
export function isWellFormedMarkup(html: string): boolean {
  const stack: string[] = [];
  let pos = html.indexOf('<');
  while (pos !== -1) {
    TAG_PATTERN.lastIndex = pos;
    const match = TAG_PATTERN.exec(html);
    if (!match) return false;
    const [, closing, rawName, attributes] = match;
    const name = rawName.toLowerCase();
    if (!ALLOWED_TAG_SET.has(name)) return false;
    if (closing) {
      if (attributes || stack.pop() !== name) return false;
    } else {
      stack.push(name);
    }
    pos = html.indexOf('<', TAG_PATTERN.lastIndex);
  }
  return stack.length === 0;
}

export function formatMarkup(markupText: string): FormattedMessage {
  const stages = [convertCodeBlocks, convertListMarkers, convertInlineMarkup, stripHeaders];
  const draft = stages.reduce((current, stage) => stage(current), createDraft(markupText));
  const html = escapeAndRestore(draft);

  if (!isWellFormedMarkup(html)) {
    return { safeMarkupText: escapeHtml(markupText), wellFormed: false };
  }
  return { safeMarkupText: html, wellFormed: true };
}
