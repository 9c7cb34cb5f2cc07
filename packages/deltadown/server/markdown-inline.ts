/**
 * Inline Markdown -> text ops.
 * Scans one line left to right; supports `code`, [label](url), ***bold italic***,
 * **bold**, ~~strike~~, *italic* and backslash escapes. Anything unmatched is literal.
 */

import { sameInlineAttributes, type InlineAttributes, type TextOp } from './delta-types.js';

/** Characters the serializer backslash-escapes in plain text. */
export const ESCAPABLE_CHARS = '\\*_`[]~';
/** Characters escaped inside a link label. */
export const LINK_LABEL_ESCAPABLE_CHARS = '\\[]';

const SPECIAL_CHARS = ['\\', '`', '[', '*', '~'];

export function unescapeMarkdown(text: string): string {
  return text.replace(/\\([\\*_`[\]~])/g, '$1');
}

export function unescapeLinkLabel(text: string): string {
  return text.replace(/\\([\\[\]])/g, '$1');
}

interface InlineMatch {
  ops: TextOp[];
  end: number;
}

export function inlineMarkdownToOps(text: string): TextOp[] {
  const ops: TextOp[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (ch === '\\') {
      const next = text[i + 1];
      if (next !== undefined && ESCAPABLE_CHARS.includes(next)) {
        pushOp(ops, next);
        i += 2;
      } else {
        pushOp(ops, '\\');
        i += 1;
      }
      continue;
    }

    if (!SPECIAL_CHARS.includes(ch)) {
      const next = nextSpecialIndex(text, i);
      pushOp(ops, text.slice(i, next));
      i = next;
      continue;
    }

    const match = matchCode(text, i) ?? matchLink(text, i) ?? matchEmphasis(text, i);
    if (match) {
      for (const op of match.ops) pushOp(ops, op.insert, op.attributes);
      i = match.end;
      continue;
    }

    // opener without a closer
    pushOp(ops, ch);
    i += 1;
  }

  return ops;
}

export const tokenize = inlineMarkdownToOps;

// ---- Token matchers ----

function matchCode(text: string, start: number): InlineMatch | null {
  if (text[start] !== '`') return null;
  const end = findCloser(text, '`', start + 1);
  if (end === -1) return null;
  const content = text.slice(start + 1, end);
  return { ops: content ? [{ insert: content, attributes: { code: true } }] : [], end: end + 1 };
}

function matchLink(text: string, start: number): InlineMatch | null {
  const span = findLinkSpan(text, start);
  if (!span) return null;

  const label = unescapeLinkLabel(text.slice(start + 1, span.closeBracket));
  const url = text.slice(span.closeBracket + 2, span.closeParen).replace(/%20/g, ' ');
  const end = span.closeParen + 1;
  if (!label) return { ops: [], end };
  return { ops: [url ? { insert: label, attributes: { link: url } } : { insert: label }], end };
}

/** Bounds of `[label](url)` at `start`; parentheses inside the url must balance. */
function findLinkSpan(text: string, start: number): { closeBracket: number; closeParen: number } | null {
  if (text[start] !== '[') return null;
  const closeBracket = findCloser(text, ']', start + 1);
  if (closeBracket === -1 || text[closeBracket + 1] !== '(') return null;

  let depth = 0;
  for (let i = closeBracket + 2; i < text.length; i++) {
    if (text[i] === '(') {
      depth++;
    } else if (text[i] === ')') {
      if (depth === 0) return { closeBracket, closeParen: i };
      depth--;
    }
  }
  return null;
}

/** `***x***`, `**x**`, `~~x~~`, `*x*`: the content is scanned again and gains the wrapper's marks. */
function matchEmphasis(text: string, start: number): InlineMatch | null {
  if (text.startsWith('***', start)) {
    const match = matchWrapped(text, start, '***', { bold: true, italic: true });
    if (match) return match;
  }
  if (text.startsWith('**', start)) {
    // a lone "**" never falls back to italic at the same position
    return matchWrapped(text, start, '**', { bold: true });
  }
  if (text.startsWith('~~', start)) {
    return matchWrapped(text, start, '~~', { strike: true });
  }
  if (text[start] === '*') {
    return matchWrapped(text, start, '*', { italic: true });
  }
  return null;
}

function matchWrapped(text: string, start: number, delimiter: string, marks: InlineAttributes): InlineMatch | null {
  const contentStart = start + delimiter.length;
  const close = findEmphasisCloser(text, delimiter, contentStart);
  if (close === -1) return null;

  const inner = inlineMarkdownToOps(text.slice(contentStart, close));
  const ops = inner.map((op) => ({ insert: op.insert, attributes: { ...op.attributes, ...marks } }));
  return { ops, end: close + delimiter.length };
}

// ---- Helpers ----

function pushOp(ops: TextOp[], insert: string, attributes?: InlineAttributes): void {
  if (!insert) return;
  const attrs = attributes && Object.keys(attributes).length > 0 ? attributes : undefined;
  const last = ops[ops.length - 1];
  if (last && sameInlineAttributes(last.attributes, attrs)) {
    last.insert += insert;
    return;
  }
  ops.push(attrs ? { insert, attributes: attrs } : { insert });
}

/** Next unescaped occurrence of `token` at or after `from`, or -1. */
function findCloser(text: string, token: string, from: number): number {
  for (let i = from; i < text.length; i++) {
    if (text[i] === '\\') {
      i++;
      continue;
    }
    if (text.startsWith(token, i)) return i;
  }
  return -1;
}

/** Like `findCloser`, but links and closed code spans are opaque: a delimiter inside them never closes. */
function findEmphasisCloser(text: string, token: string, from: number): number {
  for (let i = from; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\') {
      i++;
      continue;
    }
    if (ch === '[') {
      const span = findLinkSpan(text, i);
      if (span) {
        i = span.closeParen;
        continue;
      }
    }
    if (ch === '`') {
      const close = findCloser(text, '`', i + 1);
      if (close !== -1) {
        i = close;
        continue;
      }
    }
    if (text.startsWith(token, i)) return i;
  }
  return -1;
}

function nextSpecialIndex(text: string, start: number): number {
  let min = text.length;
  for (const ch of SPECIAL_CHARS) {
    const idx = text.indexOf(ch, start);
    if (idx !== -1 && idx < min) min = idx;
  }
  return min;
}
