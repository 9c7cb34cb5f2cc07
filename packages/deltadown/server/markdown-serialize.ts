/**
 * Delta -> Markdown serialization.
 * Walks the ops once, buffering the current line until its "\n" op arrives;
 * the newline's block attributes decide how the buffered line is written.
 */

import {
  NEWLINE,
  blockAttributesOf,
  clampInt,
  inlineAttributesOf,
  opsOf,
  type BlockAttributes,
  type DeltaLike,
  type InlineAttributes,
  type ListKind,
} from './delta-types.js';
import { assertCanonicalDelta } from './canonical.js';
import { isEmbed, renderEmbed } from './embeds.js';
import { ESCAPABLE_CHARS, LINK_LABEL_ESCAPABLE_CHARS } from './markdown-inline.js';
import { resolveSerializeOptions, type SerializeOptions } from './options.js';

// ============================================================================
// Block state
// ============================================================================

type BlockState =
  | { kind: 'normal' }
  | { kind: 'list'; list: ListKind; counter: number }
  | { kind: 'code' };

type LineFragment =
  | { kind: 'text'; text: string; attrs: InlineAttributes }
  | { kind: 'embed'; markdown: string };

interface SerializerState {
  out: string;
  line: LineFragment[];
  block: BlockState;
}

export function deltaToMarkdown(delta: DeltaLike | null | undefined, opts: Partial<SerializeOptions> = {}): string {
  const options = resolveSerializeOptions(opts);

  const ops = opsOf(delta);
  if (!ops) return '';
  if (options.strict) assertCanonicalDelta(ops);

  const state: SerializerState = { out: '', line: [], block: { kind: 'normal' } };

  for (const op of ops) {
    if (!op || typeof op !== 'object') continue;
    const { insert } = op;

    if (insert === NEWLINE) {
      flushLine(state, blockAttributesOf(op.attributes), options);
      continue;
    }

    if (typeof insert === 'string') {
      const attrs = inlineAttributesOf(op.attributes);
      // Tolerated in lenient mode: each embedded newline ends a plain line.
      const parts = insert.split(NEWLINE);
      parts.forEach((part, p) => {
        if (part) state.line.push({ kind: 'text', text: part, attrs });
        if (p < parts.length - 1) flushLine(state, {}, options);
      });
      continue;
    }

    if (isEmbed(insert)) {
      const markdown = renderEmbed(insert, options.embedToMarkdown);
      if (markdown) state.line.push({ kind: 'embed', markdown });
    }
  }

  // content after the last newline op
  if (state.line.length) {
    const rest = renderLine(state.line, false);
    closeFence(state, options);
    closeList(state);
    state.out += `${rest}\n`;
    state.line = [];
  }

  closeFence(state, options);
  closeList(state);

  return finalize(state.out);
}

export const serialize = deltaToMarkdown;

// ---- Line flushing ----

function flushLine(state: SerializerState, attrs: BlockAttributes, options: SerializeOptions): void {
  if (attrs['code-block']) {
    openFence(state, options);
    state.out += `${takeLine(state, true)}\n`;
    return;
  }

  closeFence(state, options);
  const line = takeLine(state, false);

  if (attrs.list) {
    const indentPrefix = attrs.indent ? '  '.repeat(attrs.indent) : '';
    // listMarker may close the previous list, which appends to state.out
    const marker = listMarker(state, attrs.list, options);
    state.out += `${indentPrefix}${marker}${line}\n`;
    return;
  }

  closeList(state);

  if (attrs.blockquote) {
    state.out += line.length ? `> ${line}\n` : '>\n';
    return;
  }

  if (attrs.header) {
    const level = clampInt(attrs.header, 1, 6);
    state.out += `${'#'.repeat(level)} ${line}\n`;
    return;
  }

  // normal or blank line
  state.out += `${line}\n`;
}

/** Marker for the next item; switching list kind closes the old list and restarts the count. */
function listMarker(state: SerializerState, list: ListKind, options: SerializeOptions): string {
  if (state.block.kind === 'list' && state.block.list !== list) closeList(state);
  if (state.block.kind !== 'list') state.block = { kind: 'list', list, counter: 1 };

  if (list === 'bullet') return '- ';
  if (options.orderedListStyle === 'one') return '1. ';
  return `${state.block.counter++}. `;
}

function takeLine(state: SerializerState, raw: boolean): string {
  const line = renderLine(state.line, raw);
  state.line = [];
  return line;
}

function renderLine(fragments: LineFragment[], raw: boolean): string {
  return fragments
    .map((f) => {
      if (f.kind === 'embed') return f.markdown;
      return raw ? f.text : renderInline(f.text, f.attrs);
    })
    .join('');
}

function openFence(state: SerializerState, options: SerializeOptions): void {
  if (state.block.kind === 'code') return;
  closeList(state);
  state.out += `${options.fence}\n`;
  state.block = { kind: 'code' };
}

function closeFence(state: SerializerState, options: SerializeOptions): void {
  if (state.block.kind !== 'code') return;
  state.out += `${options.fence}\n\n`;
  state.block = { kind: 'normal' };
}

function closeList(state: SerializerState): void {
  if (state.block.kind !== 'list') return;
  state.out += '\n';
  state.block = { kind: 'normal' };
}

function finalize(markdown: string): string {
  const body = markdown
    .replace(/\n{4,}/g, '\n\n\n')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\s+$/, '');
  return body ? `${body}\n` : '';
}

// ============================================================================
// Inline rendering
// ============================================================================

/**
 * Render one text run. Code is exclusive; otherwise the wrappers nest in a
 * fixed order: link, then ~~strike~~, **bold**, *italic* outermost.
 */
export function renderInline(text: string, attrs: InlineAttributes = {}): string {
  if (!text) return '';

  if (attrs.code) return `\`${escapeCode(text)}\``;

  let out = attrs.link
    ? `[${escapeWith(text, LINK_LABEL_ESCAPABLE_CHARS)}](${escapeLinkUrl(attrs.link)})`
    : escapeWith(text, ESCAPABLE_CHARS);

  if (attrs.strike) out = `~~${out}~~`;
  if (attrs.bold) out = `**${out}**`;
  if (attrs.italic) out = `*${out}*`;

  return out;
}

/**
 * Backslash-escape every char of `escapable` (which must include the backslash).
 * A backslash already escaping one of them is kept as is; any other backslash is doubled.
 */
export function escapeWith(text: string, escapable: string): string {
  let result = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\') {
      const next = text[i + 1];
      if (next !== undefined && escapable.includes(next)) {
        result += `\\${next}`;
        i++;
      } else {
        result += '\\\\';
      }
    } else if (escapable.includes(ch)) {
      result += `\\${ch}`;
    } else {
      result += ch;
    }
  }
  return result;
}

export function escapeText(text: string): string {
  return escapeWith(text, ESCAPABLE_CHARS);
}

function escapeCode(text: string): string {
  let result = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\' && text[i + 1] === '`') {
      result += '\\`';
      i++;
    } else if (ch === '`') {
      result += '\\`';
    } else if (ch === '\\') {
      result += '\\\\';
    } else {
      result += ch;
    }
  }
  return result;
}

function escapeLinkUrl(url: string): string {
  return url.replace(/\s/g, '%20');
}
