/**
 * Markdown -> canonical Delta parsing.
 * Line-oriented: each source line becomes inline ops followed by one "\n" op
 * carrying the line's block attributes. Unrecognized shapes are paragraphs.
 */

import { newlineOp, type BlockAttributes, type Delta, type ListKind } from './delta-types.js';
import { inlineMarkdownToOps } from './markdown-inline.js';
import { resolveParseOptions, type ParseOptions } from './options.js';

const HEADING_RE = /^(#{1,6})\s+(.*)$/;
const QUOTE_RE = /^>\s?(.*)$/;
const ORDERED_RE = /^\d+\.\s+(.*)$/;
const BULLET_RE = /^[-*]\s+(.*)$/;

export function markdownToDelta(markdown: string | null | undefined, opts: Partial<ParseOptions> = {}): Delta {
  const options = resolveParseOptions(opts);

  if (!markdown) return [newlineOp()];

  const lines = markdown.replace(/\r\n/g, '\n').split('\n');
  // a final "\n" terminates the last line rather than starting an empty one
  if (lines.length > 1 && lines[lines.length - 1] === '') lines.pop();

  const ops: Delta = [];
  let insideFence = false;
  // The serializer writes one blank line after a list or a closing fence; swallow it.
  let separatorPending = false;

  const pushLine = (content: string, attributes?: BlockAttributes): void => {
    ops.push(...inlineMarkdownToOps(content));
    ops.push(newlineOp(attributes));
  };

  for (const line of lines) {
    // fence toggle
    if (line.trim().startsWith(options.fence)) {
      insideFence = !insideFence;
      separatorPending = !insideFence;
      continue;
    }

    // code-block content: one delta line per source line, verbatim
    if (insideFence) {
      if (line.length) ops.push({ insert: line });
      ops.push(newlineOp({ 'code-block': true }));
      continue;
    }

    if (line.trim() === '') {
      if (separatorPending) {
        separatorPending = false;
        continue;
      }
      ops.push(newlineOp());
      continue;
    }
    separatorPending = false;

    const heading = HEADING_RE.exec(line);
    if (heading) {
      pushLine(heading[2] ?? '', { header: heading[1].length });
      continue;
    }

    const quote = QUOTE_RE.exec(line);
    if (quote) {
      pushLine(quote[1] ?? '', { blockquote: true });
      continue;
    }

    const item = matchListItem(line, options.indentSize);
    if (item) {
      pushLine(item.content, item.indent ? { list: item.list, indent: item.indent } : { list: item.list });
      separatorPending = true;
      continue;
    }

    // paragraph
    pushLine(line);
  }

  const last = ops[ops.length - 1];
  if (!last || last.insert !== '\n') ops.push(newlineOp());

  return ops;
}

export const parse = markdownToDelta;

/** Leading whitespace (tabs count as 4 spaces) divided by the indent unit gives the nesting level. */
function matchListItem(line: string, indentSize: number): { list: ListKind; indent: number; content: string } | null {
  const leading = (/^\s*/.exec(line)?.[0] ?? '').replace(/\t/g, '    ').length;
  const indent = Math.floor(leading / indentSize);
  const trimmed = line.trimStart();

  const ordered = ORDERED_RE.exec(trimmed);
  if (ordered) return { list: 'ordered', indent, content: ordered[1] ?? '' };

  const bullet = BULLET_RE.exec(trimmed);
  if (bullet) return { list: 'bullet', indent, content: bullet[1] ?? '' };

  return null;
}
