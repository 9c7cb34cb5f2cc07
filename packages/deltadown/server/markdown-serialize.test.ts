import { describe, expect, it } from 'vitest';
import { deltaToMarkdown, escapeText, escapeWith, renderInline } from './markdown-serialize.js';
import { CanonicalViolation } from './canonical.js';
import type { RawOp } from './delta-types.js';

describe('deltaToMarkdown', () => {
  it('escapes markdown syntax in plain text', () => {
    expect(deltaToMarkdown([{ insert: 'a*b' }, { insert: '\n' }])).toBe('a\\*b\n');
  });

  it('accepts a { ops } wrapper', () => {
    expect(deltaToMarkdown({ ops: [{ insert: 'hi' }, { insert: '\n' }] })).toBe('hi\n');
  });

  it('returns an empty string for missing or blank input', () => {
    expect(deltaToMarkdown(null)).toBe('');
    expect(deltaToMarkdown([])).toBe('');
    expect(deltaToMarkdown([{ insert: '\n' }])).toBe('');
  });

  it('writes headers and clamps the level', () => {
    expect(deltaToMarkdown([{ insert: 'Title' }, { insert: '\n', attributes: { header: 2 } }])).toBe('## Title\n');
    expect(deltaToMarkdown([{ insert: 'T' }, { insert: '\n', attributes: { header: 9 } }])).toBe('###### T\n');
  });

  it('writes blockquotes, including empty ones', () => {
    expect(deltaToMarkdown([
      { insert: 'q' },
      { insert: '\n', attributes: { blockquote: true } },
      { insert: '\n', attributes: { blockquote: true } },
    ])).toBe('> q\n>\n');
  });

  it('numbers ordered items and restarts when the list kind changes', () => {
    const delta: RawOp[] = [
      { insert: 'a' },
      { insert: '\n', attributes: { list: 'ordered' } },
      { insert: 'b' },
      { insert: '\n', attributes: { list: 'ordered' } },
      { insert: 'x' },
      { insert: '\n', attributes: { list: 'bullet' } },
      { insert: 'c' },
      { insert: '\n', attributes: { list: 'ordered' } },
    ];
    expect(deltaToMarkdown(delta)).toBe('1. a\n2. b\n\n- x\n\n1. c\n');
  });

  it('leaves a blank line when a bullet list turns into an ordered one', () => {
    expect(deltaToMarkdown([
      { insert: 'x' },
      { insert: '\n', attributes: { list: 'bullet' } },
      { insert: 'a' },
      { insert: '\n', attributes: { list: 'ordered' } },
    ])).toBe('- x\n\n1. a\n');
  });

  it('repeats "1." with the "one" ordered style', () => {
    const delta: RawOp[] = [
      { insert: 'a' },
      { insert: '\n', attributes: { list: 'ordered' } },
      { insert: 'b' },
      { insert: '\n', attributes: { list: 'ordered' } },
    ];
    expect(deltaToMarkdown(delta, { orderedListStyle: 'one' })).toBe('1. a\n1. b\n');
  });

  it('indents nested list items by two spaces per level', () => {
    expect(deltaToMarkdown([{ insert: 'x' }, { insert: '\n', attributes: { list: 'bullet', indent: 2 } }])).toBe('    - x\n');
  });

  it('separates a list from the following paragraph', () => {
    expect(deltaToMarkdown([
      { insert: 'a' },
      { insert: '\n', attributes: { list: 'bullet' } },
      { insert: 'after' },
      { insert: '\n' },
    ])).toBe('- a\n\nafter\n');
  });

  it('fences code blocks and leaves their content unescaped', () => {
    const delta: RawOp[] = [
      { insert: 'x = a*b' },
      { insert: '\n', attributes: { 'code-block': true } },
      { insert: '\n', attributes: { 'code-block': true } },
      { insert: 'y' },
      { insert: '\n', attributes: { 'code-block': true } },
      { insert: 'after' },
      { insert: '\n' },
    ];
    expect(deltaToMarkdown(delta)).toBe('```\nx = a*b\n\ny\n```\n\nafter\n');
  });

  it('uses a custom fence', () => {
    expect(deltaToMarkdown([{ insert: 'x' }, { insert: '\n', attributes: { 'code-block': true } }], { fence: '~~~' }))
      .toBe('~~~\nx\n~~~\n');
  });

  it('nests inline wrappers around links', () => {
    expect(deltaToMarkdown([{ insert: 'click', attributes: { bold: true, link: 'http://x.test' } }, { insert: '\n' }]))
      .toBe('**[click](http://x.test)**\n');
  });

  it('renders embeds through the default renderer', () => {
    expect(deltaToMarkdown([
      { insert: { image: 'http://x.test/i.png' } },
      { insert: '\n' },
      { insert: { video: 'http://x.test/v.mp4' } },
      { insert: '\n' },
    ])).toBe('![](http://x.test/i.png)\nhttp://x.test/v.mp4\n');
  });

  it('drops unknown embeds unless the renderer handles them', () => {
    const delta: RawOp[] = [{ insert: 'a' }, { insert: { formula: 'e=mc^2' } }, { insert: '\n' }];
    expect(deltaToMarkdown(delta)).toBe('a\n');
    expect(deltaToMarkdown(delta, { embedToMarkdown: (embed) => `$${String(embed.formula)}$` })).toBe('a$e=mc^2$\n');
  });

  it('writes content that follows the last newline', () => {
    expect(deltaToMarkdown([{ insert: 'tail' }])).toBe('tail\n');
    expect(deltaToMarkdown([
      { insert: 'a' },
      { insert: '\n', attributes: { list: 'bullet' } },
      { insert: 'tail' },
    ])).toBe('- a\n\ntail\n');
  });

  it('collapses long runs of blank lines and strips trailing whitespace', () => {
    const delta: RawOp[] = [
      { insert: 'a  ' },
      { insert: '\n' },
      { insert: '\n' },
      { insert: '\n' },
      { insert: '\n' },
      { insert: '\n' },
      { insert: 'b' },
      { insert: '\n' },
    ];
    expect(deltaToMarkdown(delta)).toBe('a\n\n\nb\n');
  });

  describe('non-canonical input', () => {
    it('splits embedded newlines into plain lines when lenient', () => {
      expect(deltaToMarkdown([{ insert: 'a\nb' }, { insert: '\n' }])).toBe('a\nb\n');
    });

    it('ignores block attributes on text ops when lenient', () => {
      expect(deltaToMarkdown([{ insert: 'x', attributes: { header: 1, bold: true } }, { insert: '\n' }])).toBe('**x**\n');
    });

    it('throws CanonicalViolation when strict', () => {
      const delta: RawOp[] = [{ insert: 'x', attributes: { header: 1 } }, { insert: '\n' }];
      expect(() => deltaToMarkdown(delta, { strict: true })).toThrow(CanonicalViolation);
      expect(() => deltaToMarkdown(delta, { strict: true })).toThrow('Non-canonical delta: block attr "header" found on text op 0');
    });
  });
});

describe('renderInline', () => {
  it('makes code exclusive and escapes backticks inside it', () => {
    expect(renderInline('a`b', { code: true, bold: true })).toBe('`a\\`b`');
  });

  it('orders wrappers strike, bold, italic from the inside out', () => {
    expect(renderInline('x', { bold: true, italic: true, strike: true })).toBe('***~~x~~***');
  });

  it('escapes only brackets and backslashes in link labels', () => {
    expect(renderInline('see [1] a*b', { link: 'http://x.test/a b' })).toBe('[see \\[1\\] a*b](http://x.test/a%20b)');
  });

  it('returns nothing for empty text', () => {
    expect(renderInline('', { bold: true })).toBe('');
  });
});

describe('escapeWith', () => {
  it('doubles a lone backslash', () => {
    expect(escapeText('C:\\temp')).toBe('C:\\\\temp');
  });

  it('keeps a backslash that already escapes a special character', () => {
    expect(escapeText('\\*')).toBe('\\*');
    expect(escapeWith('a_b', '\\[]')).toBe('a_b');
  });
});
