import { describe, expect, it } from 'vitest';
import { inlineMarkdownToOps, unescapeMarkdown } from './markdown-inline.js';

describe('inlineMarkdownToOps', () => {
  it('returns plain text as a single op', () => {
    expect(inlineMarkdownToOps('hello world')).toEqual([{ insert: 'hello world' }]);
  });

  it('returns no ops for an empty line', () => {
    expect(inlineMarkdownToOps('')).toEqual([]);
  });

  it('keeps code span content verbatim', () => {
    expect(inlineMarkdownToOps('a `x*y` b')).toEqual([
      { insert: 'a ' },
      { insert: 'x*y', attributes: { code: true } },
      { insert: ' b' },
    ]);
  });

  it('parses links and decodes %20 in the url', () => {
    expect(inlineMarkdownToOps('see [the docs](http://x.test/a%20b) now')).toEqual([
      { insert: 'see ' },
      { insert: 'the docs', attributes: { link: 'http://x.test/a b' } },
      { insert: ' now' },
    ]);
  });

  it('unescapes brackets in link labels and skips an escaped closer', () => {
    expect(inlineMarkdownToOps('[a\\]b](http://x.test)')).toEqual([
      { insert: 'a]b', attributes: { link: 'http://x.test' } },
    ]);
  });

  it('parses bold, strike and italic', () => {
    expect(inlineMarkdownToOps('**b** ~~s~~ *i*')).toEqual([
      { insert: 'b', attributes: { bold: true } },
      { insert: ' ' },
      { insert: 's', attributes: { strike: true } },
      { insert: ' ' },
      { insert: 'i', attributes: { italic: true } },
    ]);
  });

  it('applies a wrapper to the tokens inside it', () => {
    expect(inlineMarkdownToOps('**[click](http://x.test)**')).toEqual([
      { insert: 'click', attributes: { link: 'http://x.test', bold: true } },
    ]);
  });

  it('does not close a wrapper on a delimiter inside a link', () => {
    expect(inlineMarkdownToOps('*[5*3](http://x.test)*')).toEqual([
      { insert: '5*3', attributes: { link: 'http://x.test', italic: true } },
    ]);
    expect(inlineMarkdownToOps('~~[a~~b](http://x.test)~~')).toEqual([
      { insert: 'a~~b', attributes: { link: 'http://x.test', strike: true } },
    ]);
    expect(inlineMarkdownToOps('**[b](http://x.test/**y)**')).toEqual([
      { insert: 'b', attributes: { link: 'http://x.test/**y', bold: true } },
    ]);
  });

  it('does not close a wrapper on a delimiter inside a code span', () => {
    expect(inlineMarkdownToOps('*a `*` b*')).toEqual([
      { insert: 'a ', attributes: { italic: true } },
      { insert: '*', attributes: { code: true, italic: true } },
      { insert: ' b', attributes: { italic: true } },
    ]);
  });

  it('keeps balanced parentheses in a link url', () => {
    expect(inlineMarkdownToOps('[wiki](https://en.wikipedia.org/wiki/Foo_(bar)) after')).toEqual([
      { insert: 'wiki', attributes: { link: 'https://en.wikipedia.org/wiki/Foo_(bar)' } },
      { insert: ' after' },
    ]);
  });

  it('ends the url at the first unbalanced closing parenthesis', () => {
    expect(inlineMarkdownToOps('([x](http://x.test))')).toEqual([
      { insert: '(' },
      { insert: 'x', attributes: { link: 'http://x.test' } },
      { insert: ')' },
    ]);
  });

  it('reads a triple asterisk as bold italic', () => {
    expect(inlineMarkdownToOps('***both***')).toEqual([
      { insert: 'both', attributes: { bold: true, italic: true } },
    ]);
  });

  it('decodes escapes inside emphasis', () => {
    expect(inlineMarkdownToOps('**a\\*b**')).toEqual([{ insert: 'a*b', attributes: { bold: true } }]);
  });

  it('turns escaped specials into literal text merged with neighbours', () => {
    expect(inlineMarkdownToOps('a\\*b')).toEqual([{ insert: 'a*b' }]);
    expect(inlineMarkdownToOps('\\[x\\] \\~ \\_ \\`')).toEqual([{ insert: '[x] ~ _ `' }]);
  });

  it('passes other backslash sequences through', () => {
    expect(inlineMarkdownToOps('C:\\dir')).toEqual([{ insert: 'C:\\dir' }]);
    expect(inlineMarkdownToOps('end\\')).toEqual([{ insert: 'end\\' }]);
  });

  it('demotes openers without a closer to literal characters', () => {
    expect(inlineMarkdownToOps('2 * 3')).toEqual([{ insert: '2 * 3' }]);
    expect(inlineMarkdownToOps('a ~ b')).toEqual([{ insert: 'a ~ b' }]);
    expect(inlineMarkdownToOps('**open')).toEqual([{ insert: '**open' }]);
    expect(inlineMarkdownToOps('`tick')).toEqual([{ insert: '`tick' }]);
    expect(inlineMarkdownToOps('[text] (no link)')).toEqual([{ insert: '[text] (no link)' }]);
  });

  it('omits tokens with empty content', () => {
    expect(inlineMarkdownToOps('a``b')).toEqual([{ insert: 'ab' }]);
    expect(inlineMarkdownToOps('[](http://x.test)')).toEqual([]);
  });

  it('drops the link attribute when the url is empty', () => {
    expect(inlineMarkdownToOps('[label]()')).toEqual([{ insert: 'label' }]);
  });
});

describe('unescapeMarkdown', () => {
  it('only reverses escapes of markdown specials', () => {
    expect(unescapeMarkdown('\\*\\_\\`\\[\\]\\~\\\\ \\n')).toEqual('*_`[]~\\ \\n');
  });
});
