/**
 * Barrel re-export for Delta <-> Markdown conversion.
 * `serialize` and `parse` are the two entry points; everything else is here for callers that
 * need the pieces (validation, inline rendering, option defaults).
 */

export { deltaToMarkdown, serialize, renderInline, escapeText } from './markdown-serialize.js';
export { markdownToDelta, parse } from './markdown-parse.js';
export { inlineMarkdownToOps, tokenize, unescapeMarkdown } from './markdown-inline.js';
export { assertCanonicalDelta, findCanonicalViolations, CanonicalViolation } from './canonical.js';
export type { CanonicalInvariant, CanonicalIssue } from './canonical.js';
export { defaultEmbedRenderer, renderEmbed, EMBED_KINDS } from './embeds.js';
export type { Embed, EmbedKind, EmbedRenderer, EmbedToMarkdown } from './embeds.js';
export {
  DEFAULT_PARSE_OPTIONS,
  DEFAULT_SERIALIZE_OPTIONS,
  resolveParseOptions,
  resolveSerializeOptions,
} from './options.js';
export type { OrderedListStyle, ParseOptions, SerializeOptions } from './options.js';
export type {
  AttributeMap,
  BlockAttributes,
  Delta,
  DeltaLike,
  EmbedOp,
  InlineAttributes,
  ListKind,
  NewlineOp,
  Op,
  RawOp,
  TextOp,
} from './delta-types.js';
