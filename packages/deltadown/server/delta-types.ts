/**
 * Delta document model shared by the parser, serializer and validator.
 *
 * Canonical deltas keep block formatting on standalone "\n" ops and inline
 * formatting on text ops. The typed ops below encode that split; `RawOp`
 * is the looser shape editors actually send.
 */

import type { Embed } from './embeds.js';

export type ListKind = 'ordered' | 'bullet';

export type BlockAttributes = {
  header?: number;
  blockquote?: boolean;
  list?: ListKind;
  indent?: number;
  'code-block'?: boolean;
};

export type InlineAttributes = {
  bold?: boolean;
  italic?: boolean;
  strike?: boolean;
  code?: boolean;
  link?: string;
};

export const BLOCK_ATTRIBUTE_KEYS = ['header', 'blockquote', 'list', 'indent', 'code-block'] as const;
export const INLINE_ATTRIBUTE_KEYS = ['bold', 'italic', 'strike', 'code', 'link'] as const;

export type BlockAttributeKey = (typeof BLOCK_ATTRIBUTE_KEYS)[number];

export interface NewlineOp {
  insert: '\n';
  attributes?: BlockAttributes;
}

export interface TextOp {
  insert: string;
  attributes?: InlineAttributes;
}

export interface EmbedOp {
  insert: Embed;
  attributes?: InlineAttributes;
}

export type Op = NewlineOp | TextOp | EmbedOp;
export type Delta = Op[];

/** Attribute map as it arrives from an editor: block and inline keys mixed. */
export type AttributeMap = BlockAttributes & InlineAttributes;

export interface RawOp {
  insert: string | Embed;
  attributes?: AttributeMap;
}

/** Anything the serializer accepts: a bare op array or a Quill-style `{ ops }` wrapper. */
export type DeltaLike = readonly RawOp[] | { readonly ops: readonly RawOp[] };

export const NEWLINE = '\n';

export function newlineOp(attributes?: BlockAttributes): NewlineOp {
  return attributes ? { insert: NEWLINE, attributes } : { insert: NEWLINE };
}

/** Return the op array of a delta-like value, or null when it has none. */
export function opsOf(delta: DeltaLike | null | undefined): readonly RawOp[] | null {
  if (!delta) return null;
  if (Array.isArray(delta)) return delta;
  if ('ops' in delta && Array.isArray(delta.ops)) return delta.ops;
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Pick the block attributes of an op, dropping anything that isn't one. */
export function blockAttributesOf(attrs: unknown): BlockAttributes {
  if (!isRecord(attrs)) return {};
  const picked: BlockAttributes = {};
  const { header, blockquote, list, indent } = attrs;
  if (typeof header === 'number' || (typeof header === 'string' && header !== '')) {
    const level = Number(header);
    if (level) picked.header = level;
  }
  if (blockquote) picked.blockquote = true;
  if (list === 'ordered' || list === 'bullet') picked.list = list;
  if (typeof indent === 'number' && Number.isFinite(indent) && indent > 0) {
    picked.indent = Math.trunc(indent);
  }
  if (attrs['code-block']) picked['code-block'] = true;
  return picked;
}

/** Pick the inline attributes of an op, dropping anything that isn't one. */
export function inlineAttributesOf(attrs: unknown): InlineAttributes {
  if (!isRecord(attrs)) return {};
  const picked: InlineAttributes = {};
  if (attrs.bold) picked.bold = true;
  if (attrs.italic) picked.italic = true;
  if (attrs.strike) picked.strike = true;
  if (attrs.code) picked.code = true;
  if (typeof attrs.link === 'string' && attrs.link) picked.link = attrs.link;
  return picked;
}

export function sameInlineAttributes(a: InlineAttributes | undefined, b: InlineAttributes | undefined): boolean {
  const left = a ?? {};
  const right = b ?? {};
  return INLINE_ATTRIBUTE_KEYS.every((key) => left[key] === right[key]);
}

export function clampInt(value: unknown, min: number, max: number): number {
  const n = Number(value);
  if (!Number.isFinite(n)) return min;
  return Math.min(max, Math.max(min, Math.trunc(n)));
}
