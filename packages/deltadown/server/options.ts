/**
 * Conversion options: built-in defaults, per-call resolution, and the
 * process-wide defaults resolved from CLI flags, environment and saved config.
 */

import { z } from 'zod';
import { defaultEmbedRenderer, type EmbedToMarkdown } from './embeds.js';

export const ORDERED_LIST_STYLES = ['increment', 'one'] as const;
export type OrderedListStyle = (typeof ORDERED_LIST_STYLES)[number];

export interface SerializeOptions {
  fence: string;
  orderedListStyle: OrderedListStyle;
  embedToMarkdown: EmbedToMarkdown;
  /** Throw `CanonicalViolation` on non-canonical input instead of rendering best-effort. */
  strict: boolean;
}

export interface ParseOptions {
  fence: string;
  /** Leading spaces per list indent level. */
  indentSize: number;
}

export const DEFAULT_FENCE = '```';
export const DEFAULT_INDENT_SIZE = 2;

export const DEFAULT_SERIALIZE_OPTIONS: SerializeOptions = {
  fence: DEFAULT_FENCE,
  orderedListStyle: 'increment',
  embedToMarkdown: defaultEmbedRenderer,
  strict: false,
};

export const DEFAULT_PARSE_OPTIONS: ParseOptions = {
  fence: DEFAULT_FENCE,
  indentSize: DEFAULT_INDENT_SIZE,
};

export function resolveSerializeOptions(opts: Partial<SerializeOptions> = {}): SerializeOptions {
  return {
    fence: opts.fence || DEFAULT_SERIALIZE_OPTIONS.fence,
    orderedListStyle: opts.orderedListStyle === 'one' ? 'one' : 'increment',
    embedToMarkdown: opts.embedToMarkdown ?? DEFAULT_SERIALIZE_OPTIONS.embedToMarkdown,
    strict: opts.strict ?? DEFAULT_SERIALIZE_OPTIONS.strict,
  };
}

export function resolveParseOptions(opts: Partial<ParseOptions> = {}): ParseOptions {
  const { indentSize } = opts;
  return {
    fence: opts.fence || DEFAULT_PARSE_OPTIONS.fence,
    indentSize: indentSize !== undefined && Number.isInteger(indentSize) && indentSize >= 1
      ? indentSize
      : DEFAULT_PARSE_OPTIONS.indentSize,
  };
}

// ---- Process-wide defaults ----

/** The serializable subset of options: what config files, env vars and request bodies may set. */
export const convertDefaultsSchema = z.object({
  fence: z.string().min(1).optional(),
  orderedListStyle: z.enum(ORDERED_LIST_STYLES).optional(),
  indentSize: z.number().int().min(1).max(8).optional(),
  strict: z.boolean().optional(),
});

export type ConvertDefaults = z.infer<typeof convertDefaultsSchema>;

export const BUILTIN_CONVERT_DEFAULTS: Required<ConvertDefaults> = {
  fence: DEFAULT_FENCE,
  orderedListStyle: 'increment',
  indentSize: DEFAULT_INDENT_SIZE,
  strict: false,
};

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  if (/^(1|true|yes|on)$/i.test(value)) return true;
  if (/^(0|false|no|off)$/i.test(value)) return false;
  return undefined;
}

/** Read `DELTADOWN_*` variables. Unparseable values are left out. */
export function convertDefaultsFromEnv(env: NodeJS.ProcessEnv): ConvertDefaults {
  const raw = {
    fence: env.DELTADOWN_FENCE || undefined,
    orderedListStyle: env.DELTADOWN_ORDERED_LIST_STYLE || undefined,
    indentSize: env.DELTADOWN_INDENT_SIZE ? Number(env.DELTADOWN_INDENT_SIZE) : undefined,
    strict: parseBoolean(env.DELTADOWN_STRICT),
  };
  return pickValid(raw);
}

/** Keep only the fields that pass the schema, so one bad value doesn't discard the rest. */
export function pickValid(raw: Record<string, unknown>): ConvertDefaults {
  const picked: ConvertDefaults = {};
  const shape = convertDefaultsSchema.shape;
  const fence = shape.fence.safeParse(raw.fence);
  if (fence.success && fence.data !== undefined) picked.fence = fence.data;
  const style = shape.orderedListStyle.safeParse(raw.orderedListStyle);
  if (style.success && style.data !== undefined) picked.orderedListStyle = style.data;
  const indentSize = shape.indentSize.safeParse(raw.indentSize);
  if (indentSize.success && indentSize.data !== undefined) picked.indentSize = indentSize.data;
  const strict = shape.strict.safeParse(raw.strict);
  if (strict.success && strict.data !== undefined) picked.strict = strict.data;
  return picked;
}

/**
 * Resolve defaults (first wins):
 *   1. CLI flags
 *   2. DELTADOWN_* environment variables
 *   3. Saved ~/.deltadown/config.json
 *   4. Built-in defaults
 */
export function resolveConvertDefaults(
  cli: ConvertDefaults,
  env: ConvertDefaults,
  config: ConvertDefaults,
): Required<ConvertDefaults> {
  return {
    fence: cli.fence ?? env.fence ?? config.fence ?? BUILTIN_CONVERT_DEFAULTS.fence,
    orderedListStyle: cli.orderedListStyle ?? env.orderedListStyle ?? config.orderedListStyle ?? BUILTIN_CONVERT_DEFAULTS.orderedListStyle,
    indentSize: cli.indentSize ?? env.indentSize ?? config.indentSize ?? BUILTIN_CONVERT_DEFAULTS.indentSize,
    strict: cli.strict ?? env.strict ?? config.strict ?? BUILTIN_CONVERT_DEFAULTS.strict,
  };
}
