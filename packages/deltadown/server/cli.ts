/**
 * CLI argument parsing and the file/stdin conversions behind `deltadown to-markdown` and `deltadown to-delta`.
 */

import { deltaSchema, describeZodError } from './delta-schema.js';
import { deltaToMarkdown, markdownToDelta } from './markdown.js';
import { pickValid, type ConvertDefaults } from './options.js';
import type { ResolvedDefaults } from './convert-routes.js';

export type CliCommand =
  | { kind: 'to-markdown'; file?: string; overrides: ConvertDefaults }
  | { kind: 'to-delta'; file?: string; overrides: ConvertDefaults; pretty: boolean }
  | { kind: 'serve'; port?: number; save: boolean; overrides: ConvertDefaults }
  | { kind: 'mcp'; overrides: ConvertDefaults }
  | { kind: 'help' }
  | { kind: 'invalid'; message: string };

export const USAGE = `Usage:
  deltadown to-markdown [file] [--strict] [--fence F] [--ordered-style one|increment]
  deltadown to-delta [file] [--fence F] [--indent-size N] [--pretty]
  deltadown serve [--port N] [--save]
  deltadown mcp

Input is read from [file], or stdin when omitted.`;

export function parseCliArgs(args: string[]): CliCommand {
  const [subcommand, ...rest] = args;
  if (!subcommand || subcommand === '--help' || subcommand === '-h' || subcommand === 'help') {
    return { kind: 'help' };
  }

  const raw: Record<string, unknown> = {};
  let file: string | undefined;
  let port: number | undefined;
  let pretty = false;
  let save = false;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const value = rest[i + 1];
    if (arg === '--strict') {
      raw.strict = true;
    } else if (arg === '--fence' && value) {
      raw.fence = value;
      i++;
    } else if (arg === '--ordered-style' && value) {
      raw.orderedListStyle = value;
      i++;
    } else if (arg === '--indent-size' && value) {
      raw.indentSize = parseInt(value, 10);
      i++;
    } else if (arg === '--port' && value) {
      port = parseInt(value, 10);
      i++;
    } else if (arg === '--pretty') {
      pretty = true;
    } else if (arg === '--save') {
      save = true;
    } else if (arg.startsWith('--')) {
      return { kind: 'invalid', message: `Unknown option: ${arg}` };
    } else if (file === undefined) {
      file = arg;
    } else {
      return { kind: 'invalid', message: `Unexpected argument: ${arg}` };
    }
  }

  const overrides = pickValid(raw);

  switch (subcommand) {
    case 'to-markdown':
      return { kind: 'to-markdown', file, overrides };
    case 'to-delta':
      return { kind: 'to-delta', file, overrides, pretty };
    case 'serve':
      if (port !== undefined && (!Number.isInteger(port) || port < 1 || port > 65535)) {
        return { kind: 'invalid', message: `Invalid port: ${rest[rest.indexOf('--port') + 1]}` };
      }
      return { kind: 'serve', port, save, overrides };
    case 'mcp':
      return { kind: 'mcp', overrides };
    default:
      return { kind: 'invalid', message: `Unknown command: ${subcommand}` };
  }
}

/** Delta JSON text -> Markdown. Throws on invalid JSON or a strict-mode violation. */
export function convertDeltaText(input: string, defaults: ResolvedDefaults): string {
  let json: unknown;
  try {
    json = JSON.parse(input);
  } catch (err) {
    throw new Error(`Input is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = deltaSchema.safeParse(json);
  if (!parsed.success) throw new Error(`Input is not a delta: ${describeZodError(parsed.error)}`);

  return deltaToMarkdown(parsed.data, {
    fence: defaults.fence,
    orderedListStyle: defaults.orderedListStyle,
    strict: defaults.strict,
  });
}

/** Markdown text -> Delta JSON text. */
export function convertMarkdownText(input: string, defaults: ResolvedDefaults, pretty = false): string {
  const delta = markdownToDelta(input, { fence: defaults.fence, indentSize: defaults.indentSize });
  return JSON.stringify(delta, null, pretty ? 2 : undefined);
}
