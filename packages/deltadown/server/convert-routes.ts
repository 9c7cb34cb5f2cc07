/**
 * Conversion routes:
 *   POST /api/markdown-to-delta   { markdown, options? } -> { delta }
 *   POST /api/delta-to-markdown   { delta, options? }    -> { markdown }
 *   POST /api/validate-delta      { delta }              -> { canonical, violations }
 *   POST /api/markdown/preview    { markdown }           -> { html }
 */

import { Router, type Response } from 'express';
import MarkdownIt from 'markdown-it';
import { CanonicalViolation, deltaToMarkdown, findCanonicalViolations, markdownToDelta } from './markdown.js';
import {
  describeZodError,
  parseRequestSchema,
  previewRequestSchema,
  serializeRequestSchema,
  validateRequestSchema,
} from './delta-schema.js';
import type { ConvertDefaults } from './options.js';

// Preview renderer for the plain-text editing surface. Raw HTML stays escaped.
const md = new MarkdownIt({ linkify: false, html: false });
md.enable('strikethrough');

export interface RouteResult {
  status: number;
  body: Record<string, unknown>;
}

export type ResolvedDefaults = Required<ConvertDefaults>;

export function renderPreview(markdown: string): string {
  return md.render(markdown);
}

export function handleMarkdownToDelta(body: unknown, defaults: ResolvedDefaults): RouteResult {
  const parsed = parseRequestSchema.safeParse(body);
  if (!parsed.success) return { status: 400, body: { error: describeZodError(parsed.error) } };

  const options = { ...defaults, ...parsed.data.options };
  const delta = markdownToDelta(parsed.data.markdown, { fence: options.fence, indentSize: options.indentSize });
  return { status: 200, body: { delta } };
}

export function handleDeltaToMarkdown(body: unknown, defaults: ResolvedDefaults): RouteResult {
  const parsed = serializeRequestSchema.safeParse(body);
  if (!parsed.success) return { status: 400, body: { error: describeZodError(parsed.error) } };

  const options = { ...defaults, ...parsed.data.options };
  try {
    const markdown = deltaToMarkdown(parsed.data.delta, {
      fence: options.fence,
      orderedListStyle: options.orderedListStyle,
      strict: options.strict,
    });
    return { status: 200, body: { markdown } };
  } catch (err) {
    if (err instanceof CanonicalViolation) {
      return {
        status: 422,
        body: { error: err.message, invariant: err.invariant, opIndex: err.opIndex, ...(err.attribute ? { attribute: err.attribute } : {}) },
      };
    }
    throw err;
  }
}

export function handleValidateDelta(body: unknown): RouteResult {
  const parsed = validateRequestSchema.safeParse(body);
  if (!parsed.success) return { status: 400, body: { error: describeZodError(parsed.error) } };

  const violations = findCanonicalViolations(parsed.data.delta);
  return { status: 200, body: { canonical: violations.length === 0, violations } };
}

export function handlePreview(body: unknown): RouteResult {
  const parsed = previewRequestSchema.safeParse(body);
  if (!parsed.success) return { status: 400, body: { error: describeZodError(parsed.error) } };
  return { status: 200, body: { html: renderPreview(parsed.data.markdown) } };
}

function send(res: Response, run: () => RouteResult): void {
  try {
    const result = run();
    res.status(result.status).json(result.body);
  } catch (err) {
    console.error('[Convert] Error:', err instanceof Error ? err.message : err);
    res.status(500).json({ error: 'Conversion failed' });
  }
}

export function createConvertRouter(defaults: ResolvedDefaults): Router {
  const router = Router();

  router.post('/api/markdown-to-delta', (req, res) => {
    send(res, () => handleMarkdownToDelta(req.body, defaults));
  });

  router.post('/api/delta-to-markdown', (req, res) => {
    send(res, () => handleDeltaToMarkdown(req.body, defaults));
  });

  router.post('/api/validate-delta', (req, res) => {
    send(res, () => handleValidateDelta(req.body));
  });

  router.post('/api/markdown/preview', (req, res) => {
    send(res, () => handlePreview(req.body));
  });

  return router;
}
