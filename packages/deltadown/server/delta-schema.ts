/**
 * zod schemas for deltas and conversion options arriving over HTTP or MCP.
 * Known attributes of the wrong type are dropped rather than rejected, matching
 * the serializer's lenient reading; unknown attributes pass through.
 */

import { z } from 'zod';
import { convertDefaultsSchema } from './options.js';

export const attributeMapSchema = z
  .object({
    header: z.number().optional().catch(undefined),
    blockquote: z.boolean().optional().catch(undefined),
    list: z.enum(['ordered', 'bullet']).optional().catch(undefined),
    indent: z.number().optional().catch(undefined),
    'code-block': z.boolean().optional().catch(undefined),
    bold: z.boolean().optional().catch(undefined),
    italic: z.boolean().optional().catch(undefined),
    strike: z.boolean().optional().catch(undefined),
    code: z.boolean().optional().catch(undefined),
    link: z.string().optional().catch(undefined),
  })
  .passthrough();

export const opSchema = z.object({
  insert: z.union([z.string(), z.record(z.unknown())]),
  attributes: attributeMapSchema.optional(),
});

export const deltaSchema = z.union([
  z.array(opSchema),
  z.object({ ops: z.array(opSchema) }),
]);

export const serializeRequestSchema = z.object({
  delta: deltaSchema,
  options: convertDefaultsSchema.optional(),
});

export const parseRequestSchema = z.object({
  markdown: z.string(),
  options: convertDefaultsSchema.optional(),
});

export const validateRequestSchema = z.object({
  delta: deltaSchema,
});

export const previewRequestSchema = z.object({
  markdown: z.string(),
});

/** First issue of a failed parse, as "path: message". */
export function describeZodError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid request';
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}
