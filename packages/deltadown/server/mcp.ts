/**
 * MCP stdio server: tool registry + stdio transport.
 * The registry is also served over HTTP (/api/mcp-call) by the Express server.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { CanonicalViolation, deltaToMarkdown, findCanonicalViolations, markdownToDelta } from './markdown.js';
import { deltaSchema } from './delta-schema.js';
import { renderPreview, type ResolvedDefaults } from './convert-routes.js';
import { ORDERED_LIST_STYLES } from './options.js';
import { PACKAGE_NAME, VERSION } from './helpers.js';

export type ToolResult = { content: { type: 'text'; text: string }[]; isError?: boolean };

export interface ToolDef {
  name: string;
  description: string;
  schema: z.ZodRawShape;
  handler: (args: unknown) => Promise<ToolResult>;
}

function defineTool<S extends z.ZodRawShape>(def: {
  name: string;
  description: string;
  schema: S;
  handler: (args: z.objectOutputType<S, z.ZodTypeAny, 'strip'>) => Promise<ToolResult>;
}): ToolDef {
  const parser = z.object(def.schema);
  return {
    name: def.name,
    description: def.description,
    schema: def.schema,
    handler: async (args) => def.handler(parser.parse(args ?? {})),
  };
}

function text(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: typeof value === 'string' ? value : JSON.stringify(value) }] };
}

export function buildToolRegistry(defaults: ResolvedDefaults): ToolDef[] {
  return [
    defineTool({
      name: 'markdown_to_delta',
      description: 'Convert Markdown to a canonical Quill Delta (JSON array of insert ops). Supports headings, blockquotes, ordered/bullet lists, fenced code, `code`, **bold**, *italic*, ~~strike~~ and [links](url).',
      schema: {
        markdown: z.string().describe('Markdown source'),
        fence: z.string().min(1).optional().describe('Code fence token. Defaults to ```'),
        indentSize: z.number().int().min(1).max(8).optional().describe('Leading spaces per list indent level'),
      },
      handler: async ({ markdown, fence, indentSize }) => {
        const delta = markdownToDelta(markdown, {
          fence: fence ?? defaults.fence,
          indentSize: indentSize ?? defaults.indentSize,
        });
        return text(delta);
      },
    }),
    defineTool({
      name: 'delta_to_markdown',
      description: 'Convert a Quill Delta (ops array or { ops }) to Markdown. With strict=true, non-canonical deltas are rejected with the broken invariant.',
      schema: {
        delta: deltaSchema.describe('Delta ops array, or an object with an ops array'),
        strict: z.boolean().optional().describe('Reject non-canonical deltas instead of rendering best-effort'),
        fence: z.string().min(1).optional(),
        orderedListStyle: z.enum(ORDERED_LIST_STYLES).optional().describe('"increment" numbers items 1., 2., 3.; "one" repeats 1.'),
      },
      handler: async ({ delta, strict, fence, orderedListStyle }) => {
        try {
          const markdown = deltaToMarkdown(delta, {
            strict: strict ?? defaults.strict,
            fence: fence ?? defaults.fence,
            orderedListStyle: orderedListStyle ?? defaults.orderedListStyle,
          });
          return text(markdown);
        } catch (err) {
          if (err instanceof CanonicalViolation) {
            return { ...text({ error: err.message, invariant: err.invariant, opIndex: err.opIndex }), isError: true };
          }
          throw err;
        }
      },
    }),
    defineTool({
      name: 'validate_delta',
      description: 'Check a Delta against the canonical rules (newlines are standalone ops, block attributes only on newlines). Returns every violation found.',
      schema: {
        delta: deltaSchema,
      },
      handler: async ({ delta }) => {
        const violations = findCanonicalViolations(delta);
        return text({ canonical: violations.length === 0, violations });
      },
    }),
    defineTool({
      name: 'preview_markdown',
      description: 'Render Markdown to HTML for preview. Raw HTML in the source is escaped.',
      schema: {
        markdown: z.string(),
      },
      handler: async ({ markdown }) => text(renderPreview(markdown)),
    }),
  ];
}

export async function startMcpServer(tools: ToolDef[]): Promise<void> {
  const server = new McpServer({
    name: PACKAGE_NAME,
    version: VERSION,
  });

  for (const tool of tools) {
    server.tool(tool.name, tool.description, tool.schema, (args) => tool.handler(args));
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[MCP] Serving ${tools.length} tools over stdio`);
}
