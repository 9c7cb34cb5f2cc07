/**
 * Express server: conversion API for the editing surfaces, plus MCP-over-HTTP.
 */

import express from 'express';
import { ZodError } from 'zod';
import { createServer, type Server } from 'http';
import { createConnection } from 'net';
import { createConvertRouter, type ResolvedDefaults } from './convert-routes.js';
import { buildToolRegistry } from './mcp.js';
import { describeZodError } from './delta-schema.js';
import { DEFAULT_PORT, PACKAGE_NAME, VERSION } from './helpers.js';

function isPortTaken(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = createConnection({ port, host: '127.0.0.1' });
    socket.once('connect', () => { socket.destroy(); resolve(true); });
    socket.once('error', () => { resolve(false); });
  });
}

export function createApp(defaults: ResolvedDefaults): express.Express {
  const app = express();
  app.use(express.json({ limit: '10mb' }));

  app.get('/api/status', (_req, res) => {
    res.json({ name: PACKAGE_NAME, version: VERSION, defaults });
  });

  app.use(createConvertRouter(defaults));

  // MCP-over-HTTP: same tools as the stdio server
  const tools = buildToolRegistry(defaults);
  app.get('/api/mcp-tools', (_req, res) => {
    res.json(tools.map((t) => ({ name: t.name, description: t.description })));
  });

  app.post('/api/mcp-call', async (req, res) => {
    const { tool: toolName, arguments: args } = req.body ?? {};
    const tool = tools.find((t) => t.name === toolName);
    if (!tool) {
      res.status(404).json({ error: `Unknown tool: ${String(toolName)}` });
      return;
    }
    try {
      res.json(await tool.handler(args ?? {}));
    } catch (err) {
      if (err instanceof ZodError) {
        res.status(400).json({ error: describeZodError(err) });
        return;
      }
      const message = err instanceof Error ? err.message : String(err);
      res.status(500).json({ content: [{ type: 'text', text: `Error: ${message}` }], isError: true });
    }
  });

  return app;
}

export async function startHttpServer(options: { port?: number; defaults: ResolvedDefaults }): Promise<Server | null> {
  const port = options.port || DEFAULT_PORT;

  if (await isPortTaken(port)) {
    console.error(`[Server] Port ${port} is in use; is another deltadown already running?`);
    return null;
  }

  const server = createServer(createApp(options.defaults));
  server.listen(port, () => {
    console.log(`[Server] deltadown running at http://localhost:${port}`);
  });
  return server;
}
