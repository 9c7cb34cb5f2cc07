#!/usr/bin/env node

/**
 * CLI entry point for deltadown.
 * Usage: deltadown <to-markdown|to-delta|serve|mcp> [file] [options]
 *
 * Conversion defaults resolution (first wins):
 *   1. CLI flags (--fence, --ordered-style, --indent-size, --strict)
 *   2. DELTADOWN_* environment variables
 *   3. Saved in ~/.deltadown/config.json (written by `serve --save`)
 */

import { readFileSync } from 'fs';
import { parseCliArgs, convertDeltaText, convertMarkdownText, USAGE } from '../server/cli.js';
import { configFile, readConfig, saveConfig } from '../server/helpers.js';
import { convertDefaultsFromEnv, resolveConvertDefaults } from '../server/options.js';

const command = parseCliArgs(process.argv.slice(2));

if (command.kind === 'help') {
  console.log(USAGE);
} else if (command.kind === 'invalid') {
  console.error(`${command.message}\n\n${USAGE}`);
  process.exitCode = 1;
} else {
  const config = readConfig();
  const defaults = resolveConvertDefaults(command.overrides, convertDefaultsFromEnv(process.env), config);

  if (command.kind === 'to-markdown' || command.kind === 'to-delta') {
    try {
      // fd 0 is stdin
      const input = readFileSync(command.file ?? 0, 'utf-8');
      const output = command.kind === 'to-markdown'
        ? convertDeltaText(input, defaults)
        : convertMarkdownText(input, defaults, command.pretty);
      process.stdout.write(output === '' || output.endsWith('\n') ? output : `${output}\n`);
    } catch (err) {
      console.error(`[deltadown] ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  } else if (command.kind === 'serve') {
    const port = command.port ?? config.port;
    if (command.save) {
      saveConfig({ ...defaults, ...(port ? { port } : {}) });
      console.log(`[Config] Saved defaults to ${configFile()}`);
    }
    const { startHttpServer } = await import('../server/index.js');
    await startHttpServer({ port, defaults });
  } else {
    // Keep stdout clean for the MCP stdio protocol
    console.log = (...args: unknown[]) => console.error(...args);
    const { buildToolRegistry, startMcpServer } = await import('../server/mcp.js');
    startMcpServer(buildToolRegistry(defaults)).catch((err: unknown) => {
      console.error('[MCP] Failed to start:', err);
      process.exitCode = 1;
    });
  }
}
