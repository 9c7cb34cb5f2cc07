/**
 * Shared constants and config persistence.
 * Config lives in ~/.deltadown/config.json (or $DELTADOWN_HOME/config.json).
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { pickValid, type ConvertDefaults } from './options.js';

export const PACKAGE_NAME = 'deltadown';
export const VERSION = '0.1.0';
export const DEFAULT_PORT = 5060;

export function dataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.DELTADOWN_HOME || join(homedir(), '.deltadown');
}

export function configFile(env: NodeJS.ProcessEnv = process.env): string {
  return join(dataDir(env), 'config.json');
}

export function ensureDataDir(env: NodeJS.ProcessEnv = process.env): void {
  const dir = dataDir(env);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
}

// ---- Config persistence (conversion defaults, server port) ----

export interface DeltadownConfig extends ConvertDefaults {
  port?: number;
}

const portSchema = z.number().int().min(1).max(65535);

/** Read the saved config. A missing, unreadable or invalid file reads as {}; invalid fields are dropped. */
export function readConfig(env: NodeJS.ProcessEnv = process.env): DeltadownConfig {
  const file = configFile(env);
  if (!existsSync(file)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    console.error(`[Config] Ignoring unreadable ${file}:`, err instanceof Error ? err.message : err);
    return {};
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return {};

  const entries = Object.fromEntries(Object.entries(raw));
  const config: DeltadownConfig = pickValid(entries);
  const port = portSchema.safeParse(entries.port);
  if (port.success) config.port = port.data;
  return config;
}

export function saveConfig(updates: Partial<DeltadownConfig>, env: NodeJS.ProcessEnv = process.env): void {
  ensureDataDir(env);
  const current = readConfig(env);
  const merged = { ...current, ...updates };
  writeFileSync(configFile(env), JSON.stringify(merged, null, 2), 'utf-8');
}
