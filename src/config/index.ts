import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

const ConfigSchema = z.object({
  registry: z.object({
    entropyBytes: z.number().int().positive().max(1024).default(32),
    maxTokens: z.number().int().positive().default(10),
  }),
  server: z.object({
    port: z.number().int().min(0).max(65535).default(3000),
    host: z.string().min(1).default('0.0.0.0'),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    json: z.boolean().default(true),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

type RawSection = Record<string, unknown>;

function isPlainObject(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const value = raw[key];
  return isPlainObject(value) ? value : {};
}

// Unset falls back to the default; any other value is left for the schema to accept or reject
function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  return raw === undefined || raw === '' ? fallback : Number(raw);
}

export function loadConfig(configPath = 'csrf.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(full, 'utf8'));
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new Error(`Failed to parse config file ${full}: ${reason}`);
    }
    if (!isPlainObject(parsed)) {
      throw new Error(`Failed to parse config file ${full}: top level must be a JSON object`);
    }
    fileRaw = parsed;
  }
  const merged = {
    registry: {
      entropyBytes: envNumber('TOKEN_ENTROPY_BYTES', 32),
      maxTokens: envNumber('TOKEN_MAX_TOKENS', 10),
      ...section(fileRaw, 'registry'),
    },
    server: {
      port: envNumber('PORT', 3000),
      host: process.env.HOST || '0.0.0.0',
      ...section(fileRaw, 'server'),
    },
    logging: { level: process.env.LOG_LEVEL || 'info', json: true, ...section(fileRaw, 'logging') },
  };
  return ConfigSchema.parse(merged);
}
