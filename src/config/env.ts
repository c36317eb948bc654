// file: src/config/env.ts
import 'dotenv/config';

export type NameResolution = 'prefer-exact' | 'strict';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function intFromEnv(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

function nameResolutionFromEnv(raw: string | undefined): NameResolution {
  return raw === 'strict' ? 'strict' : 'prefer-exact';
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const v = (raw || '').toLowerCase();
  return LOG_LEVELS.find(l => l === v) ?? 'info';
}

export const Env = {
  neo4jUri: process.env.NEO4J_URI || 'bolt://localhost:7687',
  neo4jUsername: process.env.NEO4J_USERNAME || process.env.NEO4J_USER || 'neo4j',
  neo4jPassword: process.env.NEO4J_PASSWORD || '',
  neo4jDatabase: process.env.NEO4J_DATABASE || 'neo4j',
  queryTimeoutMs: intFromEnv(process.env.KG_QUERY_TIMEOUT_MS, 10_000),
  pathTimeoutMs: intFromEnv(process.env.KG_PATH_TIMEOUT_MS, 20_000),
  nameResolution: nameResolutionFromEnv(process.env.KG_NAME_RESOLUTION),
  logLevel: parseLogLevel(process.env.LOG_LEVEL),
  noColor: !!process.env.NO_COLOR,
};

// wymuszenie wartości dopiero w runtime (np. hasło do Neo4j przy starcie CLI)
export function requireEnv(name: keyof typeof Env): string {
  const val = Env[name];
  if (val === '') throw new Error(`Missing env: ${name}`);
  return String(val);
}
