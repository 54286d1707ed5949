import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseFloat(val);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const env = {
  logLevel: optional('LOG_LEVEL', 'warn'),
  cacheDir: optional('TOOL_CACHE_DIR', path.join(os.homedir(), '.claude', 'data', 'cache')),
  lockTimeoutMs: optionalInt('CACHE_LOCK_TIMEOUT_MS', 2000),
  maxContentSize: optionalInt('CACHE_MAX_CONTENT_SIZE', 50_000),
  maxFuzzyCandidates: optionalInt('CACHE_MAX_FUZZY_CANDIDATES', 100),

  // ───── Exploration (sub-agent) results ─────
  exploration: {
    ttlSeconds: optionalInt('EXPLORATION_CACHE_TTL_SECONDS', 3600),
    maxEntries: optionalInt('EXPLORATION_CACHE_MAX_ENTRIES', 50),
    similarityThreshold: optionalFloat('EXPLORATION_SIMILARITY_THRESHOLD', 0.6),
  },

  // ───── Research (web fetch) results ─────
  research: {
    ttlSeconds: optionalInt('RESEARCH_CACHE_TTL_SECONDS', 86_400),
    maxEntries: optionalInt('RESEARCH_CACHE_MAX_ENTRIES', 100),
    similarityThreshold: optionalFloat('RESEARCH_SIMILARITY_THRESHOLD', 0.6),
  },
};
