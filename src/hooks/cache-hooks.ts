/**
 * Cache Hooks
 *
 * Exploration: sub-agent runs, scoped by working directory, fuzzy matched.
 * Research: web fetches, keyed by URL, scoped by URL origin, exact only.
 *
 * Pre-tool handlers answer with the cached summary on a hit; post-tool
 * handlers populate the cache. Misses and skipped events answer null.
 */

import { hookEventOf, isHookInput, resultTextOf } from './hook-input';
import { HookInput, HookResponse } from './types';
import { CacheService } from '../cache/cache-service';
import { ageSeconds } from '../cache/ttl-policy';
import { CacheRegistry } from '../config/cache-profiles';
import { componentLogger } from '../observability/logger';

const log = componentLogger('cache-hooks');

export const EXPLORATION_TOOLS = ['Task', 'Agent'];
export const EXPLORATION_SUBAGENTS = ['Explore', 'quick-lookup', 'quick-explorer'];
export const RESEARCH_TOOLS = ['WebFetch'];

const EXPLORATION_SUMMARY_CHARS = 200;
const RESEARCH_SUMMARY_CHARS = 500;

function allow(reason: string): HookResponse {
  return {
    hookSpecificOutput: {
      hookEventName: 'PreToolUse',
      permissionDecision: 'allow',
      permissionDecisionReason: reason,
    },
  };
}

/** Origin of a URL; the raw string when it does not parse. */
export function researchScope(url: string): string {
  try {
    return new URL(url).origin;
  } catch {
    return url;
  }
}

// ───── Exploration ──────────────────────────────────────────────

function explorationRequest(input: HookInput): { prompt: string; scope: string } | null {
  const prompt = input.tool_input?.prompt;
  const subagent = input.tool_input?.subagent_type ?? '';
  if (!EXPLORATION_SUBAGENTS.includes(subagent) || !prompt) return null;
  return { prompt, scope: input.cwd ?? '' };
}

export async function handleExplorationPre(input: HookInput, cache: CacheService): Promise<HookResponse | null> {
  const request = explorationRequest(input);
  if (!request) return null;

  const lookup = await cache.lookup(request.prompt, request.scope);
  if (!lookup.found) return null;

  const ageMins = Math.floor(ageSeconds(lookup.entry, cache.now()) / 60);
  const summary = lookup.entry.result.slice(0, EXPLORATION_SUMMARY_CHARS);
  log.info({ ageMins, match: lookup.match, subagent: input.tool_input?.subagent_type }, 'Exploration cache hit');
  return allow(`[Cache Hit] Similar exploration found (${ageMins}m ago): ${summary}`);
}

export async function handleExplorationPost(input: HookInput, cache: CacheService): Promise<null> {
  const request = explorationRequest(input);
  if (!request) return null;

  const content = resultTextOf(input);
  if (!content) {
    log.debug('Exploration result empty; not cached');
    return null;
  }

  await cache.store(request.prompt, request.scope, content);
  return null;
}

// ───── Research ─────────────────────────────────────────────────

export async function handleResearchPre(input: HookInput, cache: CacheService): Promise<HookResponse | null> {
  const url = input.tool_input?.url;
  if (!url) return null;

  const lookup = await cache.lookup(url, researchScope(url));
  if (!lookup.found) return null;

  const ttlHours = Math.floor(cache.config.ttlSeconds / 3600);
  const summary = lookup.entry.result.slice(0, RESEARCH_SUMMARY_CHARS);
  log.info({ url: url.slice(0, 80) }, 'Research cache hit');
  return allow(
    `[CACHE HIT - ${ttlHours}h fresh] ${url}\n\nCached content:\n${summary}\n\n(Consider skipping fetch if this answers your question)`,
  );
}

export async function handleResearchPost(input: HookInput, cache: CacheService): Promise<null> {
  const url = input.tool_input?.url;
  if (!url) {
    log.debug({ reason: 'no_url' }, 'Research result skipped');
    return null;
  }

  const content = resultTextOf(input);
  if (!content) {
    log.debug({ reason: 'no_content', url: url.slice(0, 80) }, 'Research result skipped');
    return null;
  }

  await cache.store(url, researchScope(url), content);
  return null;
}

// ───── Dispatch ─────────────────────────────────────────────────

/** Route one raw hook payload to the matching handler. */
export async function handleHookEvent(raw: unknown, caches: CacheRegistry): Promise<HookResponse | null> {
  if (!isHookInput(raw)) {
    log.debug('Payload is not a tool hook event');
    return null;
  }

  const event = hookEventOf(raw);
  if (!event) return null;

  if (EXPLORATION_TOOLS.includes(raw.tool_name)) {
    return event === 'PreToolUse'
      ? handleExplorationPre(raw, caches.exploration)
      : handleExplorationPost(raw, caches.exploration);
  }

  if (RESEARCH_TOOLS.includes(raw.tool_name)) {
    return event === 'PreToolUse'
      ? handleResearchPre(raw, caches.research)
      : handleResearchPost(raw, caches.research);
  }

  return null;
}
