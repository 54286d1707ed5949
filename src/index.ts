#!/usr/bin/env node
import { createCacheRegistry } from './config/cache-profiles';
import { handleHookEvent } from './hooks/cache-hooks';
import { logger } from './observability/logger';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function main(): Promise<void> {
  const raw = await readStdin();

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (err) {
    logger.debug({ err }, 'Hook input is not JSON; ignoring');
    return;
  }

  const response = await handleHookEvent(payload, createCacheRegistry());
  if (response) {
    process.stdout.write(`${JSON.stringify(response)}\n`);
  }
}

// The cache is an optimization: the hook always exits 0
main().catch((err: unknown) => {
  logger.error({ err }, 'Tool cache hook failed');
  process.exitCode = 0;
});
