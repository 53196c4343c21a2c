import { TimeoutError } from '../../lib/with-timeout';
import type { FallbackTrigger } from '../fallback/fallback-types';

const QUOTA_PATTERN = /quota|rate limit|resource exhausted|too many requests|\b429\b/i;
const TIMEOUT_PATTERN = /timeout|timed out/i;

function readStatusCode(error: object): number | undefined {
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  if ('status' in error && typeof error.status === 'number') return error.status;
  return undefined;
}

/**
 * Maps a generation failure onto a fallback trigger.
 */
export function classifyGenerationError(error: unknown): FallbackTrigger {
  if (error instanceof TimeoutError) return 'TIMEOUT';

  if (typeof error === 'object' && error !== null && readStatusCode(error) === 429) {
    return 'API_QUOTA_EXCEEDED';
  }

  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof Error && error.name === 'AbortError') return 'TIMEOUT';
  if (QUOTA_PATTERN.test(message)) return 'API_QUOTA_EXCEEDED';
  if (TIMEOUT_PATTERN.test(message)) return 'TIMEOUT';

  return 'LLM_ERROR';
}
