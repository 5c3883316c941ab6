import type { ClassifiedError } from '../backends/backend.types';

const INPUT_SIGNATURES: Array<[RegExp, string]> = [
  [/corrupt|invalid data found|moov atom not found|malformed/, 'corrupt_input'],
  [/unsupported|unknown (codec|decoder|encoder)/, 'unsupported_codec'],
  [/no such file|enoent|does not exist/, 'missing_input'],
];

/**
 * Classifies an error that escaped an adapter.
 * Only clear input problems are fatal; anything else (network, DB, timeouts,
 * programming errors) is treated as transient and left to the retry ceiling.
 */
export function classifyFailure(error: unknown): ClassifiedError {
  const message = error instanceof Error ? error.message : String(error);
  const normalized = message.toLowerCase();

  for (const [signature, reason] of INPUT_SIGNATURES) {
    if (signature.test(normalized)) {
      return { type: 'fatal_input', reason, message };
    }
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return { type: 'transient', reason: 'aborted', message };
  }

  return { type: 'transient', reason: 'unexpected_error', message };
}
