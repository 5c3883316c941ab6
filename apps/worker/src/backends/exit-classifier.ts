import type { FailureType } from '@reelqueue/shared';
import type { ClassifiedError } from './backend.types';
import type { ProcessOutcome } from './process-runner';

export type StderrSignature = {
  pattern: RegExp;
  type: FailureType;
  reason: string;
};

/**
 * Maps a non-zero exit to a ClassifiedError by scanning the stderr tail,
 * newest line first. Unrecognised exits are transient.
 */
export function classifyExit(
  outcome: ProcessOutcome,
  signatures: readonly StderrSignature[],
): ClassifiedError {
  const lines = [...outcome.stderrTail].reverse();
  for (const line of lines) {
    const match = signatures.find((signature) => signature.pattern.test(line));
    if (match) {
      return { type: match.type, reason: match.reason, message: line.trim() };
    }
  }

  const status = outcome.signal
    ? `killed by ${outcome.signal}`
    : `exited with code ${outcome.exitCode ?? 'unknown'}`;
  const lastLine = lines.find((line) => line.trim().length > 0);
  return {
    type: 'transient',
    reason: outcome.signal ? 'killed' : 'nonzero_exit',
    message: lastLine ? `${status}: ${lastLine.trim()}` : status,
  };
}
