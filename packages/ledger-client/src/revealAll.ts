import type { TypedPlaintext } from '@cipherledger/application';
import { RevealErrorCodes } from './types';
import { RevealSession, type RevealOutcome, type RevealSessionOptions } from './RevealSession';

export type RevealAllOptions = Omit<RevealSessionOptions, 'handle' | 'onStatusChange'>;

export type RevealResult = Readonly<{
  handle: string;
  outcome: RevealOutcome;
}>;

/**
 * Runs one independent session per handle. A failing reveal does not stop
 * the others.
 */
export async function revealAll(handles: readonly string[], options: RevealAllOptions): Promise<RevealResult[]> {
  const settled = await Promise.allSettled(handles.map((handle) => new RevealSession({ ...options, handle }).start()));
  return settled.map((result, i): RevealResult => ({
    handle: handles[i],
    outcome:
      result.status === 'fulfilled'
        ? result.value
        : {
            ok: false,
            error: {
              code: RevealErrorCodes.remoteServiceUnavailable,
              message: result.reason instanceof Error ? result.reason.message : 'Reveal failed',
            },
          },
  }));
}

/**
 * Plaintext values of the reveals that succeeded, keyed by handle.
 */
export function revealedValues(results: readonly RevealResult[]): Map<string, TypedPlaintext> {
  const values = new Map<string, TypedPlaintext>();
  for (const { handle, outcome } of results) {
    if (outcome.ok) values.set(handle, outcome.plaintext);
  }
  return values;
}
