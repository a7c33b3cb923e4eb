import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { MotifStatError, ErrorCode } from '../errors';

/**
 * Throw a CANCELLED error when the signal has fired
 */
export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new MotifStatError(ErrorCode.CANCELLED, `Analysis cancelled during ${stage}`, {
      stage,
      reason: signal.reason instanceof Error ? signal.reason.message : String(signal.reason),
    });
  }
}

/**
 * Let pending timers and I/O run, then honour an abort that fired meanwhile
 */
export async function checkpoint(signal: AbortSignal | undefined, stage: string): Promise<void> {
  await yieldToEventLoop();
  throwIfAborted(signal, stage);
}
