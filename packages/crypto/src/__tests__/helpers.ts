/**
 * Shared test helpers.
 */

import pino, { type Logger } from 'pino';

/**
 * Run `fn` and return what it threw.
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

/**
 * Await `promise` and return its rejection reason.
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected promise to reject');
}

/**
 * A pino logger that records every line it writes.
 */
export function captureLogger(): { logger: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write: (msg: string) => {
        lines.push(JSON.parse(msg));
      },
    }
  );
  return { logger, lines };
}

/**
 * Replace the character at `index` with a different base64 character.
 */
export function flipChar(text: string, index: number): string {
  const replacement = text[index] === 'A' ? 'B' : 'A';
  return text.slice(0, index) + replacement + text.slice(index + 1);
}
