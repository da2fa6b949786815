import type { Logger } from './logger.js';

export interface RememberOptions<R> {
  /** Fetch prompt context for the incoming message. */
  fetchContext: (message: string) => Promise<string>;
  /** Persist the exchange once the wrapped call has returned. */
  store: (message: string, response: string) => Promise<unknown>;
  /** Text to store for non-string results. Defaults to JSON.stringify. */
  toText?: (result: R) => string;
  logger?: Logger;
}

export type RememberTarget<R, TRest extends unknown[]> = (
  message: string,
  memoryContext: string,
  ...rest: TRest
) => R | Promise<R>;

export type Remembered<R, TRest extends unknown[]> = (message: string, ...rest: TRest) => Promise<R>;

function defaultToText(result: unknown): string {
  if (result === undefined || result === null) return '';
  return JSON.stringify(result) ?? '';
}

/**
 * Wrap `fn` so each call fetches context for `message` first, passes it as the
 * second argument, then stores the message/response pair.
 *
 * An empty message skips both the fetch and the store; an empty response skips the store.
 */
export function remember<R, TRest extends unknown[] = []>(
  fn: RememberTarget<R, TRest>,
  options: RememberOptions<R>,
): Remembered<R, TRest> {
  const toText = options.toText ?? defaultToText;

  return async (message: string, ...rest: TRest): Promise<R> => {
    const hasMessage = typeof message === 'string' && message.trim().length > 0;

    const memoryContext = hasMessage ? await options.fetchContext(message) : '';
    const result = await fn(message, memoryContext, ...rest);

    if (hasMessage) {
      const text = typeof result === 'string' ? result : toText(result);
      if (text.length > 0) {
        await options.store(message, text);
      } else {
        options.logger?.debug('remember: empty response, nothing stored');
      }
    }

    return result;
  };
}
