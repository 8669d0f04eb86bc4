import { errorToString } from './error-to-string';
import { isPromise, isFunction } from './type-guards';
import { DOUBLE_EOL } from './constants';

/**
 * Receives errors thrown (or rejected) by callbacks run through
 * `safeHandleCallback`/`safeHandleCallbackAndWait`.
 */
export type CallbackErrorReporter = (error: Error) => void;

const defaultReporter: CallbackErrorReporter = (error) => {
  // eslint-disable-next-line no-console
  console.error(error.message);
};

let activeReporter: CallbackErrorReporter = defaultReporter;

/**
 * Replace the process-wide reporter for callback errors. Passing `undefined`
 * restores the default (`console.error`).
 *
 * @returns The reporter that was active before the call
 */
export function setCallbackErrorReporter(
  reporter: CallbackErrorReporter | undefined,
): CallbackErrorReporter {
  const previous = activeReporter;
  activeReporter = reporter ?? defaultReporter;
  return previous;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function reportCallbackError(callbackName: string, error: unknown): Error {
  const wrapped = new Error(
    `Error in a callback ${callbackName}: ${DOUBLE_EOL}${errorToString(error)}`,
  );

  try {
    activeReporter(wrapped);
  } catch {
    defaultReporter(wrapped);
  }

  return toError(error);
}

/**
 * Runs a callback without letting it throw into the caller. Works with both
 * synchronous callbacks and ones returning a Promise.
 *
 * This is fire-and-forget: the result is discarded and failures are only
 * reported through the callback error reporter. Event subscribers and lifecycle
 * hooks go through here so a broken listener never interrupts a stop sequence.
 */
export function safeHandleCallback(
  callbackName: string,
  callback: unknown,
  ...args: unknown[]
): void {
  if (!isFunction(callback)) {
    reportCallbackError(
      callbackName,
      new Error(`Callback provided for ${callbackName} is not a function`),
    );
    return;
  }

  try {
    const result = callback(...args);

    if (isPromise(result)) {
      result.catch((error: unknown) => {
        reportCallbackError(callbackName, error);
      });
    }
  } catch (error) {
    reportCallbackError(callbackName, error);
  }
}

export interface CallbackResult<T> {
  success: boolean;
  value?: T;
  error?: Error;
}

/**
 * Like `safeHandleCallback`, but waits for the callback to settle and returns
 * its outcome.
 */
export async function safeHandleCallbackAndWait<T, A extends unknown[]>(
  callbackName: string,
  callback: (...args: A) => T | Promise<T>,
  ...args: A
): Promise<CallbackResult<T>> {
  if (!isFunction(callback)) {
    const error = reportCallbackError(
      callbackName,
      new Error(`Callback provided for ${callbackName} is not a function`),
    );

    return { success: false, error };
  }

  try {
    const value = await callback(...args);
    return { success: true, value };
  } catch (error) {
    return { success: false, error: reportCallbackError(callbackName, error) };
  }
}
