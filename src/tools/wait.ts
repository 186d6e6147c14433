import { OperationFailedError, OperationTimeoutError, RawNode } from '../types';
import { ElementMatch, describeSelector, findElement } from './elementFinder';
import { SelectorInput } from './schemas';

export interface WaitCondition {
  selector: SelectorInput;
  // Wait for the element to disappear instead of appear.
  gone: boolean;
}

export interface WaitOptions {
  intervalMs: number;
  timeoutMs: number;
  signal?: AbortSignal;
  now?: () => number;
}

export interface WaitOutcome {
  satisfied: true;
  elapsedMs: number;
  polls: number;
  match: ElementMatch | null;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationFailedError('Wait cancelled'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Polls tree snapshots until the condition holds. Rejects with a timeout error once
 * `timeoutMs` passes, or as soon as `signal` aborts.
 */
export async function waitForCondition(
  readTree: () => Promise<RawNode | null>,
  condition: WaitCondition,
  options: WaitOptions
): Promise<WaitOutcome> {
  const now = options.now ?? Date.now;
  const start = now();
  let polls = 0;

  for (;;) {
    if (options.signal?.aborted) {
      throw new OperationFailedError('Wait cancelled');
    }

    const root = await readTree();
    polls += 1;
    const match = root ? findElement(root, condition.selector) : null;
    if (condition.gone ? match === null : match !== null) {
      return { satisfied: true, elapsedMs: now() - start, polls, match };
    }

    const elapsed = now() - start;
    if (elapsed >= options.timeoutMs) {
      const what = describeSelector(condition.selector);
      throw new OperationTimeoutError(
        condition.gone
          ? `Element still present after ${options.timeoutMs}ms: ${what}`
          : `Element not found within ${options.timeoutMs}ms: ${what}`,
        options.timeoutMs
      );
    }

    await sleep(Math.min(options.intervalMs, options.timeoutMs - elapsed), options.signal);
  }
}
