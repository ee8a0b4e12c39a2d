/**
 * Batch Orchestrator
 *
 * Runs one async operation per input with optional bounded concurrency, a
 * per-item timeout and batch cancellation. Always resolves with exactly one
 * slot per input, in input order. Failures are isolated to their slot.
 *
 * @module services/batch/orchestrator
 */

import { isBatchFailure, type BatchErrorKind, type BatchResult, type BatchSlot, type ErrorRecord } from '../../models/batch.js';
import { MCPError } from '../../server/errors.js';
import { getFileExtension } from '../../utils/files.js';

export interface BatchOptions<I> {
  /** Source locator reported in error records */
  locate?: (input: I, index: number) => string;
  /** file_type reported in error records; defaults to the locator's extension */
  fileType?: (input: I, index: number) => string;
  /** Items in flight at once; defaults to all */
  maxConcurrent?: number;
  /** Per-item timeout; 0 or unset disables it */
  itemTimeoutMs?: number;
  /** Cancels every item not yet finished */
  signal?: AbortSignal;
  /** Label used in log lines */
  label?: string;
}

export type BatchOperation<I, T> = (input: I, signal: AbortSignal) => Promise<T>;

function errorKind(error: unknown): BatchErrorKind {
  if (error instanceof Error) {
    if (error.name === 'UnsupportedFormatError') return 'unsupported_format';
    if (error instanceof MCPError && error.category === 'PATH_NOT_FOUND') return 'path_not_found';
    if (Reflect.get(error, 'code') === 'ENOENT') return 'path_not_found';
  }
  return 'batch_item_failed';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function defaultLocate<I>(input: I, index: number): string {
  return typeof input === 'string' ? input : `item ${index}`;
}

/**
 * Run `op` over every input and collect ordered slots
 *
 * Never rejects. An operation that is abandoned (timeout or cancellation)
 * keeps running in the background until it honours its signal; whatever it
 * settles with later is discarded.
 */
export async function runBatch<I, T>(
  inputs: readonly I[],
  op: BatchOperation<I, T>,
  options: BatchOptions<I> = {}
): Promise<BatchResult<T>> {
  const locate = options.locate ?? defaultLocate;
  const fileType = options.fileType ?? ((input: I, index: number) => getFileExtension(locate(input, index)) || 'unknown');
  const label = options.label ?? 'Batch';
  const timeoutMs = options.itemTimeoutMs ?? 0;
  const batchSignal = options.signal;

  const slots: BatchSlot<T>[] = [];
  if (inputs.length === 0) return slots;

  const failure = (input: I, index: number, kind: BatchErrorKind, message: string): BatchSlot<T> => {
    const error: ErrorRecord = {
      source_locator: locate(input, index),
      error_kind: kind,
      message,
      file_type: fileType(input, index),
    };
    console.error(`[WARN] [${label}] ${error.source_locator} failed (${kind}): ${message}`);
    return { success: false, error };
  };

  const runItem = (input: I, index: number): Promise<BatchSlot<T>> => {
    if (batchSignal?.aborted) {
      return Promise.resolve(failure(input, index, 'cancelled', 'Batch cancelled before the item started'));
    }

    return new Promise((resolve) => {
      const controller = new AbortController();
      let settled = false;
      let abortKind: 'cancelled' | 'timeout' = 'cancelled';
      let timer: NodeJS.Timeout | undefined;

      const onBatchAbort = (): void => {
        abortKind = 'cancelled';
        controller.abort(new Error('Batch cancelled'));
      };

      const finish = (slot: BatchSlot<T>): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        batchSignal?.removeEventListener('abort', onBatchAbort);
        resolve(slot);
      };

      controller.signal.addEventListener(
        'abort',
        () => {
          const message =
            abortKind === 'timeout' ? `Timed out after ${timeoutMs}ms` : 'Batch cancelled while the item was running';
          finish(failure(input, index, abortKind, message));
        },
        { once: true }
      );

      batchSignal?.addEventListener('abort', onBatchAbort, { once: true });
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          abortKind = 'timeout';
          controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
        }, timeoutMs);
      }

      let pending: Promise<T>;
      try {
        pending = op(input, controller.signal);
      } catch (error) {
        finish(failure(input, index, errorKind(error), errorMessage(error)));
        return;
      }
      // Whatever the operation settles with after an abort is discarded
      void pending.then(
        (value) => finish({ success: true, value }),
        (error: unknown) => {
          if (!settled) finish(failure(input, index, errorKind(error), errorMessage(error)));
        }
      );
    });
  };

  const limit = Math.max(1, Math.min(options.maxConcurrent ?? inputs.length, inputs.length));
  let next = 0;
  const lane = async (): Promise<void> => {
    while (next < inputs.length) {
      const index = next++;
      slots[index] = await runItem(inputs[index], index);
    }
  };
  await Promise.all(Array.from({ length: limit }, () => lane()));

  const failed = slots.filter(isBatchFailure).length;
  console.error(
    `[INFO] [${label}] Completed ${inputs.length} item(s): ${inputs.length - failed} succeeded, ${failed} failed`
  );
  return slots;
}
