/**
 * Batch result model
 *
 * @module models/batch
 */

export type BatchErrorKind =
  | 'batch_item_failed'
  | 'unsupported_format'
  | 'path_not_found'
  | 'cancelled'
  | 'timeout';

export interface ErrorRecord {
  source_locator: string;
  error_kind: BatchErrorKind;
  message: string;
  file_type: string;
}

export interface BatchSuccess<T> {
  success: true;
  value: T;
}

export interface BatchFailure {
  success: false;
  error: ErrorRecord;
}

export type BatchSlot<T> = BatchSuccess<T> | BatchFailure;

/**
 * Same length and order as the input list
 */
export type BatchResult<T> = BatchSlot<T>[];

export function isBatchFailure<T>(slot: BatchSlot<T>): slot is BatchFailure {
  return !slot.success;
}
