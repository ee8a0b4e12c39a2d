/**
 * Extraction error classes
 *
 * Rungs of an extraction ladder throw these; the ladder catches them, records
 * the reason and moves on. None of them escapes a processor's public method.
 *
 * @module services/extraction/errors
 */

import type { CapabilityName } from '../../models/capability.js';

/**
 * Raised by the format classifier for an extension it does not route
 */
export class UnsupportedFormatError extends Error {
  readonly extension: string;

  constructor(extension: string, filePath?: string) {
    const label = extension ? `.${extension}` : '(no extension)';
    super(`Unsupported format: ${label}${filePath ? ` (${filePath})` : ''}`);
    this.name = 'UnsupportedFormatError';
    this.extension = extension;
    Error.captureStackTrace?.(this, UnsupportedFormatError);
  }
}

/**
 * A strategy needs a capability the snapshot reports as unavailable
 */
export class CapabilityUnavailableError extends Error {
  readonly capability: CapabilityName;
  readonly reason: string;

  constructor(capability: CapabilityName, reason: string) {
    super(`Capability "${capability}" unavailable: ${reason}`);
    this.name = 'CapabilityUnavailableError';
    this.capability = capability;
    this.reason = reason;
    Error.captureStackTrace?.(this, CapabilityUnavailableError);
  }
}

/**
 * A strategy threw while running
 */
export class ExtractionFailedError extends Error {
  readonly strategy: string;

  constructor(strategy: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`${strategy} failed: ${message}`, { cause });
    this.name = 'ExtractionFailedError';
    this.strategy = strategy;
    Error.captureStackTrace?.(this, ExtractionFailedError);
  }
}
