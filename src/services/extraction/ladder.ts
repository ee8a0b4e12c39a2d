/**
 * Extraction ladder
 *
 * Runs an ordered list of strategies, richest first. A strategy whose
 * required capabilities are unavailable is skipped; one that throws is
 * abandoned. Either way the reason is logged and kept in
 * `metadata.fallback_reasons`, and the next strategy runs. When every
 * strategy is exhausted the generic fallback produces the record.
 *
 * @module services/extraction/ladder
 */

import type { CapabilityName, CapabilitySource } from '../../models/capability.js';
import type { DocumentMetadata, DocumentRecord, ExtractionInput, ProcessingMethod } from '../../models/document.js';
import { CapabilityUnavailableError, ExtractionFailedError } from './errors.js';
import { baseMetadata, genericFallback } from './fallback.js';

export interface StrategyResult {
  raw_content: string;
  processing_method: ProcessingMethod;
  /** Strategy-specific metadata; file_type here overrides the format label */
  metadata: DocumentMetadata;
}

export interface ExtractionStrategy {
  name: string;
  /** Capabilities that must be available for the strategy to run */
  requires: readonly CapabilityName[];
  /**
   * False for strategies that are not an enhancement even when they are
   * the first rung (the generic loader)
   */
  enhanced?: boolean;
  attempt(input: ExtractionInput, capabilities: CapabilitySource): Promise<StrategyResult>;
}

function missingCapability(
  strategy: ExtractionStrategy,
  capabilities: CapabilitySource
): CapabilityUnavailableError | null {
  const snapshot = capabilities.snapshot();
  for (const name of strategy.requires) {
    const status = snapshot.capabilities[name];
    if (status.state === 'unavailable') {
      return new CapabilityUnavailableError(name, status.reason);
    }
  }
  return null;
}

/**
 * Run strategies in order and return the first record produced
 *
 * Never throws for a strategy failure. Aborting `input.signal` stops the
 * ladder between rungs with the signal's reason.
 */
export async function runLadder(
  label: string,
  strategies: readonly ExtractionStrategy[],
  input: ExtractionInput,
  capabilities: CapabilitySource
): Promise<DocumentRecord> {
  const reasons: string[] = [];

  for (let index = 0; index < strategies.length; index++) {
    input.signal?.throwIfAborted();
    const strategy = strategies[index];

    const unavailable = missingCapability(strategy, capabilities);
    if (unavailable) {
      reasons.push(`${strategy.name}: ${unavailable.message}`);
      console.error(`[WARN] [${label}] Skipping ${strategy.name} for ${input.filePath}: ${unavailable.message}`);
      continue;
    }

    let result: StrategyResult;
    try {
      result = await strategy.attempt(input, capabilities);
    } catch (error) {
      input.signal?.throwIfAborted();
      const failure = new ExtractionFailedError(strategy.name, error);
      reasons.push(failure.message);
      console.error(`[WARN] [${label}] ${failure.message} (${input.filePath}), trying next strategy`);
      continue;
    }

    if (index > 0) {
      console.error(`[INFO] [${label}] ${input.filePath} extracted by ${strategy.name} after ${index} fallback(s)`);
    }

    const metadata: DocumentMetadata = {
      ...(await baseMetadata(input)),
      ...result.metadata,
      processing_method: result.processing_method,
    };
    if (reasons.length > 0) {
      metadata.fallback_reasons = reasons;
    }
    return {
      raw_content: result.raw_content,
      source_locator: input.filePath,
      enhanced: index === 0 && strategy.enhanced !== false,
      metadata,
    };
  }

  const reason = reasons.length > 0 ? reasons.join('; ') : 'no extraction strategy available';
  const record = await genericFallback(input, reason);
  if (reasons.length > 0) {
    record.metadata.fallback_reasons = reasons;
  }
  return record;
}
