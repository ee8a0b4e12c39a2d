/**
 * Capabilities Module
 *
 * @module services/capabilities
 */

import type { CapabilityProviders } from '../../models/capability.js';
import type { PipelineConfig } from '../../server/config.js';
import { createPythonProviders } from './python-engines.js';
import { loadBzip2Codec, loadRarCodec } from './codecs.js';

export { CapabilityRegistry } from './registry.js';
export type { ProbeOptions } from './registry.js';
export { SerialGate } from './gate.js';
export { PythonWorkerSession, WorkerError } from './worker-session.js';
export type { WorkerErrorCode, WorkerSessionConfig } from './worker-session.js';
export { createPythonProviders } from './python-engines.js';
export { loadBzip2Codec, loadRarCodec } from './codecs.js';

/**
 * Every provider the server probes at startup
 */
export function createDefaultProviders(config: PipelineConfig): CapabilityProviders {
  return {
    ...createPythonProviders(config),
    rar: loadRarCodec,
    bzip2: loadBzip2Codec,
  };
}
