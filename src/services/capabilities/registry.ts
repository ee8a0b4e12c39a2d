/**
 * Capability Registry
 *
 * Probes every optional subsystem once at startup and owns the resulting
 * handles. Processors read an immutable snapshot; a capability that failed
 * to initialize stays unavailable for the life of the process.
 *
 * @module services/capabilities/registry
 */

import {
  CAPABILITY_NAMES,
  type CapabilityHandle,
  type CapabilityHandles,
  type CapabilityName,
  type CapabilityProviders,
  type CapabilitySnapshot,
  type CapabilitySource,
  type CapabilityStatus,
} from '../../models/capability.js';

export interface ProbeOptions {
  /** Capabilities switched off by configuration; their providers never run */
  disabled?: readonly CapabilityName[];
}

type HandleSlots = { [K in CapabilityName]?: CapabilityHandles[K] };

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CapabilityRegistry implements CapabilitySource {
  private constructor(
    private readonly handles: HandleSlots,
    private readonly current: CapabilitySnapshot
  ) {}

  /**
   * Run every provider concurrently and record the outcome
   *
   * Never throws: a provider that rejects marks its capability unavailable.
   */
  static async probe(providers: CapabilityProviders, options: ProbeOptions = {}): Promise<CapabilityRegistry> {
    const disabled = new Set(options.disabled ?? []);
    const handles: HandleSlots = {};
    const statuses = new Map<CapabilityName, CapabilityStatus>();

    const probeOne = async <K extends CapabilityName>(name: K): Promise<void> => {
      const provider = providers[name];
      if (disabled.has(name)) {
        statuses.set(name, { state: 'unavailable', reason: 'disabled by configuration' });
        console.error(`[INFO] Capability ${name}: disabled by configuration`);
        return;
      }
      if (!provider) {
        statuses.set(name, { state: 'unavailable', reason: 'no provider registered' });
        console.error(`[INFO] Capability ${name}: no provider registered`);
        return;
      }
      try {
        const handle = await provider();
        handles[name] = handle;
        statuses.set(name, { state: 'available' });
        console.error(`[INFO] Capability ${name}: available`);
      } catch (error) {
        const reason = describe(error);
        statuses.set(name, { state: 'unavailable', reason });
        console.error(`[WARN] Capability ${name}: unavailable (${reason})`);
      }
    };

    await Promise.all(CAPABILITY_NAMES.map((name) => probeOne(name)));

    const status = (name: CapabilityName): CapabilityStatus =>
      statuses.get(name) ?? { state: 'unavailable', reason: 'not probed' };
    const capabilities: Record<CapabilityName, CapabilityStatus> = {
      ocr: status('ocr'),
      layout: status('layout'),
      tables: status('tables'),
      rasterizer: status('rasterizer'),
      generic_ocr: status('generic_ocr'),
      mail_store: status('mail_store'),
      embedding: status('embedding'),
      rar: status('rar'),
      bzip2: status('bzip2'),
    };

    const available = CAPABILITY_NAMES.filter((n) => capabilities[n].state === 'available').length;
    console.error(`[INFO] Capability probe complete: ${available}/${CAPABILITY_NAMES.length} available`);

    const snapshot: CapabilitySnapshot = Object.freeze({
      probed_at: new Date().toISOString(),
      capabilities: Object.freeze(capabilities),
    });
    return new CapabilityRegistry(handles, snapshot);
  }

  snapshot(): CapabilitySnapshot {
    return this.current;
  }

  isAvailable(name: CapabilityName): boolean {
    return this.current.capabilities[name].state === 'available';
  }

  /**
   * Handle of an available capability, or null
   */
  get<K extends CapabilityName>(name: K): CapabilityHandles[K] | null {
    const handle: HandleSlots[K] = this.handles[name];
    return handle ?? null;
  }

  /**
   * Close every live handle. Errors are logged and do not stop the others.
   */
  async shutdown(): Promise<void> {
    const live: Array<[CapabilityName, CapabilityHandle]> = [];
    for (const name of CAPABILITY_NAMES) {
      const handle = this.handles[name];
      if (handle) live.push([name, handle]);
    }
    const results = await Promise.allSettled(live.map(([, handle]) => handle.close()));
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        console.error(`[WARN] Failed to close capability ${live[i][0]}: ${describe(result.reason)}`);
      }
    });
    for (const name of CAPABILITY_NAMES) {
      delete this.handles[name];
    }
  }
}
