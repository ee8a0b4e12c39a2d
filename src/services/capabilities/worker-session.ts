/**
 * Python Worker Session
 *
 * One long-lived python/capability_worker.py process per capability, driven
 * via python-shell in JSON mode. The model is loaded once (at the `probe`
 * request) and reused for every later request.
 *
 * Protocol, one JSON object per line:
 *   request  {"id": 1, "op": "ocr", "params": {...}}
 *   response {"id": 1, "ok": true, "result": ...}
 *          | {"id": 1, "ok": false, "error": "...", "category": "..."}
 *
 * The worker serves one request at a time, so requests go through a
 * SerialGate. A request that times out kills the process; the next request
 * respawns it.
 *
 * CRITICAL: stdout of this process is the MCP stream. Log with console.error().
 *
 * @module services/capabilities/worker-session
 */

import { PythonShell, type Options } from 'python-shell';
import { z } from 'zod';
import { SerialGate } from './gate.js';
import type { PythonCapabilityName } from '../../models/capability.js';

/** Max stderr accumulation: 10KB */
const MAX_STDERR_LENGTH = 10_240;

export type WorkerErrorCode =
  | 'WORKER_ERROR'
  | 'WORKER_TIMEOUT'
  | 'WORKER_EXITED'
  | 'WORKER_PROTOCOL'
  | 'CAPABILITY_UNAVAILABLE';

export class WorkerError extends Error {
  constructor(
    message: string,
    public readonly code: WorkerErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WorkerError';
    Error.captureStackTrace?.(this, WorkerError);
  }
}

const WorkerResponseSchema = z.object({
  id: z.number().int(),
  ok: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().optional(),
  category: z.string().optional(),
});

const ProbeResultSchema = z.object({
  capability: z.string(),
  detail: z.string().optional(),
});

export interface WorkerSessionConfig {
  capability: PythonCapabilityName;
  pythonPath: string;
  workerPath: string;
  requestTimeoutMs: number;
  probeTimeoutMs: number;
  /** Capability-specific options forwarded to the worker (model ids, language, GPU flag) */
  options: Record<string, unknown>;
}

interface PendingRequest {
  op: string;
  resolve: (result: unknown) => void;
  reject: (error: WorkerError) => void;
  timer: NodeJS.Timeout;
}

export class PythonWorkerSession {
  private shell: PythonShell | null = null;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly gate = new SerialGate();
  private nextId = 1;
  private stderr = '';
  private closed = false;

  private constructor(private readonly config: WorkerSessionConfig) {}

  get capability(): PythonCapabilityName {
    return this.config.capability;
  }

  /**
   * Spawn the worker and ask it to load its model.
   *
   * @throws WorkerError when the worker cannot start or the model fails to load
   */
  static async start(config: WorkerSessionConfig): Promise<PythonWorkerSession> {
    const session = new PythonWorkerSession(config);
    try {
      const probe = await session.request('probe', {}, ProbeResultSchema, config.probeTimeoutMs);
      console.error(
        `[PythonWorker] ${config.capability} ready${probe.detail ? ` (${probe.detail})` : ''}`
      );
      return session;
    } catch (error) {
      await session.close();
      throw error;
    }
  }

  /**
   * Send one request; resolves with the validated result
   */
  request<T>(
    op: string,
    params: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    timeoutMs: number = this.config.requestTimeoutMs
  ): Promise<T> {
    return this.gate.run(async () => {
      const raw = await this.send(op, params, timeoutMs);
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        throw new WorkerError(
          `Invalid ${op} response from ${this.config.capability} worker: ${parsed.error.message}`,
          'WORKER_PROTOCOL',
          { op }
        );
      }
      return parsed.data;
    });
  }

  /**
   * Close stdin and wait for the worker to exit
   */
  async close(): Promise<void> {
    this.closed = true;
    const shell = this.shell;
    if (!shell) return;
    this.shell = null;
    await new Promise<void>((resolve) => {
      shell.end(() => resolve());
    });
    this.failPending(new WorkerError(`${this.config.capability} worker session is closed`, 'WORKER_EXITED'));
  }

  private ensureShell(): PythonShell {
    if (this.closed) {
      throw new WorkerError(`${this.config.capability} worker session is closed`, 'WORKER_EXITED');
    }
    if (this.shell) return this.shell;

    const options: Options = {
      mode: 'json',
      pythonPath: this.config.pythonPath,
      pythonOptions: ['-u'],
      args: ['--capability', this.config.capability, '--options', JSON.stringify(this.config.options)],
    };

    const shell = new PythonShell(this.config.workerPath, options);
    this.stderr = '';

    shell.on('message', (message: unknown) => this.handleMessage(message));
    shell.on('stderr', (line: string) => {
      // Cap stderr accumulation to prevent unbounded memory growth
      if (this.stderr.length < MAX_STDERR_LENGTH) {
        this.stderr += line + '\n';
      }
    });
    shell.on('error', (err: Error) => {
      console.error(`[PythonWorker] ${this.config.capability} error: ${err.message}`);
    });
    shell.on('close', () => {
      // A shell replaced after a timeout or closed deliberately owns no pending requests
      if (this.shell !== shell) return;
      this.shell = null;
      this.failPending(
        new WorkerError(
          `${this.config.capability} worker exited`,
          'WORKER_EXITED',
          { stderr: this.stderr.substring(0, 1000) }
        )
      );
    });

    this.shell = shell;
    return shell;
  }

  private send(op: string, params: Record<string, unknown>, timeoutMs: number): Promise<unknown> {
    return new Promise((resolve, reject) => {
      let shell: PythonShell;
      try {
        shell = this.ensureShell();
      } catch (error) {
        reject(error);
        return;
      }

      const id = this.nextId++;
      const timer = setTimeout(() => {
        if (!this.pending.delete(id)) return;
        // Kill the Python process so a hung model does not block later requests
        console.error(`[WARN] ${this.config.capability} worker timed out on ${op} after ${timeoutMs}ms, restarting on next request`);
        this.shell = null;
        try {
          shell.kill();
        } catch (error) {
          console.error(`[WARN] Failed to kill ${this.config.capability} worker: ${error instanceof Error ? error.message : String(error)}`);
        }
        reject(
          new WorkerError(
            `${this.config.capability} worker timeout after ${timeoutMs}ms (${op})`,
            'WORKER_TIMEOUT',
            { op, stderr: this.stderr.substring(0, 1000) }
          )
        );
      }, timeoutMs);

      this.pending.set(id, { op, resolve, reject, timer });
      shell.send({ id, op, params });
    });
  }

  private handleMessage(message: unknown): void {
    const parsed = WorkerResponseSchema.safeParse(message);
    if (!parsed.success) {
      console.error(`[PythonWorker] ${this.config.capability} sent an unrecognised message, ignoring`);
      return;
    }

    const response = parsed.data;
    const request = this.pending.get(response.id);
    if (!request) return; // answered after a timeout
    this.pending.delete(response.id);
    clearTimeout(request.timer);

    if (response.ok) {
      request.resolve(response.result);
      return;
    }

    const code: WorkerErrorCode =
      response.category === 'unavailable' ? 'CAPABILITY_UNAVAILABLE' : 'WORKER_ERROR';
    request.reject(
      new WorkerError(response.error ?? `${request.op} failed with no error message`, code, {
        op: request.op,
        category: response.category,
      })
    );
  }

  private failPending(error: WorkerError): void {
    for (const [id, request] of this.pending) {
      clearTimeout(request.timer);
      this.pending.delete(id);
      request.reject(error);
    }
  }
}
