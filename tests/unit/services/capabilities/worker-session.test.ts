/**
 * Python worker session and engine tests
 *
 * python-shell is replaced by an in-process stand-in that answers each
 * request through a scripted responder, so no interpreter is started.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PassThrough } from 'stream';

interface WireRequest {
  id: number;
  op: string;
  params: Record<string, unknown>;
}

interface Harness {
  responder: (request: WireRequest) => unknown;
  requests: WireRequest[];
  spawned: string[][];
  killed: number;
  ended: number;
}

const harness = vi.hoisted(
  (): Harness => ({ responder: () => undefined, requests: [], spawned: [], killed: 0, ended: 0 })
);

vi.mock('python-shell', async () => {
  const { EventEmitter } = await import('node:events');

  class PythonShell extends EventEmitter {
    constructor(_script: string, options: { args?: string[] } = {}) {
      super();
      harness.spawned.push(options.args ?? []);
    }

    send(message: WireRequest): this {
      harness.requests.push(message);
      setImmediate(() => {
        const reply = harness.responder(message);
        if (reply === 'exit') this.emit('close');
        else if (reply !== undefined) this.emit('message', reply);
      });
      return this;
    }

    kill(): this {
      harness.killed++;
      setImmediate(() => this.emit('close'));
      return this;
    }

    end(callback: () => void): this {
      harness.ended++;
      setImmediate(() => {
        this.emit('close');
        callback();
      });
      return this;
    }
  }

  return { PythonShell };
});

const { PythonWorkerSession, WorkerError } = await import('../../../../src/services/capabilities/worker-session.js');
const { PythonOcrEngine, PythonMailStoreReader, createPythonProviders } = await import(
  '../../../../src/services/capabilities/python-engines.js'
);
const { StreamBzip2Codec } = await import('../../../../src/services/capabilities/codecs.js');
const { loadPipelineConfig } = await import('../../../../src/server/config.js');

function sessionConfig(requestTimeoutMs = 1000) {
  return {
    capability: 'ocr' as const,
    pythonPath: 'python3',
    workerPath: '/opt/worker.py',
    requestTimeoutMs,
    probeTimeoutMs: 1000,
    options: { lang: 'en' },
  };
}

function ok(request: WireRequest, result: unknown) {
  return { id: request.id, ok: true, result };
}

describe('PythonWorkerSession', () => {
  beforeEach(() => {
    harness.responder = () => undefined;
    harness.requests = [];
    harness.spawned = [];
    harness.killed = 0;
    harness.ended = 0;
  });

  it('probes the worker on start and serves typed requests', async () => {
    harness.responder = (request) => {
      if (request.op === 'probe') return ok(request, { capability: 'ocr', detail: 'paddleocr' });
      if (request.op === 'ocr') return ok(request, { lines: [{ text: 'WHEREAS', confidence: 0.97 }] });
      return undefined;
    };

    const engine = new PythonOcrEngine(await PythonWorkerSession.start(sessionConfig()));
    const lines = await engine.recognize('/tmp/page-0001.png');

    expect(lines).toEqual([{ text: 'WHEREAS', confidence: 0.97 }]);
    expect(harness.spawned).toEqual([['--capability', 'ocr', '--options', '{"lang":"en"}']]);
    expect(harness.requests.map((r) => r.op)).toEqual(['probe', 'ocr']);
    expect(harness.requests[1].params).toEqual({ image_path: '/tmp/page-0001.png' });
  });

  it('closes the worker when the probe fails', async () => {
    harness.responder = (request) => ({
      id: request.id,
      ok: false,
      error: 'No module named paddleocr',
      category: 'unavailable',
    });

    await expect(PythonWorkerSession.start(sessionConfig())).rejects.toMatchObject({
      name: 'WorkerError',
      code: 'CAPABILITY_UNAVAILABLE',
      message: 'No module named paddleocr',
    });
    expect(harness.ended).toBe(1);
  });

  it('rejects a response that does not match the schema', async () => {
    harness.responder = (request) =>
      request.op === 'probe' ? ok(request, { capability: 'ocr' }) : ok(request, { lines: 'not a list' });

    const engine = new PythonOcrEngine(await PythonWorkerSession.start(sessionConfig()));

    await expect(engine.recognize('/tmp/p.png')).rejects.toMatchObject({ code: 'WORKER_PROTOCOL' });
  });

  it('times out a silent request, kills the worker and respawns on the next request', async () => {
    let silent = true;
    harness.responder = (request) => {
      if (request.op === 'probe') return ok(request, { capability: 'ocr' });
      if (silent) return undefined;
      return ok(request, { lines: [] });
    };

    const session = await PythonWorkerSession.start(sessionConfig(30));
    const engine = new PythonOcrEngine(session);

    const error = await engine.recognize('/tmp/p.png').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(WorkerError);
    expect(error).toMatchObject({ code: 'WORKER_TIMEOUT', message: 'ocr worker timeout after 30ms (ocr)' });
    expect(harness.killed).toBe(1);

    silent = false;
    await expect(engine.recognize('/tmp/p.png')).resolves.toEqual([]);
    expect(harness.spawned).toHaveLength(2);
  });

  it('fails the in-flight request when the worker exits', async () => {
    harness.responder = (request) => (request.op === 'probe' ? ok(request, { capability: 'ocr' }) : 'exit');
    const engine = new PythonOcrEngine(await PythonWorkerSession.start(sessionConfig()));

    await expect(engine.recognize('/tmp/p.png')).rejects.toMatchObject({
      code: 'WORKER_EXITED',
      message: 'ocr worker exited',
    });
  });

  it('refuses requests once closed', async () => {
    harness.responder = (request) => ok(request, { capability: 'ocr' });
    const session = await PythonWorkerSession.start(sessionConfig());
    await session.close();

    await expect(new PythonOcrEngine(session).recognize('/tmp/p.png')).rejects.toMatchObject({
      code: 'WORKER_EXITED',
    });
  });
});

describe('python engines', () => {
  beforeEach(() => {
    harness.requests = [];
    harness.spawned = [];
  });

  it('maps the mail store tree and surfaces unreadable items on read', async () => {
    harness.responder = (request) => {
      if (request.op === 'probe') return ok(request, { capability: 'mail_store' });
      return ok(request, {
        root: {
          name: '',
          items: [
            { message_class: 'IPM.Note', fields: { subject: 'Offer', sender: null } },
            { message_class: 'IPM.Note', error: 'bad record' },
          ],
          subfolders: [{ name: 'Inbox', items: [], subfolders: [] }],
        },
      });
    };

    const reader = new PythonMailStoreReader(
      await PythonWorkerSession.start({ ...sessionConfig(), capability: 'mail_store' })
    );
    const root = await reader.open('/mail/box.pst');

    expect(root.subfolders.map((f) => f.name)).toEqual(['Inbox']);
    expect(root.items[0].children).toEqual([]);
    await expect(root.items[0].read()).resolves.toEqual({ subject: 'Offer', sender: null });
    await expect(root.items[1].read()).rejects.toThrow('bad record');
  });

  it('starts providers with the configured worker options', async () => {
    harness.responder = (request) => {
      if (request.op === 'probe') return ok(request, { capability: 'embedding' });
      const sentences = request.params.sentences;
      const count = Array.isArray(sentences) ? sentences.length : 0;
      return ok(request, { embeddings: Array.from({ length: count }, () => [1, 0]), dimensions: 2 });
    };

    const config = loadPipelineConfig({}, { useGpu: false, embeddingModel: 'test-model' });
    const provider = createPythonProviders(config).embedding;
    expect(provider).toBeDefined();
    const embedder = provider ? await provider() : null;

    const vectors = await embedder?.embed(Array.from({ length: 150 }, (_, i) => `Sentence ${i}.`));

    expect(harness.spawned[0]).toEqual([
      '--capability',
      'embedding',
      '--options',
      '{"use_gpu":false,"model":"test-model"}',
    ]);
    expect(embedder?.modelName).toBe('test-model');
    expect(vectors).toHaveLength(150);
    const embedCalls = harness.requests.filter((r) => r.op === 'embed');
    expect(embedCalls.map((r) => (Array.isArray(r.params.sentences) ? r.params.sentences.length : 0))).toEqual([
      100, 50,
    ]);
  });
});

describe('StreamBzip2Codec', () => {
  it('pipes the input through the decoder', async () => {
    const codec = new StreamBzip2Codec(() => new PassThrough());
    const output = await codec.decompress(Buffer.from('decoded tar bytes'));
    expect(output.toString()).toBe('decoded tar bytes');
  });
});
