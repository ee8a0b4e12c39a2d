/**
 * Shared helpers for tool handler tests
 */

import { expect } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { initializePipeline } from '../../../src/server/state.js';
import { loadPipelineConfig } from '../../../src/server/config.js';
import type { ToolResponse } from '../../../src/tools/shared.js';
import type { CapabilitySource } from '../../../src/models/capability.js';
import { FakeCapabilities } from '../fixtures/capabilities.js';

/**
 * Parse the JSON body of a tool response
 */
export function parseResponse(response: ToolResponse): unknown {
  expect(response.content).toHaveLength(1);
  return JSON.parse(response.content[0].text);
}

export async function createTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Install a pipeline backed by in-process capabilities
 */
export async function initializeTestPipeline(capabilities: CapabilitySource = new FakeCapabilities()): Promise<void> {
  await initializePipeline({ config: loadPipelineConfig({}), capabilities });
}
