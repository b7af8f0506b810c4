import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { createApp } from '../src/app.js';
import type { ServerConfig } from '../src/config/env.js';
import type { ResourceStore } from '../src/storage/index.js';

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01, 0x02, 0x03]);

export async function makeTempDir(prefix = 'chart-relay-'): Promise<string> {
  return await fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function buildApp(
  overrides: Partial<Pick<ServerConfig, 'resourceFile' | 'resourceContentType' | 'allowedOrigins' | 'rateLimit'>> & {
    store?: ResourceStore;
  } = {},
) {
  const { store, ...config } = overrides;
  return createApp({
    config: {
      resourceFile: path.join(os.tmpdir(), 'chart-relay-missing', 'chart.png'),
      resourceContentType: null,
      allowedOrigins: ['http://localhost:5173'],
      rateLimit: { windowMs: 60_000, max: 1000 },
      ...config,
    },
    store,
  });
}
