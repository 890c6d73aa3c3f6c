/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { DebugLogger } from '../../debug/index.js';
import type { DumpMode } from '../../config/bedrockConfig.js';

const logger = new DebugLogger('incident:dumps');

const SENSITIVE_KEY = /api[-_]?key|authorization|password|secret|token$/i;

export type { DumpMode };

/**
 * Everything known about one model call, written as a single JSON file.
 */
export interface DumpData {
  requestId: string;
  modelId: string;
  timestamp: string;
  /** The caller's history before normalization. */
  input?: unknown;
  /** The request as sent to Bedrock. */
  request?: unknown;
  response?: unknown;
  error?: string;
}

/**
 * Builds an id like `0003_20251019_142501_123` from a per-provider call
 * counter and the wall clock. The id is also the dump file name.
 */
export function createRequestId(sequence: number, now: Date = new Date()): string {
  const iso = now.toISOString();
  const date = iso.slice(0, 10).replace(/-/g, '');
  const time = iso.slice(11, 19).replace(/:/g, '');
  const millis = iso.slice(20, 23);
  return `${String(sequence).padStart(4, '0')}_${date}_${time}_${millis}`;
}

/**
 * Returns a plain-data copy of `value` with credential-looking keys
 * replaced by `[REDACTED]`.
 */
export function redactSensitiveData(value: unknown): unknown {
  if (value === undefined) {
    return undefined;
  }
  const text = JSON.stringify(value);
  if (text === undefined) {
    return undefined;
  }
  const redacted: unknown = JSON.parse(text, (key: string, entry: unknown) =>
    key && SENSITIVE_KEY.test(key) ? '[REDACTED]' : entry,
  );
  return redacted;
}

/**
 * Writes the dump into `directory` and returns the file path.
 */
export async function dumpContext(
  data: DumpData,
  directory: string,
): Promise<string> {
  try {
    await fs.mkdir(directory, { recursive: true });

    const dumpData: DumpData = {
      ...data,
      input: redactSensitiveData(data.input),
      request: redactSensitiveData(data.request),
      response: redactSensitiveData(data.response),
    };

    const filepath = path.join(directory, `${data.requestId}.json`);
    await fs.writeFile(filepath, JSON.stringify(dumpData, null, 2), 'utf-8');

    logger.debug(() => `Context dumped to: ${filepath}`);
    return filepath;
  } catch (error) {
    logger.error(() => `Failed to dump context: ${error}`);
    throw error;
  }
}

/**
 * Checks if dumping should occur based on mode and error status
 */
export function shouldDump(
  mode: DumpMode | undefined,
  isError: boolean,
): boolean {
  if (!mode || mode === 'off') {
    return false;
  }
  if (mode === 'on') {
    return true;
  }
  return isError;
}
