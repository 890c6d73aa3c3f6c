/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { DebugLogger } from './DebugLogger.js';
export { ConfigurationManager } from './ConfigurationManager.js';
export { FileOutput } from './FileOutput.js';
export type {
  DebugLevel,
  DebugOutputConfig,
  DebugSettings,
  LogEntry,
} from './types.js';
