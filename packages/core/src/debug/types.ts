/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export interface DebugOutputConfig {
  target: string;
}

export type DebugLevel = 'debug' | 'log' | 'warn' | 'error';

export interface DebugSettings {
  enabled: boolean;
  namespaces: string[] | Record<string, unknown>;
  level: string;
  output: DebugOutputConfig | string;
  redactPatterns: string[];
}

export interface LogEntry {
  timestamp: string;
  namespace: string;
  level: DebugLevel;
  message: string;
  args?: unknown[];
  runId: string;
  pid: number;
}
