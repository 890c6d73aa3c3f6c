/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import { ConfigurationManager } from './ConfigurationManager.js';
import { FileOutput } from './FileOutput.js';
import type { DebugLevel, LogEntry } from './types.js';

const LEVEL_ORDER: Record<DebugLevel, number> = {
  debug: 0,
  log: 1,
  warn: 2,
  error: 3,
};

function isDebugLevel(value: string): value is DebugLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

type LogMessage = string | (() => string);

/**
 * Namespaced logger. Messages may be passed as thunks so nothing is
 * formatted while the namespace is disabled.
 */
export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private debugInstance: Debugger;
  private _namespace: string;
  private _configManager: ConfigurationManager;
  private _fileOutput: FileOutput;
  private _enabled: boolean;
  private _level: DebugLevel = 'debug';
  private boundOnConfigChange: () => void;

  /**
   * Returns the shared logger for a namespace, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger._configManager.unsubscribe(logger.boundOnConfigChange);
    }
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    this._configManager = ConfigurationManager.getInstance();
    this._fileOutput = FileOutput.getInstance();
    this._enabled = this.checkEnabled();
    this._level = this.configuredLevel();
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
  }

  get level(): DebugLevel {
    return this._level;
  }

  set level(value: DebugLevel) {
    this._level = value;
  }

  get fileOutput(): FileOutput {
    return this._fileOutput;
  }

  log(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('log', messageOrFn, args);
  }

  debug(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  warn(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: LogMessage, ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  private write(
    level: DebugLevel,
    messageOrFn: LogMessage,
    args: unknown[],
  ): void {
    if (!this._enabled || LEVEL_ORDER[level] < LEVEL_ORDER[this._level]) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    message = this.redactSensitive(message);

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      namespace: this._namespace,
      level,
      message,
      args: args.length > 0 ? args : undefined,
      runId: this._fileOutput.runId,
      pid: process.pid,
    };

    const target = this._configManager.getOutputTarget();
    if (target.includes('file')) {
      void this._fileOutput.write(logEntry);
    }

    if (target.includes('stderr')) {
      this.debugInstance(message, ...args);
    }
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }

    const namespaces = Array.isArray(config.namespaces)
      ? config.namespaces
      : Object.keys(config.namespaces);

    return namespaces.some((pattern) =>
      this.matchesPattern(this._namespace, pattern),
    );
  }

  private configuredLevel(): DebugLevel {
    const level = this._configManager.getEffectiveConfig().level;
    return isDebugLevel(level) ? level : 'debug';
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }

    if (pattern.includes('*')) {
      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');
      return new RegExp(`^${regexPattern}$`).test(namespace);
    }

    return false;
  }

  private redactSensitive(message: string): string {
    let result = message;
    for (const pattern of this._configManager.getRedactPatterns()) {
      const regex = new RegExp(`${pattern}["']?:\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }
    return result;
  }

  private onConfigChange(): void {
    this._enabled = this.checkEnabled();
    this._level = this.configuredLevel();
  }

  async dispose(): Promise<void> {
    this._configManager.unsubscribe(this.boundOnConfigChange);
    if (DebugLogger.instances.get(this._namespace) === this) {
      DebugLogger.instances.delete(this._namespace);
    }
    await this._fileOutput.dispose();
  }
}
