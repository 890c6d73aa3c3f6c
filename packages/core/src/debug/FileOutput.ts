/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { APP_DIR } from '../utils/paths.js';
import type { LogEntry } from './types.js';

const LOG_FILE_DATE_LENGTH = 10;
const MAX_FILE_SIZE = 10 * 1024 * 1024;
const MAX_QUEUE_SIZE = 1000;
const BATCH_SIZE = 50;
const FLUSH_INTERVAL_MS = 1000;

/**
 * Batches log entries and appends them as JSON lines under the debug
 * directory, rotating by size and by day.
 */
export class FileOutput {
  private static instance: FileOutput | undefined;
  private debugDir: string;
  private currentLogFile: string;
  private writeQueue: LogEntry[] = [];
  private isWriting = false;
  private disposed = false;
  private flushTimeout: NodeJS.Timeout | null = null;
  private debugRunId: string;

  private constructor() {
    const home = homedir();
    this.debugDir =
      process.env.INCIDENT_DEBUG_DIR ??
      join(home || process.cwd(), APP_DIR, 'debug');
    this.debugRunId = process.env.INCIDENT_DEBUG_RUN_ID || String(process.pid);
    this.currentLogFile = this.generateLogFileName();
  }

  get runId(): string {
    return this.debugRunId;
  }

  static getInstance(): FileOutput {
    if (!FileOutput.instance) {
      FileOutput.instance = new FileOutput();
    }
    return FileOutput.instance;
  }

  async write(entry: LogEntry): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.startFlushTimer();
    this.writeQueue.push(entry);

    if (this.writeQueue.length > MAX_QUEUE_SIZE) {
      this.writeQueue = this.writeQueue.slice(-MAX_QUEUE_SIZE);
    }

    if (this.writeQueue.length >= BATCH_SIZE || !this.isWriting) {
      await this.flushQueue();
    }
  }

  async dispose(): Promise<void> {
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
      this.flushTimeout = null;
    }
    await this.flushQueue();
    this.disposed = true;
  }

  private startFlushTimer(): void {
    if (this.disposed || this.flushTimeout) {
      return;
    }

    this.flushTimeout = setTimeout(() => {
      this.flushTimeout = null;
      void this.flushQueue().then(() => {
        if (this.writeQueue.length > 0) {
          this.startFlushTimer();
        }
      });
    }, FLUSH_INTERVAL_MS);
    this.flushTimeout.unref();
  }

  private async flushQueue(): Promise<void> {
    if (this.isWriting || this.writeQueue.length === 0 || this.disposed) {
      return;
    }

    this.isWriting = true;
    const entriesToWrite = this.writeQueue.splice(0, BATCH_SIZE);

    try {
      await fs.mkdir(this.debugDir, { recursive: true, mode: 0o700 });
      await this.checkFileRotation();

      const jsonlData =
        entriesToWrite.map((entry) => JSON.stringify(entry)).join('\n') + '\n';

      await fs.appendFile(this.currentLogFile, jsonlData, {
        encoding: 'utf8',
        mode: 0o600,
      });
    } catch (error) {
      console.error('FileOutput: Failed to write log entries:', error);

      // Requeue once; drop when the backlog is already large
      if (this.writeQueue.length < MAX_QUEUE_SIZE / 2) {
        this.writeQueue.unshift(...entriesToWrite);
      }
    } finally {
      this.isWriting = false;
    }
  }

  private async checkFileRotation(): Promise<void> {
    let stats;
    try {
      stats = await fs.stat(this.currentLogFile);
    } catch {
      // Not created yet
      return;
    }

    if (
      stats.size >= MAX_FILE_SIZE ||
      stats.birthtime.toDateString() !== new Date().toDateString()
    ) {
      this.currentLogFile = this.generateLogFileName();
    }
  }

  private generateLogFileName(): string {
    const now = new Date();
    const datePart = now.toISOString().slice(0, LOG_FILE_DATE_LENGTH);
    const timePart = now.toTimeString().slice(0, 8).replace(/:/g, '-');
    return join(
      this.debugDir,
      `incident-debug-${this.debugRunId}-${datePart}-${timePart}.jsonl`,
    );
  }
}
