/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { z } from 'zod';
import { APP_DIR, LOG_NAMESPACE_PREFIX } from '../utils/paths.js';
import type { DebugSettings } from './types.js';

const PartialDebugSettingsSchema = z
  .object({
    enabled: z.boolean(),
    namespaces: z.union([z.array(z.string()), z.record(z.unknown())]),
    level: z.string(),
    output: z.union([z.string(), z.object({ target: z.string() })]),
    redactPatterns: z.array(z.string()),
  })
  .partial();

const SettingsFileSchema = z
  .object({ debug: PartialDebugSettingsSchema.optional() })
  .passthrough();

/**
 * Merges debug settings from defaults, project config, user settings,
 * environment, CLI flags and ephemeral overrides (lowest to highest).
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private defaultConfig: DebugSettings;
  private projectConfig: Partial<DebugSettings> | null = null;
  private userConfig: Partial<DebugSettings> | null = null;
  private envConfig: Partial<DebugSettings> | null = null;
  private cliConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings;
  private listeners: Set<() => void> = new Set();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  private constructor() {
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'debug',
      output: { target: 'file' },
      redactPatterns: ['apiKey', 'token', 'password', 'secretAccessKey'],
    };
    this.mergedConfig = this.defaultConfig;
    this.loadConfigurations();
    this.mergeConfigurations();
  }

  loadConfigurations(): void {
    this.loadEnvironmentConfig();
    this.userConfig = this.loadConfigFile(
      path.join(os.homedir(), APP_DIR, 'settings.json'),
    );
    this.projectConfig = this.loadConfigFile(
      path.join(process.cwd(), APP_DIR, 'config.json'),
    );
  }

  private loadEnvironmentConfig(): void {
    this.envConfig = null;

    if (process.env.DEBUG) {
      // Only enable if DEBUG names our namespaces
      const namespaces = this.parseDebugEnv(process.env.DEBUG).filter(
        (ns) => ns.startsWith(LOG_NAMESPACE_PREFIX) || ns === '*',
      );
      if (namespaces.length > 0) {
        this.envConfig = { enabled: true, namespaces };
      }
    }

    if (process.env.INCIDENT_DEBUG) {
      this.envConfig = {
        enabled: true,
        namespaces: this.parseDebugEnv(process.env.INCIDENT_DEBUG),
      };
    }

    if (process.env.INCIDENT_DEBUG_LEVEL) {
      this.envConfig = {
        ...this.envConfig,
        level: process.env.INCIDENT_DEBUG_LEVEL,
      };
    }

    if (process.env.INCIDENT_DEBUG_OUTPUT) {
      this.envConfig = {
        ...this.envConfig,
        output: { target: process.env.INCIDENT_DEBUG_OUTPUT },
      };
    }
  }

  private loadConfigFile(configPath: string): Partial<DebugSettings> | null {
    if (!fs.existsSync(configPath)) {
      return null;
    }
    try {
      const parsed = SettingsFileSchema.safeParse(
        JSON.parse(fs.readFileSync(configPath, 'utf8')),
      );
      if (!parsed.success) {
        console.warn(
          `Ignoring invalid debug settings in ${configPath}:`,
          parsed.error.message,
        );
        return null;
      }
      return parsed.data.debug ?? null;
    } catch (error) {
      console.warn(`Failed to load debug settings from ${configPath}:`, error);
      return null;
    }
  }

  private mergeConfigurations(): void {
    const overrides = [
      this.projectConfig,
      this.userConfig,
      this.envConfig,
      this.cliConfig,
      this.ephemeralConfig,
    ];

    this.mergedConfig = overrides.reduce<DebugSettings>(
      (merged, config) => (config ? { ...merged, ...config } : merged),
      this.defaultConfig,
    );

    this.listeners.forEach((listener) => listener());
  }

  setCliConfig(config: Partial<DebugSettings>): void {
    this.cliConfig = config;
    this.mergeConfigurations();
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = null;
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getOutputTarget(): string {
    const output = this.mergedConfig.output;
    if (typeof output === 'string') {
      return output;
    }
    return output.target;
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private parseDebugEnv(value: string): string[] {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
}
