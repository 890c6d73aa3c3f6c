/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { DebugLogger } from '../debug/index.js';
import { BedrockConfigError } from '../providers/errors.js';
import { APP_DIR } from '../utils/paths.js';

const logger = new DebugLogger('incident:config');

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_MAX_TOKENS_FLOOR = 8192;
/** One initial call plus three retries. */
export const DEFAULT_MAX_ATTEMPTS = 4;

export const DumpModeSchema = z
  .enum(['off', 'on', 'error'])
  .describe('When to write request/response dumps: never, always, on error');

export type DumpMode = z.infer<typeof DumpModeSchema>;

/**
 * Schema for the Bedrock adapter settings
 */
export const BedrockConfigSchema = z.object({
  modelId: z
    .string()
    .trim()
    .min(1, 'modelId is required')
    .describe('Bedrock model or inference profile id'),
  region: z.string().trim().min(1).default(DEFAULT_REGION),
  maxTokensFloor: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_TOKENS_FLOOR)
    .describe('Lowest maxTokens ever sent to the model'),
  maxAttempts: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_MAX_ATTEMPTS)
    .describe('Total attempts per call, handed to the AWS SDK retry strategy'),
  dumpMode: DumpModeSchema.default('off'),
  dumpDirectory: z
    .string()
    .min(1)
    .default(path.join(os.homedir() || process.cwd(), APP_DIR, 'dumps')),
});

export type BedrockConfig = z.infer<typeof BedrockConfigSchema>;
export type BedrockConfigInput = z.input<typeof BedrockConfigSchema>;

type Env = Record<string, string | undefined>;

function fromEnv(env: Env): Env {
  const raw: Env = {
    modelId: env.BEDROCK_MODEL_ID,
    region: env.AWS_REGION ?? env.AWS_DEFAULT_REGION,
    maxTokensFloor: env.BEDROCK_MAX_TOKENS_FLOOR,
    maxAttempts: env.BEDROCK_MAX_ATTEMPTS,
    dumpDirectory: env.BEDROCK_DUMP_DIR,
  };
  const dump = env.BEDROCK_DUMP?.trim().toLowerCase();
  if (dump) {
    raw.dumpMode = dump === 'true' || dump === '1' ? 'on' : dump;
  }
  // Blank variables count as unset
  return Object.fromEntries(
    Object.entries(raw).filter(
      ([, value]) => value !== undefined && value !== '',
    ),
  );
}

/**
 * Resolves the adapter settings from environment variables, with explicit
 * overrides taking precedence.
 *
 * @throws BedrockConfigError when the merged settings fail validation
 */
export function loadBedrockConfig(
  env: Env = process.env,
  overrides: Partial<BedrockConfigInput> = {},
): BedrockConfig {
  const parsed = BedrockConfigSchema.safeParse({
    ...fromEnv(env),
    ...overrides,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`,
    );
    logger.error(() => `Bedrock configuration rejected: ${issues.join('; ')}`);
    throw new BedrockConfigError(issues);
  }

  logger.debug(
    () =>
      `Bedrock configuration: model=${parsed.data.modelId} region=${parsed.data.region} ` +
      `floor=${parsed.data.maxTokensFloor} attempts=${parsed.data.maxAttempts} dump=${parsed.data.dumpMode}`,
  );
  return parsed.data;
}
