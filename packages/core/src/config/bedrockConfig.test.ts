/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_TOKENS_FLOOR,
  loadBedrockConfig,
} from './bedrockConfig.js';
import { BedrockConfigError } from '../providers/errors.js';

describe('loadBedrockConfig', () => {
  it('applies defaults around the model id', () => {
    const config = loadBedrockConfig(
      { BEDROCK_MODEL_ID: 'anthropic.claude-test' },
      { dumpDirectory: '/tmp/dumps' },
    );

    expect(config).toEqual({
      modelId: 'anthropic.claude-test',
      region: 'us-east-1',
      maxTokensFloor: DEFAULT_MAX_TOKENS_FLOOR,
      maxAttempts: DEFAULT_MAX_ATTEMPTS,
      dumpMode: 'off',
      dumpDirectory: '/tmp/dumps',
    });
  });

  it('reads numeric and dump settings from the environment', () => {
    const config = loadBedrockConfig({
      BEDROCK_MODEL_ID: 'model',
      AWS_DEFAULT_REGION: 'eu-west-1',
      BEDROCK_MAX_TOKENS_FLOOR: '4096',
      BEDROCK_MAX_ATTEMPTS: '2',
      BEDROCK_DUMP: 'error',
      BEDROCK_DUMP_DIR: '/var/dumps',
    });

    expect(config.region).toBe('eu-west-1');
    expect(config.maxTokensFloor).toBe(4096);
    expect(config.maxAttempts).toBe(2);
    expect(config.dumpMode).toBe('error');
    expect(config.dumpDirectory).toBe('/var/dumps');
  });

  it('prefers AWS_REGION over AWS_DEFAULT_REGION', () => {
    const config = loadBedrockConfig({
      BEDROCK_MODEL_ID: 'model',
      AWS_REGION: 'us-west-2',
      AWS_DEFAULT_REGION: 'eu-west-1',
    });

    expect(config.region).toBe('us-west-2');
  });

  it('treats BEDROCK_DUMP=true as on', () => {
    expect(
      loadBedrockConfig({ BEDROCK_MODEL_ID: 'model', BEDROCK_DUMP: 'true' })
        .dumpMode,
    ).toBe('on');
  });

  it('lets overrides win over the environment', () => {
    const config = loadBedrockConfig(
      { BEDROCK_MODEL_ID: 'from-env', BEDROCK_MAX_ATTEMPTS: '7' },
      { modelId: 'from-override', maxAttempts: 1 },
    );

    expect(config.modelId).toBe('from-override');
    expect(config.maxAttempts).toBe(1);
  });

  it('rejects a missing model id', () => {
    expect(() => loadBedrockConfig({})).toThrow(BedrockConfigError);
  });

  it('lists every invalid field', () => {
    try {
      loadBedrockConfig({
        BEDROCK_MODEL_ID: 'model',
        BEDROCK_MAX_ATTEMPTS: '0',
        BEDROCK_DUMP: 'sometimes',
      });
      expect.fail('expected loadBedrockConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(BedrockConfigError);
      if (error instanceof BedrockConfigError) {
        expect(error.issues.map((issue) => issue.split(':')[0])).toEqual([
          'maxAttempts',
          'dumpMode',
        ]);
      }
    }
  });
});
