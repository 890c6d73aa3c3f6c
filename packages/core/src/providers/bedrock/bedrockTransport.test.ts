/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { toSdkConverseInput } from './bedrockTransport.js';
import type { ConverseRequest } from './converseTypes.js';

const base: ConverseRequest = {
  modelId: 'model',
  messages: [{ role: 'user', content: [{ text: 'hi' }] }],
  inferenceConfig: { maxTokens: 8192 },
};

const tools = [
  {
    toolSpec: {
      name: 'get_pods',
      description: 'List pods',
      inputSchema: { json: { type: 'object', properties: {} } },
    },
  },
];

describe('toSdkConverseInput', () => {
  it('passes a request without tools through', () => {
    expect(toSdkConverseInput(base)).toEqual(base);
  });

  it('sends the "none" tool choice as auto', () => {
    const input = toSdkConverseInput({
      ...base,
      toolConfig: { tools, toolChoice: { none: {} } },
    });

    expect(input.toolConfig).toEqual({ tools, toolChoice: { auto: {} } });
  });

  it('keeps other tool choices', () => {
    const input = toSdkConverseInput({
      ...base,
      toolConfig: { tools, toolChoice: { tool: { name: 'get_pods' } } },
    });

    expect(input.toolConfig?.toolChoice).toEqual({
      tool: { name: 'get_pods' },
    });
  });
});
