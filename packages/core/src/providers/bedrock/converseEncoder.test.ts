/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  buildInferenceConfig,
  encodeConverseRequest,
  encodeSystemPrompt,
  encodeToolChoice,
  parseToolInput,
} from './converseEncoder.js';
import {
  ContentFactory,
  type IContent,
} from '../../services/history/IContent.js';
import type { ToolSpec } from './schemaConverter.js';

const getPods: ToolSpec = {
  name: 'get_pods',
  description: 'List pods',
  inputSchema: { type: 'object', properties: {} },
};

describe('encodeToolChoice', () => {
  it.each([
    ['auto', { auto: {} }],
    [undefined, { auto: {} }],
    [null, { auto: {} }],
    ['any', { any: {} }],
    ['none', { none: {} }],
    ['xyz', { auto: {} }],
    [{ name: 'get_pods' }, { tool: { name: 'get_pods' } }],
    [{ name: '' }, { auto: {} }],
  ])('maps %j', (choice, expected) => {
    expect(encodeToolChoice(choice)).toEqual(expected);
  });
});

describe('buildInferenceConfig', () => {
  it('raises an absent maxTokens to the floor', () => {
    expect(buildInferenceConfig({})).toEqual({ maxTokens: 8192 });
  });

  it('raises a low maxTokens to the floor', () => {
    expect(buildInferenceConfig({ maxTokens: 1000 }, 2048)).toEqual({
      maxTokens: 2048,
    });
  });

  it.each([[Number.NaN], [Number.POSITIVE_INFINITY]])(
    'replaces a maxTokens of %s with the floor',
    (maxTokens) => {
      expect(buildInferenceConfig({ maxTokens }, 4096)).toEqual({
        maxTokens: 4096,
      });
    },
  );

  it('keeps a maxTokens above the floor and copies set options only', () => {
    expect(
      buildInferenceConfig({
        maxTokens: 10000,
        temperature: 0,
        stopSequences: ['</answer>'],
      }),
    ).toEqual({ maxTokens: 10000, temperature: 0, stopSequences: ['</answer>'] });
  });
});

describe('parseToolInput', () => {
  it('parses JSON text', () => {
    expect(parseToolInput('{"namespace":"prod"}')).toEqual({
      namespace: 'prod',
    });
  });

  it.each([['not json'], ['[1,2]'], [undefined], [null], [42]])(
    'sends {} for %j',
    (value) => {
      expect(parseToolInput(value)).toEqual({});
    },
  );
});

describe('encodeSystemPrompt', () => {
  it('keeps one block per non-blank system message in order', () => {
    expect(
      encodeSystemPrompt([
        ContentFactory.createSystemMessage('first'),
        ContentFactory.createUserMessage('hello'),
        ContentFactory.createSystemMessage('   '),
        ContentFactory.createSystemMessage('second'),
      ]),
    ).toEqual([{ text: 'first' }, { text: 'second' }]);
  });
});

describe('encodeConverseRequest', () => {
  const history: IContent[] = [
    ContentFactory.createSystemMessage('You investigate incidents.'),
    ContentFactory.createUserMessage('Which pods are failing?'),
    ContentFactory.createAIMessage([
      { type: 'text', text: '' },
      ContentFactory.createToolCall('t1', 'get_pods', '{"namespace":"prod"}'),
    ]),
    ContentFactory.createToolResponse('t1', 'api-7 CrashLoopBackOff'),
    ContentFactory.createToolResponse('t9', 'stale'),
  ];

  it('encodes messages, system, tools and options', () => {
    const request = encodeConverseRequest({
      modelId: 'anthropic.claude-test',
      messages: history,
      tools: [getPods],
      toolChoice: 'any',
      options: { temperature: 0.2, topK: 40 },
    });

    expect(request).toEqual({
      modelId: 'anthropic.claude-test',
      system: [{ text: 'You investigate incidents.' }],
      messages: [
        { role: 'user', content: [{ text: 'Which pods are failing?' }] },
        {
          role: 'assistant',
          content: [
            {
              toolUse: {
                toolUseId: 't1',
                name: 'get_pods',
                input: { namespace: 'prod' },
              },
            },
          ],
        },
        {
          role: 'user',
          content: [
            {
              toolResult: {
                toolUseId: 't1',
                content: [{ text: 'api-7 CrashLoopBackOff' }],
              },
            },
          ],
        },
      ],
      toolConfig: {
        tools: [
          {
            toolSpec: {
              name: 'get_pods',
              description: 'List pods',
              inputSchema: { json: { type: 'object', properties: {} } },
            },
          },
        ],
        toolChoice: { any: {} },
      },
      inferenceConfig: { maxTokens: 8192, temperature: 0.2 },
      additionalModelRequestFields: { top_k: 40 },
    });
  });

  it('marks error-only tool results', () => {
    const request = encodeConverseRequest({
      modelId: 'model',
      messages: [
        ContentFactory.createAIMessage([
          ContentFactory.createToolCall('t1', 'get_pods'),
        ]),
        ContentFactory.createToolResponse('t1', undefined, 'forbidden'),
      ],
      tools: [getPods],
    });

    expect(request.messages[1]).toEqual({
      role: 'user',
      content: [
        {
          toolResult: {
            toolUseId: 't1',
            content: [{ text: 'forbidden' }],
            status: 'error',
          },
        },
      ],
    });
  });

  it('omits tool configuration when there are no tools', () => {
    const request = encodeConverseRequest({
      modelId: 'model',
      messages: [ContentFactory.createUserMessage('hi')],
      tools: [],
    });

    expect(request.toolConfig).toBeUndefined();
    expect(request.system).toBeUndefined();
    expect(request.additionalModelRequestFields).toBeUndefined();
  });

  it('restores previous tools with auto choice for a tool turn', () => {
    const request = encodeConverseRequest({
      modelId: 'model',
      messages: history,
      toolChoice: 'none',
      context: { previousTools: [getPods] },
    });

    expect(request.toolConfig?.tools.map((t) => t.toolSpec.name)).toEqual([
      'get_pods',
    ]);
    expect(request.toolConfig?.toolChoice).toEqual({ auto: {} });
  });

  it('does not restore tools for a history without tool content', () => {
    const request = encodeConverseRequest({
      modelId: 'model',
      messages: [ContentFactory.createUserMessage('hi')],
      context: { previousTools: [getPods] },
    });

    expect(request.toolConfig).toBeUndefined();
  });

  it('uses the configured max tokens floor', () => {
    const request = encodeConverseRequest({
      modelId: 'model',
      messages: [ContentFactory.createUserMessage('hi')],
      options: { maxTokens: 100 },
      maxTokensFloor: 512,
    });

    expect(request.inferenceConfig).toEqual({ maxTokens: 512 });
  });

  it('does not touch the caller history', () => {
    const before = structuredClone(history);
    encodeConverseRequest({ modelId: 'model', messages: history });
    expect(history).toEqual(before);
  });
});
