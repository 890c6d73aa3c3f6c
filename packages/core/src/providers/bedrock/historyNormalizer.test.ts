/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import { test } from '@fast-check/vitest';
import * as fc from 'fast-check';
import {
  normalizeHistory,
  normalizeHistoryForConverse,
} from './historyNormalizer.js';
import {
  ContentFactory,
  type ContentBlock,
  type IContent,
  type JsonValue,
  type Speaker,
} from '../../services/history/IContent.js';

const call = (
  id: string,
  name = 'f',
  parameters: JsonValue = {},
): ContentBlock =>
  ContentFactory.createToolCall(id, name, parameters);

const response = (callId: string, result = 'ok'): ContentBlock => ({
  type: 'tool_response',
  callId,
  result,
});

const text = (value: string): ContentBlock => ({ type: 'text', text: value });

const message = (speaker: Speaker, ...blocks: ContentBlock[]): IContent => ({
  speaker,
  blocks,
});

const idArb = fc.constantFrom('t1', 't2', 't3', 't4');

const blockArb: fc.Arbitrary<ContentBlock> = fc.oneof(
  fc.record({ type: fc.constant('text' as const), text: fc.string() }),
  fc.record({
    type: fc.constant('tool_call' as const),
    id: idArb,
    name: fc.constantFrom('get_pods', 'query_metrics'),
    parameters: fc.constantFrom<JsonValue>(
      {},
      { namespace: 'prod' },
      '{"window":"5m"}',
      'not json',
    ),
  }),
  fc.record({
    type: fc.constant('tool_response' as const),
    callId: idArb,
    result: fc.string(),
  }),
);

const historyArb = fc.array(
  fc.record({
    speaker: fc.constantFrom<Speaker>('system', 'human', 'ai', 'tool'),
    blocks: fc.array(blockArb, { maxLength: 4 }),
  }),
  { maxLength: 8 },
);

describe('normalizeHistoryForConverse', () => {
  it('drops a tool result whose call never happened', () => {
    const result = normalizeHistoryForConverse([
      message('ai', call('t1')),
      message('tool', response('t1'), response('t9')),
    ]);

    expect(result.messages).toEqual([
      message('ai', call('t1')),
      message('human', response('t1')),
    ]);
    expect(result.diagnostics).toEqual([
      {
        kind: 'orphaned_tool_result',
        messageIndex: 1,
        callId: 't9',
        detail: 'no earlier assistant tool call with this id',
      },
    ]);
  });

  it('renders a mixed tool message as user text', () => {
    const result = normalizeHistory([
      message('tool', call('t2', 'g'), response('t2', 'done')),
    ]);

    expect(result).toEqual([
      message(
        'human',
        text('[Tool Call: g (id: t2)]'),
        text('[Tool Result for: t2]\nOutput: done'),
      ),
    ]);
  });

  it('includes pretty-printed arguments and errors in rendered text', () => {
    const result = normalizeHistory([
      message('tool', call('t2', 'g', { service: 'api' }), {
        type: 'tool_response',
        callId: 't2',
        error: 'timeout',
      }),
    ]);

    expect(result).toEqual([
      message(
        'human',
        text('[Tool Call: g (id: t2)]\nInput: {\n  "service": "api"\n}'),
        text('[Tool Result for: t2]\nError: timeout'),
      ),
    ]);
  });

  it('keeps unmatched results first when splitting a mixed message', () => {
    const result = normalizeHistory([
      message('ai', call('t1')),
      message(
        'tool',
        text('sub-agent transcript'),
        call('t2', 'g'),
        response('t1', 'first'),
        response('t2', 'second'),
      ),
    ]);

    expect(result[1]).toEqual(
      message(
        'human',
        response('t1', 'first'),
        text('sub-agent transcript'),
        text('[Tool Call: g (id: t2)]'),
        text('[Tool Result for: t2]\nOutput: second'),
      ),
    );
  });

  it('moves tool results out of assistant messages and drops their later copies', () => {
    const result = normalizeHistoryForConverse([
      message('ai', call('t1'), response('t1')),
      message('tool', response('t1')),
      message('human', text('next')),
    ]);

    expect(result.messages).toEqual([
      message('ai', call('t1')),
      message('human', text('next')),
    ]);
    expect(result.diagnostics.map((d) => [d.kind, d.messageIndex])).toEqual([
      ['tool_result_dropped', 0],
      ['tool_result_dropped', 1],
      ['empty_message_dropped', 1],
    ]);
  });

  it('drops tool calls from user messages together with their results', () => {
    const result = normalizeHistory([
      message('human', text('check pods'), call('t3')),
      message('tool', response('t3')),
    ]);

    expect(result).toEqual([message('human', text('check pods'))]);
  });

  it('filters later results of internal tool pairs', () => {
    const result = normalizeHistoryForConverse([
      message('tool', call('t5'), response('t5')),
      message('tool', response('t5')),
    ]);

    expect(result.diagnostics.map((d) => d.kind)).toEqual([
      'internal_tool_pair',
      'mixed_content_split',
      'tool_call_to_text',
      'tool_result_to_text',
      'tool_result_dropped',
      'empty_message_dropped',
    ]);
    expect(result.messages).toHaveLength(1);
  });

  it('skips system messages', () => {
    const result = normalizeHistoryForConverse([
      ContentFactory.createSystemMessage('You investigate incidents.'),
      ContentFactory.createUserMessage('Why is checkout slow?'),
    ]);

    expect(result.messages).toEqual([
      ContentFactory.createUserMessage('Why is checkout slow?'),
    ]);
    expect(result.diagnostics[0]?.kind).toBe('system_message_skipped');
  });

  it('keeps message metadata on rewritten messages', () => {
    const result = normalizeHistory([
      ContentFactory.createToolResponse('t1', 'ok', undefined, {
        id: 'msg-1',
      }),
    ]);

    expect(result).toEqual([]);

    const kept = normalizeHistory([
      message('ai', call('t1')),
      ContentFactory.createToolResponse('t1', 'ok', undefined, {
        id: 'msg-2',
      }),
    ]);
    expect(kept[1]?.metadata).toEqual({ id: 'msg-2' });
  });

  test.prop([historyArb])('is idempotent', (history) => {
    const once = normalizeHistory(history);
    expect(normalizeHistory(once)).toEqual(once);
  });

  test.prop([historyArb])(
    'leaves no tool result without an earlier assistant call',
    (history) => {
      const output = normalizeHistory(history);
      output.forEach((content, index) => {
        for (const block of content.blocks) {
          if (block.type !== 'tool_response') continue;
          const earlierCall = output
            .slice(0, index)
            .some(
              (prior) =>
                prior.speaker === 'ai' &&
                prior.blocks.some(
                  (b) => b.type === 'tool_call' && b.id === block.callId,
                ),
            );
          expect(earlierCall).toBe(true);
        }
      });
    },
  );

  test.prop([historyArb])('keeps roles pure', (history) => {
    for (const content of normalizeHistory(history)) {
      expect(['human', 'ai']).toContain(content.speaker);
      const forbidden =
        content.speaker === 'ai' ? 'tool_response' : 'tool_call';
      expect(content.blocks.some((b) => b.type === forbidden)).toBe(false);
      expect(content.blocks.length).toBeGreaterThan(0);
    }
  });

  test.prop([historyArb])('never mutates its input', (history) => {
    const before = structuredClone(history);
    normalizeHistoryForConverse(history);
    expect(history).toEqual(before);
  });
});
