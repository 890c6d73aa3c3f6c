/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  ContentBlock,
  ContentMetadata,
  IContent,
  JsonValue,
} from '../../services/history/IContent.js';
import { parseToolInput } from './converseEncoder.js';
import { mapStopReason, toUsageStats } from './converseStreamDecoder.js';
import type { ConverseResponse } from './converseTypes.js';

function toToolInput(input: unknown): JsonValue {
  if (typeof input === 'string') {
    return parseToolInput(input);
  }
  // Round-trip through JSON to drop anything that is not plain data
  try {
    return parseToolInput(JSON.stringify(input ?? {}));
  } catch {
    return {};
  }
}

/**
 * Maps a single-shot Converse response to the final assistant message,
 * with the same block, finish-reason and usage mapping as the streaming
 * decoder.
 */
export function parseConverseResponse(
  response: ConverseResponse,
  model?: string,
): IContent {
  const blocks: ContentBlock[] = [];

  for (const block of response.output?.message?.content ?? []) {
    if (block.text !== undefined && block.text.length > 0) {
      blocks.push({ type: 'text', text: block.text });
    } else if (block.toolUse) {
      blocks.push({
        type: 'tool_call',
        id: block.toolUse.toolUseId ?? '',
        name: block.toolUse.name ?? '',
        parameters: toToolInput(block.toolUse.input),
      });
    }
  }

  const metadata: ContentMetadata = {
    finishReason: mapStopReason(response.stopReason),
  };
  if (response.usage) {
    metadata.usage = toUsageStats(response.usage);
  }
  if (model) {
    metadata.model = model;
  }

  return { speaker: 'ai', blocks, metadata };
}
