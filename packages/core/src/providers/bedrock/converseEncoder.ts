/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../../debug/index.js';
import {
  ContentValidation,
  type ContentBlock,
  type IContent,
  type JsonObject,
  type JsonValue,
} from '../../services/history/IContent.js';
import { DEFAULT_MAX_TOKENS_FLOOR } from '../../config/bedrockConfig.js';
import { normalizeHistoryForConverse } from './historyNormalizer.js';
import type { ToolSpec } from './schemaConverter.js';
import type {
  ConverseContentBlock,
  ConverseInferenceConfig,
  ConverseMessage,
  ConverseRequest,
  ConverseTextContent,
  ConverseTool,
  ConverseToolChoice,
} from './converseTypes.js';

const logger = new DebugLogger('incident:bedrock:encoder');

export type ToolChoice = 'auto' | 'any' | 'none' | { name: string };

export interface GenerationOptions {
  maxTokens?: number;
  temperature?: number;
  topP?: number;
  topK?: number;
  stopSequences?: string[];
}

/**
 * Per-request state the caller carries between turns. Nothing of it is
 * kept inside the adapter.
 */
export interface ConverseRequestContext {
  /** Tools of the previous request, restored when a tool turn arrives without them. */
  previousTools?: readonly ToolSpec[];
}

export interface ConverseEncodeInput {
  modelId: string;
  messages: readonly IContent[];
  tools?: readonly ToolSpec[];
  /** Any value other than the known choices falls back to auto. */
  toolChoice?: ToolChoice | string | null;
  options?: GenerationOptions;
  context?: ConverseRequestContext;
  maxTokensFloor?: number;
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Tool arguments arrive parsed or as the raw JSON text the model produced.
 * Converse wants an object either way.
 */
export function parseToolInput(parameters: JsonValue | undefined): JsonObject {
  if (typeof parameters === 'string') {
    let parsed: JsonValue;
    try {
      parsed = JSON.parse(parameters);
    } catch {
      logger.debug(() => `Unparseable tool arguments, sending {}: ${parameters}`);
      return {};
    }
    return isJsonObject(parsed) ? parsed : {};
  }
  return isJsonObject(parameters) ? parameters : {};
}

export function encodeToolChoice(
  choice: ToolChoice | string | null | undefined,
): ConverseToolChoice {
  if (choice === 'any') {
    return { any: {} };
  }
  if (choice === 'none') {
    return { none: {} };
  }
  if (
    typeof choice === 'object' &&
    choice !== null &&
    typeof choice.name === 'string' &&
    choice.name.length > 0
  ) {
    return { tool: { name: choice.name } };
  }
  if (choice !== undefined && choice !== null && choice !== 'auto') {
    logger.debug(
      () => `Unrecognized tool choice ${JSON.stringify(choice)}, using auto`,
    );
  }
  return { auto: {} };
}

export function buildInferenceConfig(
  options: GenerationOptions = {},
  maxTokensFloor: number = DEFAULT_MAX_TOKENS_FLOOR,
): ConverseInferenceConfig {
  const requested = options.maxTokens;
  // NaN and non-finite values also fall back to the floor
  const usable =
    requested !== undefined &&
    Number.isFinite(requested) &&
    requested >= maxTokensFloor;
  const maxTokens = usable ? requested : maxTokensFloor;
  if (requested !== undefined && !usable) {
    logger.debug(
      () => `Raising maxTokens from ${requested} to floor ${maxTokensFloor}`,
    );
  }

  const config: ConverseInferenceConfig = { maxTokens };
  if (options.temperature !== undefined) {
    config.temperature = options.temperature;
  }
  if (options.topP !== undefined) {
    config.topP = options.topP;
  }
  if (options.stopSequences !== undefined) {
    config.stopSequences = [...options.stopSequences];
  }
  return config;
}

/**
 * One system block per non-blank system message, in order.
 */
export function encodeSystemPrompt(
  messages: readonly IContent[],
): ConverseTextContent[] {
  const system: ConverseTextContent[] = [];
  for (const message of messages) {
    if (message.speaker !== 'system') continue;
    const text = message.blocks
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('\n');
    if (text.trim().length > 0) {
      system.push({ text });
    }
  }
  return system;
}

function encodeBlock(block: ContentBlock): ConverseContentBlock | undefined {
  switch (block.type) {
    case 'text':
      return block.text.trim().length > 0 ? { text: block.text } : undefined;
    case 'tool_call':
      return {
        toolUse: {
          toolUseId: block.id,
          name: block.name,
          input: parseToolInput(block.parameters),
        },
      };
    case 'tool_response': {
      const onlyError = block.result === undefined && block.error !== undefined;
      return {
        toolResult: {
          toolUseId: block.callId,
          content: [{ text: block.result ?? block.error ?? '(no output)' }],
          ...(onlyError ? { status: 'error' as const } : {}),
        },
      };
    }
    default:
      return undefined;
  }
}

/**
 * Runs the history through the normalizer and maps what is left to
 * Converse messages. Messages left without content are dropped.
 */
export function encodeConverseMessages(
  history: readonly IContent[],
): ConverseMessage[] {
  const { messages } = normalizeHistoryForConverse(history);
  const encoded: ConverseMessage[] = [];

  for (const message of messages) {
    if (message.speaker !== 'human' && message.speaker !== 'ai') continue;
    const content = message.blocks
      .map(encodeBlock)
      .filter((block): block is ConverseContentBlock => block !== undefined);
    if (content.length === 0) continue;
    encoded.push({
      role: message.speaker === 'ai' ? 'assistant' : 'user',
      content,
    });
  }

  return encoded;
}

function encodeTools(tools: readonly ToolSpec[]): ConverseTool[] {
  return tools.map((tool) => ({
    toolSpec: {
      name: tool.name,
      description: tool.description,
      inputSchema: { json: tool.inputSchema },
    },
  }));
}

/**
 * Converse rejects a request whose history holds tool use when no tool
 * configuration is present, so a tool turn without tools gets the tools of
 * the previous request back.
 */
function resolveTools(input: ConverseEncodeInput): {
  tools: readonly ToolSpec[];
  toolChoice: ConverseEncodeInput['toolChoice'];
} {
  const tools = input.tools ?? [];
  if (tools.length > 0) {
    return { tools, toolChoice: input.toolChoice };
  }

  if (!ContentValidation.hasToolContent(input.messages)) {
    return { tools: [], toolChoice: input.toolChoice };
  }

  const previous = input.context?.previousTools ?? [];
  if (previous.length > 0) {
    logger.debug(
      () =>
        `History has tool content but no tools; restoring ${previous.length} previous tools`,
    );
    return { tools: previous, toolChoice: 'auto' };
  }

  logger.warn(
    () =>
      'History has tool content but no tools are available; Bedrock may reject the request',
  );
  return { tools: [], toolChoice: input.toolChoice };
}

export function encodeConverseRequest(
  input: ConverseEncodeInput,
): ConverseRequest {
  const { tools, toolChoice } = resolveTools(input);

  const request: ConverseRequest = {
    modelId: input.modelId,
    messages: encodeConverseMessages(input.messages),
    inferenceConfig: buildInferenceConfig(
      input.options,
      input.maxTokensFloor,
    ),
  };

  const system = encodeSystemPrompt(input.messages);
  if (system.length > 0) {
    request.system = system;
  }

  if (tools.length > 0) {
    request.toolConfig = {
      tools: encodeTools(tools),
      toolChoice: encodeToolChoice(toolChoice),
    };
  }

  if (input.options?.topK !== undefined) {
    request.additionalModelRequestFields = { top_k: input.options.topK };
  }

  logger.debug(
    () =>
      `Encoded request for ${input.modelId}: ${request.messages.length} messages, ` +
      `${system.length} system blocks, ${tools.length} tools, maxTokens=${request.inferenceConfig.maxTokens}`,
  );

  return request;
}
