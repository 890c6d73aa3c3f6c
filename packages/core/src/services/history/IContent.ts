/**
 * Copyright 2025 Vybestack LLC
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *   http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

/**
 * Universal content representation that is provider-agnostic.
 * All conversation content is represented as blocks within a speaker's turn.
 */
export interface IContent {
  /**
   * Who is speaking in this content
   * - 'system': Instructions for the model, never part of the turn sequence
   * - 'human': The user
   * - 'ai': The AI assistant
   * - 'tool': A tool/function outcome (possibly a replayed sub-conversation)
   */
  readonly speaker: Speaker;

  /**
   * Ordered content blocks that make up this message.
   */
  readonly blocks: readonly ContentBlock[];

  /**
   * Optional metadata for the content
   */
  readonly metadata?: ContentMetadata;
}

export type Speaker = 'system' | 'human' | 'ai' | 'tool';

/**
 * Why the model stopped generating.
 */
export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'content_filter';

/**
 * Metadata associated with content
 */
export interface ContentMetadata {
  /** When this content was created */
  timestamp?: number;

  /** Which model generated this (for AI responses) */
  model?: string;

  /** Token usage statistics */
  usage?: UsageStats;

  /** Unique identifier for this content */
  id?: string;

  /** Provider that generated this content */
  provider?: string;

  /** Terminal classification of a response, set on the final update */
  finishReason?: FinishReason;

  /** Whether this content is synthetic (auto-generated) */
  synthetic?: boolean;

  /** Reason for synthetic content generation */
  reason?: string;
}

export interface UsageStats {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Union type of all possible content blocks
 */
export type ContentBlock = TextBlock | ToolCallBlock | ToolResponseBlock;

/**
 * Regular text content
 */
export interface TextBlock {
  readonly type: 'text';
  readonly text: string;
}

/**
 * AI calling a tool/function
 */
export interface ToolCallBlock {
  readonly type: 'tool_call';

  /** Unique identifier for this tool call */
  readonly id: string;

  /** Name of the tool being called */
  readonly name: string;

  /**
   * Arguments for the tool. Some producers hand over the raw JSON string
   * the model emitted instead of the parsed value.
   */
  readonly parameters: JsonValue;
}

/**
 * Outcome of executing a tool call
 */
export interface ToolResponseBlock {
  readonly type: 'tool_response';

  /** References the ToolCallBlock.id this is responding to */
  readonly callId: string;

  /** The tool that generated this response, when known */
  readonly toolName?: string;

  /** Rendered result of the tool */
  readonly result?: string;

  /** Error message if the tool call failed */
  readonly error?: string;
}

/**
 * Helper to create IContent instances
 */
export const ContentFactory = {
  createSystemMessage: (text: string): IContent => ({
    speaker: 'system',
    blocks: [{ type: 'text', text }],
  }),

  createUserMessage: (text: string, metadata?: ContentMetadata): IContent => ({
    speaker: 'human',
    blocks: [{ type: 'text', text }],
    metadata,
  }),

  createAIMessage: (
    blocks: ContentBlock[],
    metadata?: ContentMetadata,
  ): IContent => ({
    speaker: 'ai',
    blocks,
    metadata,
  }),

  createToolCall: (
    id: string,
    name: string,
    parameters: JsonValue = {},
  ): ToolCallBlock => ({
    type: 'tool_call',
    id,
    name,
    parameters,
  }),

  createToolResponse: (
    callId: string,
    result?: string,
    error?: string,
    metadata?: ContentMetadata,
  ): IContent => ({
    speaker: 'tool',
    blocks: [
      {
        type: 'tool_response',
        callId,
        result,
        error,
      },
    ],
    metadata,
  }),
};

/**
 * Validation helpers
 */
export const ContentValidation = {
  /**
   * Check if any message carries tool calls or tool results
   */
  hasToolContent: (history: readonly IContent[]): boolean =>
    history.some((content) =>
      content.blocks.some(
        (block) => block.type === 'tool_call' || block.type === 'tool_response',
      ),
    ),
};
