/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Wire shapes of the Bedrock Converse API as this adapter produces and
 * consumes them. They are structurally compatible with the types of
 * `@aws-sdk/client-bedrock-runtime` so encoded requests can be handed to
 * the SDK and SDK events can be handed to the decoder.
 */

import type { JsonObject, JsonValue } from '../../services/history/IContent.js';

type Empty = Record<string, never>;

export type ConverseRole = 'user' | 'assistant';

export interface ConverseTextContent {
  text: string;
}

export interface ConverseToolUseContent {
  toolUse: {
    toolUseId: string;
    name: string;
    input: JsonValue;
  };
}

export interface ConverseToolResultContent {
  toolResult: {
    toolUseId: string;
    content: ConverseTextContent[];
    status?: 'success' | 'error';
  };
}

export type ConverseContentBlock =
  | ConverseTextContent
  | ConverseToolUseContent
  | ConverseToolResultContent;

export interface ConverseMessage {
  role: ConverseRole;
  content: ConverseContentBlock[];
}

export interface ConverseToolSpec {
  name: string;
  description: string;
  inputSchema: { json: JsonObject };
}

export interface ConverseTool {
  toolSpec: ConverseToolSpec;
}

export type ConverseToolChoice =
  | { auto: Empty }
  | { any: Empty }
  | { none: Empty }
  | { tool: { name: string } };

export interface ConverseToolConfig {
  tools: ConverseTool[];
  toolChoice: ConverseToolChoice;
}

export interface ConverseInferenceConfig {
  maxTokens: number;
  temperature?: number;
  topP?: number;
  stopSequences?: string[];
}

export interface ConverseRequest {
  modelId: string;
  messages: ConverseMessage[];
  system?: ConverseTextContent[];
  toolConfig?: ConverseToolConfig;
  inferenceConfig: ConverseInferenceConfig;
  additionalModelRequestFields?: JsonObject;
}

export interface ConverseUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

interface ExceptionPayload {
  message?: string;
}

/**
 * One event of a ConverseStream response. Exactly one member is set per
 * event.
 */
export interface ConverseStreamEvent {
  messageStart?: { role?: string };
  contentBlockStart?: {
    contentBlockIndex?: number;
    start?: { toolUse?: { toolUseId?: string; name?: string } };
  };
  contentBlockDelta?: {
    contentBlockIndex?: number;
    delta?: { text?: string; toolUse?: { input?: string } };
  };
  contentBlockStop?: { contentBlockIndex?: number };
  messageStop?: { stopReason?: string };
  metadata?: { usage?: ConverseUsage };
  internalServerException?: ExceptionPayload;
  modelStreamErrorException?: ExceptionPayload;
  validationException?: ExceptionPayload;
  throttlingException?: ExceptionPayload;
  serviceUnavailableException?: ExceptionPayload;
}

export interface ConverseResponseContentBlock {
  text?: string;
  toolUse?: { toolUseId?: string; name?: string; input?: unknown };
}

/**
 * Output of a single-shot Converse call.
 */
export interface ConverseResponse {
  output?: {
    message?: { role?: string; content?: ConverseResponseContentBlock[] };
  };
  stopReason?: string;
  usage?: ConverseUsage;
}
