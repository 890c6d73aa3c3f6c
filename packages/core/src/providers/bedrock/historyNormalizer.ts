/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../../debug/index.js';
import type {
  ContentBlock,
  IContent,
  JsonValue,
  TextBlock,
  ToolCallBlock,
  ToolResponseBlock,
} from '../../services/history/IContent.js';

const logger = new DebugLogger('incident:bedrock:history');

export type NormalizationDiagnosticKind =
  | 'system_message_skipped'
  | 'internal_tool_pair'
  | 'mixed_content_split'
  | 'tool_call_to_text'
  | 'tool_result_to_text'
  | 'tool_result_dropped'
  | 'tool_call_dropped'
  | 'empty_message_dropped'
  | 'orphaned_tool_result';

/**
 * Record of a block or message the normalizer removed or rewrote.
 * `messageIndex` always refers to the position in the input history.
 */
export interface NormalizationDiagnostic {
  readonly kind: NormalizationDiagnosticKind;
  readonly messageIndex: number;
  readonly callId?: string;
  readonly detail: string;
}

export interface NormalizedHistory {
  readonly messages: IContent[];
  readonly diagnostics: NormalizationDiagnostic[];
}

interface TrackedMessage {
  readonly content: IContent;
  readonly sourceIndex: number;
}

function copyBlock<T extends ContentBlock>(block: T): T {
  return { ...block };
}

function withBlocks(message: IContent, blocks: ContentBlock[]): IContent {
  return message.metadata
    ? { speaker: message.speaker, blocks, metadata: { ...message.metadata } }
    : { speaker: message.speaker, blocks };
}

function isEmptyArguments(parameters: JsonValue | undefined): boolean {
  if (parameters === undefined || parameters === null || parameters === '') {
    return true;
  }
  if (Array.isArray(parameters)) {
    return parameters.length === 0;
  }
  if (typeof parameters === 'object') {
    return Object.keys(parameters).length === 0;
  }
  return false;
}

function renderArguments(parameters: JsonValue): string {
  if (typeof parameters === 'string') {
    try {
      return JSON.stringify(JSON.parse(parameters), null, 2);
    } catch {
      return parameters;
    }
  }
  return JSON.stringify(parameters, null, 2);
}

export function renderToolCallText(call: ToolCallBlock): string {
  let text = `[Tool Call: ${call.name} (id: ${call.id})]`;
  if (!isEmptyArguments(call.parameters)) {
    text += `\nInput: ${renderArguments(call.parameters)}`;
  }
  return text;
}

export function renderToolResultText(response: ToolResponseBlock): string {
  let text = `[Tool Result for: ${response.callId}]`;
  if (response.result !== undefined) {
    text += `\nOutput: ${response.result}`;
  }
  if (response.error !== undefined) {
    text += `\nError: ${response.error}`;
  }
  return text;
}

/**
 * Ids used by both a tool_call and a tool_response inside one tool
 * message. Those calls were resolved before the turn was recorded.
 */
function findInternalToolPairs(
  history: readonly IContent[],
  diagnostics: NormalizationDiagnostic[],
): Set<string> {
  const internal = new Set<string>();

  history.forEach((message, messageIndex) => {
    if (message.speaker !== 'tool') {
      return;
    }
    const callIds = new Set<string>();
    const responseIds = new Set<string>();
    for (const block of message.blocks) {
      if (block.type === 'tool_call') {
        callIds.add(block.id);
      } else if (block.type === 'tool_response') {
        responseIds.add(block.callId);
      }
    }
    for (const id of callIds) {
      if (responseIds.has(id)) {
        internal.add(id);
        diagnostics.push({
          kind: 'internal_tool_pair',
          messageIndex,
          callId: id,
          detail: 'tool call and its result recorded in the same tool message',
        });
      }
    }
  });

  return internal;
}

/**
 * A tool message carrying both calls and results cannot be sent as either
 * role, so the calls (and the results paired with them) become text.
 */
function splitMixedContent(
  message: IContent,
  messageIndex: number,
  diagnostics: NormalizationDiagnostic[],
): IContent {
  const calls = message.blocks.filter(
    (block): block is ToolCallBlock => block.type === 'tool_call',
  );
  const responses = message.blocks.filter(
    (block): block is ToolResponseBlock => block.type === 'tool_response',
  );
  const texts = message.blocks.filter(
    (block): block is TextBlock => block.type === 'text',
  );
  const callIds = new Set(calls.map((call) => call.id));

  const unmatched: ToolResponseBlock[] = [];
  const paired: ToolResponseBlock[] = [];
  for (const response of responses) {
    if (callIds.has(response.callId)) {
      paired.push(response);
    } else {
      unmatched.push(copyBlock(response));
    }
  }

  diagnostics.push({
    kind: 'mixed_content_split',
    messageIndex,
    detail: `${calls.length} tool calls, ${paired.length} paired and ${unmatched.length} unmatched tool results`,
  });

  const callTexts: TextBlock[] = calls.map((call) => {
    diagnostics.push({
      kind: 'tool_call_to_text',
      messageIndex,
      callId: call.id,
      detail: `tool call ${call.name} rendered as text`,
    });
    return { type: 'text', text: renderToolCallText(call) };
  });

  const resultTexts: TextBlock[] = paired.map((response) => {
    diagnostics.push({
      kind: 'tool_result_to_text',
      messageIndex,
      callId: response.callId,
      detail: 'paired tool result rendered as text',
    });
    return { type: 'text', text: renderToolResultText(response) };
  });

  return {
    ...withBlocks(message, [
      ...unmatched,
      ...texts.map(copyBlock),
      ...callTexts,
      ...resultTexts,
    ]),
    speaker: 'human',
  };
}

function filterByRole(
  message: IContent,
  messageIndex: number,
  filteredCallIds: Set<string>,
  internalCallIds: ReadonlySet<string>,
  diagnostics: NormalizationDiagnostic[],
): IContent {
  const speaker = message.speaker === 'tool' ? 'human' : message.speaker;
  const kept: ContentBlock[] = [];

  for (const block of message.blocks) {
    if (speaker === 'ai') {
      if (block.type === 'tool_response') {
        filteredCallIds.add(block.callId);
        diagnostics.push({
          kind: 'tool_result_dropped',
          messageIndex,
          callId: block.callId,
          detail: 'tool result inside an assistant message',
        });
        continue;
      }
      kept.push(copyBlock(block));
      continue;
    }

    if (block.type === 'tool_call') {
      filteredCallIds.add(block.id);
      diagnostics.push({
        kind: 'tool_call_dropped',
        messageIndex,
        callId: block.id,
        detail: internalCallIds.has(block.id)
          ? 'internal tool call inside a user message'
          : 'tool call inside a user message',
      });
      continue;
    }
    if (block.type === 'tool_response' && filteredCallIds.has(block.callId)) {
      diagnostics.push({
        kind: 'tool_result_dropped',
        messageIndex,
        callId: block.callId,
        detail: 'result of a filtered tool call',
      });
      continue;
    }
    kept.push(copyBlock(block));
  }

  return { ...withBlocks(message, kept), speaker };
}

function eliminateOrphans(
  messages: readonly TrackedMessage[],
  diagnostics: NormalizationDiagnostic[],
): IContent[] {
  const available = new Set<string>();
  const result: IContent[] = [];

  for (const { content, sourceIndex } of messages) {
    if (content.speaker === 'ai') {
      for (const block of content.blocks) {
        if (block.type === 'tool_call') {
          available.add(block.id);
        }
      }
      result.push(content);
      continue;
    }

    if (content.speaker !== 'human') {
      result.push(content);
      continue;
    }

    const kept = content.blocks.filter((block) => {
      if (block.type !== 'tool_response' || available.has(block.callId)) {
        return true;
      }
      diagnostics.push({
        kind: 'orphaned_tool_result',
        messageIndex: sourceIndex,
        callId: block.callId,
        detail: 'no earlier assistant tool call with this id',
      });
      return false;
    });

    if (kept.length === 0) {
      diagnostics.push({
        kind: 'empty_message_dropped',
        messageIndex: sourceIndex,
        detail: 'message held only orphaned tool results',
      });
      continue;
    }
    result.push(
      kept.length === content.blocks.length
        ? content
        : withBlocks(content, kept),
    );
  }

  return result;
}

/**
 * Rewrites a conversation so that it satisfies the Converse pairing rules:
 * tool messages become user turns, tool calls only appear in assistant
 * turns, tool results only in user turns, and every tool result follows an
 * assistant tool call with the same id. System messages are skipped; they
 * travel in the request's `system` field.
 *
 * Never throws and never mutates the input. Every removal or rewrite is
 * reported in `diagnostics`.
 */
export function normalizeHistoryForConverse(
  history: readonly IContent[],
): NormalizedHistory {
  const diagnostics: NormalizationDiagnostic[] = [];
  const internalCallIds = findInternalToolPairs(history, diagnostics);
  const filteredCallIds = new Set<string>(internalCallIds);
  const perMessage: TrackedMessage[] = [];

  history.forEach((message, messageIndex) => {
    if (message.speaker === 'system') {
      diagnostics.push({
        kind: 'system_message_skipped',
        messageIndex,
        detail: 'system text belongs in the system field',
      });
      return;
    }

    const isMixed =
      message.speaker === 'tool' &&
      message.blocks.some((block) => block.type === 'tool_call') &&
      message.blocks.some((block) => block.type === 'tool_response');

    const rewritten = isMixed
      ? splitMixedContent(message, messageIndex, diagnostics)
      : filterByRole(
          message,
          messageIndex,
          filteredCallIds,
          internalCallIds,
          diagnostics,
        );

    if (rewritten.blocks.length === 0) {
      diagnostics.push({
        kind: 'empty_message_dropped',
        messageIndex,
        detail: `${message.speaker} message empty after filtering`,
      });
      return;
    }
    perMessage.push({ content: rewritten, sourceIndex: messageIndex });
  });

  const messages = eliminateOrphans(perMessage, diagnostics);

  if (diagnostics.length > 0) {
    logger.debug(
      () =>
        `Normalized ${history.length} messages into ${messages.length}: ` +
        diagnostics
          .map(
            (d) =>
              `#${d.messageIndex} ${d.kind}${d.callId ? ` (${d.callId})` : ''}`,
          )
          .join(', '),
    );
  }
  for (const diagnostic of diagnostics) {
    if (diagnostic.kind === 'orphaned_tool_result') {
      logger.warn(
        () =>
          `Dropping orphaned tool result ${diagnostic.callId} from message ${diagnostic.messageIndex}`,
      );
    }
  }

  return { messages, diagnostics };
}

export function normalizeHistory(history: readonly IContent[]): IContent[] {
  return normalizeHistoryForConverse(history).messages;
}
