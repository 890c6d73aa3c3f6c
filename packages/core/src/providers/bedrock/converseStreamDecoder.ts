/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../../debug/index.js';
import type {
  ContentBlock,
  ContentMetadata,
  FinishReason,
  IContent,
  UsageStats,
} from '../../services/history/IContent.js';
import { ConverseStreamError, StreamNotCompleteError } from '../errors.js';
import { parseToolInput } from './converseEncoder.js';
import type { ConverseStreamEvent, ConverseUsage } from './converseTypes.js';

const logger = new DebugLogger('incident:bedrock:stream');

export type DecoderState = 'idle' | 'accumulating' | 'done' | 'errored';

const EXCEPTION_EVENTS = [
  'internalServerException',
  'modelStreamErrorException',
  'validationException',
  'throttlingException',
  'serviceUnavailableException',
] as const;

interface PartialText {
  kind: 'text';
  text: string;
}

interface PartialToolUse {
  kind: 'tool_use';
  id: string;
  name: string;
  input: string;
}

type PartialBlock = PartialText | PartialToolUse;

export function mapStopReason(stopReason: string | undefined): FinishReason {
  switch (stopReason) {
    case 'end_turn':
    case 'stop_sequence':
      return 'stop';
    case 'max_tokens':
      return 'length';
    case 'tool_use':
      return 'tool_calls';
    case 'content_filtered':
      return 'content_filter';
    default:
      return 'stop';
  }
}

export function toUsageStats(usage: ConverseUsage): UsageStats {
  const promptTokens = usage.inputTokens ?? 0;
  const completionTokens = usage.outputTokens ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: usage.totalTokens ?? promptTokens + completionTokens,
  };
}

/**
 * Turns the events of one ConverseStream response into generic updates.
 *
 * Text deltas are emitted as they arrive. Tool-use input is accumulated
 * silently and only surfaces in {@link toMessage}. The stop event produces
 * one update carrying just the finish reason. A decoder handles exactly one
 * response.
 */
export class ConverseStreamDecoder {
  private _state: DecoderState = 'idle';
  private blocks = new Map<number, PartialBlock>();
  private finishReason: FinishReason | undefined;
  private usage: UsageStats | undefined;

  constructor(private readonly model?: string) {}

  get state(): DecoderState {
    return this._state;
  }

  get finish(): FinishReason | undefined {
    return this.finishReason;
  }

  get usageStats(): UsageStats | undefined {
    return this.usage;
  }

  /**
   * Yields updates for the given events. Aborting `signal` (or returning
   * from the iteration early) stops consumption and discards everything
   * accumulated; no final update is produced in that case.
   */
  async *decode(
    events: AsyncIterable<ConverseStreamEvent>,
    signal?: AbortSignal,
  ): AsyncGenerator<IContent, void, undefined> {
    if (this._state !== 'idle') {
      throw new Error(
        `ConverseStreamDecoder already used (state: ${this._state})`,
      );
    }
    this._state = 'accumulating';
    let finished = false;

    try {
      for await (const event of events) {
        if (signal?.aborted) {
          logger.debug(() => 'Stream cancelled by caller');
          return;
        }
        const update = this.handleEvent(event);
        if (update) {
          yield update;
        }
      }
      finished = true;
    } catch (error) {
      if (signal?.aborted) {
        logger.debug(() => 'Stream cancelled by caller');
        return;
      }
      this.fail();
      logger.error(() => `Stream failed: ${String(error)}`);
      throw error;
    } finally {
      if (this._state === 'accumulating' && !finished) {
        this.fail();
      }
    }

    if (this.state !== 'done') {
      this.fail();
      throw new ConverseStreamError(
        'incompleteStream',
        'stream ended before messageStop',
      );
    }
  }

  private handleEvent(event: ConverseStreamEvent): IContent | undefined {
    for (const name of EXCEPTION_EVENTS) {
      const exception = event[name];
      if (exception) {
        throw new ConverseStreamError(name, exception.message);
      }
    }

    if (event.metadata?.usage) {
      this.usage = toUsageStats(event.metadata.usage);
      logger.debug(
        () =>
          `Usage: ${this.usage?.promptTokens} in, ${this.usage?.completionTokens} out`,
      );
      return undefined;
    }

    if (this._state !== 'accumulating') {
      return undefined;
    }

    if (event.contentBlockStart) {
      const index = event.contentBlockStart.contentBlockIndex ?? 0;
      const toolUse = event.contentBlockStart.start?.toolUse;
      this.blocks.set(
        index,
        toolUse
          ? {
              kind: 'tool_use',
              id: toolUse.toolUseId ?? '',
              name: toolUse.name ?? '',
              input: '',
            }
          : { kind: 'text', text: '' },
      );
      return undefined;
    }

    if (event.contentBlockDelta) {
      return this.handleDelta(
        event.contentBlockDelta.contentBlockIndex ?? 0,
        event.contentBlockDelta.delta,
      );
    }

    if (event.messageStop) {
      this.finishReason = mapStopReason(event.messageStop.stopReason);
      this._state = 'done';
      logger.debug(
        () =>
          `Stream stopped: ${event.messageStop?.stopReason} -> ${this.finishReason}`,
      );
      return {
        speaker: 'ai',
        blocks: [],
        metadata: { finishReason: this.finishReason },
      };
    }

    return undefined;
  }

  private handleDelta(
    index: number,
    delta: NonNullable<ConverseStreamEvent['contentBlockDelta']>['delta'],
  ): IContent | undefined {
    const existing = this.blocks.get(index);

    if (delta?.text !== undefined) {
      // Text blocks usually arrive without a contentBlockStart
      if (existing && existing.kind !== 'text') {
        logger.warn(() => `Text delta for tool block ${index} ignored`);
        return undefined;
      }
      const partial: PartialText = existing ?? { kind: 'text', text: '' };
      partial.text += delta.text;
      this.blocks.set(index, partial);
      return delta.text
        ? { speaker: 'ai', blocks: [{ type: 'text', text: delta.text }] }
        : undefined;
    }

    if (delta?.toolUse?.input !== undefined) {
      if (existing?.kind !== 'tool_use') {
        logger.warn(
          () => `Tool input delta for block ${index} without a tool start`,
        );
        return undefined;
      }
      existing.input += delta.toolUse.input;
    }

    return undefined;
  }

  private fail(): void {
    this._state = 'errored';
    this.blocks.clear();
    this.finishReason = undefined;
    this.usage = undefined;
  }

  /**
   * The complete assistant message. Only available once the stop event
   * has been decoded.
   */
  toMessage(): IContent {
    if (this._state !== 'done') {
      throw new StreamNotCompleteError(this._state);
    }

    const blocks: ContentBlock[] = [];
    for (const index of [...this.blocks.keys()].sort((a, b) => a - b)) {
      const partial = this.blocks.get(index);
      if (partial?.kind === 'text' && partial.text.length > 0) {
        blocks.push({ type: 'text', text: partial.text });
      } else if (partial?.kind === 'tool_use') {
        blocks.push({
          type: 'tool_call',
          id: partial.id,
          name: partial.name,
          parameters: parseToolInput(partial.input),
        });
      }
    }

    const metadata: ContentMetadata = { finishReason: this.finishReason };
    if (this.usage) {
      metadata.usage = this.usage;
    }
    if (this.model) {
      metadata.model = this.model;
    }
    return { speaker: 'ai', blocks, metadata };
  }
}
