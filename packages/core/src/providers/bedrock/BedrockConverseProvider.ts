/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../../debug/index.js';
import type { BedrockConfig } from '../../config/bedrockConfig.js';
import type { IContent } from '../../services/history/IContent.js';
import type {
  GenerateChatOptions,
  GenerateStructuredOptions,
  IProvider,
} from '../IProvider.js';
import { getErrorMessage, RequestCancelledError } from '../errors.js';
import {
  createRequestId,
  dumpContext,
  shouldDump,
  type DumpData,
} from '../utils/dumpContext.js';
import {
  appendSchemaInstructions,
  recoverStructuredOutput,
  type RecoveryResult,
} from '../utils/structuredOutput.js';
import {
  BedrockRuntimeTransport,
  type ConverseTransport,
} from './bedrockTransport.js';
import { encodeConverseRequest } from './converseEncoder.js';
import { parseConverseResponse } from './converseResponseParser.js';
import { ConverseStreamDecoder } from './converseStreamDecoder.js';
import type { ConverseRequest } from './converseTypes.js';
import { buildToolSpecs } from './schemaConverter.js';

/**
 * Chat client for Amazon Bedrock models over the Converse API.
 *
 * Each call normalizes the caller's history, encodes it, and hands it to the
 * transport. Nothing from one call is kept for the next apart from a call
 * counter used to correlate dump files.
 */
export class BedrockConverseProvider implements IProvider {
  readonly name = 'bedrock';
  private readonly logger = new DebugLogger('incident:bedrock:provider');
  private readonly transport: ConverseTransport;
  private callCounter = 0;

  constructor(
    private readonly config: BedrockConfig,
    transport?: ConverseTransport,
  ) {
    this.transport =
      transport ??
      new BedrockRuntimeTransport({
        region: config.region,
        maxAttempts: config.maxAttempts,
      });
  }

  getDefaultModel(): string {
    return this.config.modelId;
  }

  buildRequest(options: GenerateChatOptions): ConverseRequest {
    const { specs, dropped } = buildToolSpecs(options.tools);
    if (dropped.length > 0) {
      this.logger.warn(
        () =>
          `Sending request without ${dropped.length} tools: ${dropped.map((tool) => tool.name).join(', ')}`,
      );
      options.onToolsDropped?.(dropped);
    }
    return encodeConverseRequest({
      modelId: this.config.modelId,
      messages: options.contents,
      tools: specs,
      toolChoice: options.toolChoice,
      options: options.options,
      context: options.context,
      maxTokensFloor: this.config.maxTokensFloor,
    });
  }

  async *generateChatCompletion(
    options: GenerateChatOptions,
  ): AsyncIterableIterator<IContent> {
    const request = this.buildRequest(options);
    const dump = this.startDump(options, request);

    const decoder = new ConverseStreamDecoder(this.config.modelId);
    try {
      const events = await this.transport.converseStream(
        request,
        options.signal,
      );
      yield* decoder.decode(events, options.signal);
    } catch (error) {
      this.logger.error(
        () => `ConverseStream ${dump.requestId} failed: ${getErrorMessage(error)}`,
      );
      await this.writeDump({ ...dump, error: getErrorMessage(error) }, true);
      throw error;
    }

    if (decoder.state === 'done') {
      const message = decoder.toMessage();
      this.logUsage(dump.requestId, message);
      await this.writeDump({ ...dump, response: message }, false);
    }
  }

  async generateChatResponse(options: GenerateChatOptions): Promise<IContent> {
    const request = this.buildRequest(options);
    const dump = this.startDump(options, request);

    let message: IContent;
    try {
      const response = await this.transport.converse(request, options.signal);
      message = parseConverseResponse(response, this.config.modelId);
    } catch (error) {
      this.logger.error(
        () => `Converse ${dump.requestId} failed: ${getErrorMessage(error)}`,
      );
      await this.writeDump({ ...dump, error: getErrorMessage(error) }, true);
      throw error;
    }

    this.logUsage(dump.requestId, message);
    await this.writeDump({ ...dump, response: message }, false);
    return message;
  }

  /**
   * Asks for JSON matching `options.schema`, streams the answer and
   * recovers the value from the accumulated text. A failed recovery comes
   * back as the error result, which still carries the raw text. A call
   * cancelled through `options.signal` rejects with
   * {@link RequestCancelledError}; partial text is never recovered.
   */
  async generateStructuredOutput(
    options: GenerateStructuredOptions,
  ): Promise<RecoveryResult> {
    const contents = appendSchemaInstructions(options.contents, options.schema);

    let text = '';
    let finished = false;
    for await (const update of this.generateChatCompletion({
      ...options,
      contents,
    })) {
      if (update.metadata?.finishReason) {
        finished = true;
      }
      for (const block of update.blocks) {
        if (block.type === 'text') {
          text += block.text;
        }
      }
    }

    if (!finished) {
      this.logger.debug(() => 'Structured output request cancelled');
      throw new RequestCancelledError(
        'Structured output request was cancelled before the response completed',
      );
    }

    const result = recoverStructuredOutput(text, options.schema);
    if (result.ok) {
      this.logger.debug(() => 'Structured output recovered');
    } else {
      this.logger.warn(
        () => `Structured output not recovered: ${result.error.message}`,
      );
    }
    return result;
  }

  private startDump(
    options: GenerateChatOptions,
    request: ConverseRequest,
  ): DumpData {
    this.callCounter++;
    return {
      requestId: createRequestId(this.callCounter),
      modelId: this.config.modelId,
      timestamp: new Date().toISOString(),
      input: options.contents,
      request,
    };
  }

  private async writeDump(data: DumpData, isError: boolean): Promise<void> {
    if (!shouldDump(this.config.dumpMode, isError)) {
      return;
    }
    try {
      await dumpContext(data, this.config.dumpDirectory);
    } catch (error) {
      // A failed dump must not replace the call's own outcome
      this.logger.warn(
        () => `Dump ${data.requestId} not written: ${getErrorMessage(error)}`,
      );
    }
  }

  private logUsage(requestId: string, message: IContent): void {
    const usage = message.metadata?.usage;
    this.logger.debug(
      () =>
        `${requestId} finished: ${message.metadata?.finishReason}` +
        (usage ? `, ${usage.promptTokens} in / ${usage.completionTokens} out` : ''),
    );
  }
}
