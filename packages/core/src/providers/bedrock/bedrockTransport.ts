/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  BedrockRuntimeClient,
  ConverseCommand,
  ConverseStreamCommand,
  type ConverseCommandInput,
  type ToolChoice,
} from '@aws-sdk/client-bedrock-runtime';
import { DebugLogger } from '../../debug/index.js';
import type {
  ConverseRequest,
  ConverseResponse,
  ConverseStreamEvent,
  ConverseToolChoice,
} from './converseTypes.js';

const logger = new DebugLogger('incident:bedrock:transport');

/**
 * Sends encoded requests to Bedrock. Retries, credentials and signing are
 * the transport's business; the adapter only hands over requests and reads
 * back responses or event streams.
 */
export interface ConverseTransport {
  converse(
    request: ConverseRequest,
    signal?: AbortSignal,
  ): Promise<ConverseResponse>;
  converseStream(
    request: ConverseRequest,
    signal?: AbortSignal,
  ): Promise<AsyncIterable<ConverseStreamEvent>>;
}

export interface BedrockTransportOptions {
  region: string;
  /** Total attempts per call, retries included. */
  maxAttempts: number;
}

/**
 * The SDK has no "none" tool choice. Tools stay declared so a history
 * with tool use is still accepted, and the model is left to decide.
 */
function toSdkToolChoice(choice: ConverseToolChoice): ToolChoice {
  if ('none' in choice) {
    logger.debug(() => 'Tool choice "none" is sent as "auto"');
    return { auto: {} };
  }
  return choice;
}

export function toSdkConverseInput(
  request: ConverseRequest,
): ConverseCommandInput {
  const { toolConfig, ...rest } = request;
  if (!toolConfig) {
    return rest;
  }
  return {
    ...rest,
    toolConfig: {
      tools: toolConfig.tools,
      toolChoice: toSdkToolChoice(toolConfig.toolChoice),
    },
  };
}

export class BedrockRuntimeTransport implements ConverseTransport {
  private readonly client: BedrockRuntimeClient;

  constructor(options: BedrockTransportOptions) {
    this.client = new BedrockRuntimeClient({
      region: options.region,
      maxAttempts: options.maxAttempts,
    });
  }

  async converse(
    request: ConverseRequest,
    signal?: AbortSignal,
  ): Promise<ConverseResponse> {
    logger.debug(() => `Converse ${request.modelId}`);
    return this.client.send(new ConverseCommand(toSdkConverseInput(request)), {
      abortSignal: signal,
    });
  }

  async converseStream(
    request: ConverseRequest,
    signal?: AbortSignal,
  ): Promise<AsyncIterable<ConverseStreamEvent>> {
    logger.debug(() => `ConverseStream ${request.modelId}`);
    const output = await this.client.send(
      new ConverseStreamCommand(toSdkConverseInput(request)),
      { abortSignal: signal },
    );
    if (!output.stream) {
      throw new Error('Bedrock returned no event stream');
    }
    return output.stream;
  }

  destroy(): void {
    this.client.destroy();
  }
}
