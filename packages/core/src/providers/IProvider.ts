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

import type { IContent, JsonObject } from '../services/history/IContent.js';
import type {
  ConverseRequestContext,
  GenerationOptions,
  ToolChoice,
} from './bedrock/converseEncoder.js';
import type {
  DroppedTool,
  ToolDescriptor,
} from './bedrock/schemaConverter.js';
import type { RecoveryResult } from './utils/structuredOutput.js';

export interface GenerateChatOptions {
  contents: IContent[];
  tools?: ToolDescriptor[];
  /** Unrecognized values fall back to auto. */
  toolChoice?: ToolChoice | string | null;
  options?: GenerationOptions;
  context?: ConverseRequestContext;
  signal?: AbortSignal;
  /** Called with the tools left out of the request because their schema failed. */
  onToolsDropped?: (dropped: DroppedTool[]) => void;
}

export interface GenerateStructuredOptions extends GenerateChatOptions {
  /** JSON schema the response must satisfy. */
  schema: JsonObject;
}

export interface IProvider {
  name: string;
  getDefaultModel(): string;
  /**
   * Streams the model's answer as incremental updates. The last update
   * carries the finish reason.
   */
  generateChatCompletion(
    options: GenerateChatOptions,
  ): AsyncIterableIterator<IContent>;
  /** Single-shot variant returning the complete assistant message. */
  generateChatResponse(options: GenerateChatOptions): Promise<IContent>;
  generateStructuredOutput(
    options: GenerateStructuredOptions,
  ): Promise<RecoveryResult>;
}
