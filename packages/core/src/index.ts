/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Export config
export * from './config/bedrockConfig.js';

// Export content model
export * from './services/history/IContent.js';

// Export provider
export * from './providers/IProvider.js';
export * from './providers/errors.js';
export * from './providers/bedrock/BedrockConverseProvider.js';
export * from './providers/bedrock/bedrockTransport.js';
export * from './providers/bedrock/converseTypes.js';
export * from './providers/bedrock/historyNormalizer.js';
export * from './providers/bedrock/converseEncoder.js';
export * from './providers/bedrock/schemaConverter.js';
export * from './providers/bedrock/converseStreamDecoder.js';
export * from './providers/bedrock/converseResponseParser.js';
export * from './providers/utils/structuredOutput.js';
export {
  createRequestId,
  dumpContext,
  redactSensitiveData,
  shouldDump,
  type DumpData,
} from './providers/utils/dumpContext.js';

// Export utilities
export * from './utils/schemaValidator.js';
export * from './utils/paths.js';

// Export debug
export * from './debug/index.js';
