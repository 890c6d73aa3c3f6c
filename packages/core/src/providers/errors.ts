/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}

/**
 * Thrown when the Bedrock settings resolved from the environment and
 * overrides do not form a usable configuration.
 */
export class BedrockConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: string[]) {
    super(`Invalid Bedrock configuration: ${issues.join('; ')}`);
    this.name = 'BedrockConfigError';
    this.issues = issues;
  }
}

/**
 * An exception event delivered inside a Converse stream
 * (throttling, validation, model stream failure and so on).
 */
export class ConverseStreamError extends Error {
  /** Event member that carried the exception, e.g. `throttlingException`. */
  readonly exceptionType: string;

  constructor(exceptionType: string, message?: string) {
    super(
      message
        ? `Bedrock stream ${exceptionType}: ${message}`
        : `Bedrock stream ${exceptionType}`,
    );
    this.name = 'ConverseStreamError';
    this.exceptionType = exceptionType;
  }
}

/**
 * The caller's signal aborted a call before the response completed.
 */
export class RequestCancelledError extends Error {
  constructor(message = 'Request cancelled') {
    super(message);
    this.name = 'RequestCancelledError';
  }
}

export class StreamNotCompleteError extends Error {
  readonly state: string;

  constructor(state: string) {
    super(`Stream has not completed (state: ${state})`);
    this.name = 'StreamNotCompleteError';
    this.state = state;
  }
}

/**
 * Model text could not be turned into a value matching the requested
 * schema. `cleanedText` is the text after cleanup, for fallback display.
 */
export class StructuredOutputError extends Error {
  readonly kind: 'parse' | 'validation';
  readonly cleanedText: string;
  readonly rawText: string;

  constructor({
    kind,
    message,
    cleanedText,
    rawText,
  }: {
    kind: 'parse' | 'validation';
    message: string;
    cleanedText: string;
    rawText: string;
  }) {
    super(message);
    this.name = 'StructuredOutputError';
    this.kind = kind;
    this.cleanedText = cleanedText;
    this.rawText = rawText;
  }
}

/**
 * A tool descriptor that cannot be turned into a Converse tool spec.
 */
export class ToolSchemaError extends Error {
  readonly toolName: string;

  constructor(toolName: string, message: string) {
    super(`Tool "${toolName || '<unnamed>'}": ${message}`);
    this.name = 'ToolSchemaError';
    this.toolName = toolName;
  }
}
