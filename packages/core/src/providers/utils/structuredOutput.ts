/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../../debug/index.js';
import type {
  IContent,
  JsonObject,
  JsonValue,
} from '../../services/history/IContent.js';
import { SchemaValidator } from '../../utils/schemaValidator.js';
import { getErrorMessage, StructuredOutputError } from '../errors.js';

const logger = new DebugLogger('incident:structured-output');

const REASONING_CLOSE_TAGS = [
  '</thinking>',
  '</think>',
  '</reasoning>',
  '</analysis>',
] as const;

const FRONT_MATTER_DELIMITER = '---';
const FENCE = '```';

export type RecoveryResult =
  | { ok: true; value: JsonValue; json: string }
  | { ok: false; error: StructuredOutputError };

/**
 * Keeps only what follows the last reasoning close tag, if any.
 */
export function stripReasoning(text: string): string {
  const lower = text.toLowerCase();
  let cut = -1;
  for (const tag of REASONING_CLOSE_TAGS) {
    const index = lower.lastIndexOf(tag);
    if (index !== -1 && index + tag.length > cut) {
      cut = index + tag.length;
    }
  }
  return cut === -1 ? text : text.slice(cut).trim();
}

export function stripFrontMatter(text: string): string {
  if (!text.startsWith(FRONT_MATTER_DELIMITER)) {
    return text;
  }
  const close = text.indexOf(FRONT_MATTER_DELIMITER, FRONT_MATTER_DELIMITER.length);
  if (close === -1) {
    return text;
  }
  return text.slice(close + FRONT_MATTER_DELIMITER.length).trim();
}

/**
 * Removes a leading ``` or ```lang opener and a trailing ``` closer.
 */
export function stripCodeFence(text: string): string {
  let result = text;
  if (result.startsWith(FENCE)) {
    result = result.slice(FENCE.length).replace(/^[\w+-]*/, '').trim();
  }
  if (result.endsWith(FENCE)) {
    result = result.slice(0, -FENCE.length).trim();
  }
  return result;
}

function count(text: string, char: string): number {
  let total = 0;
  for (const c of text) {
    if (c === char) total++;
  }
  return total;
}

/**
 * Restores a missing opening brace and a single missing closing brace.
 * Deeper truncation is left for the parser to reject.
 */
export function repairBraces(text: string): string {
  let result = text;
  if (result.startsWith('"')) {
    result = `{${result}`;
  }
  if (
    result.startsWith('{') &&
    !result.endsWith('}') &&
    count(result, '{') > count(result, '}')
  ) {
    result = `${result}}`;
  }
  return result;
}

/**
 * Runs every cleanup step over raw model text. Each step is a no-op when
 * its pattern is absent.
 */
export function cleanStructuredText(raw: string): string {
  let text = raw.trim();
  text = stripReasoning(text);
  text = stripFrontMatter(text);
  text = stripCodeFence(text);
  return repairBraces(text);
}

/**
 * Extracts a JSON value matching `schema` from free-form model output.
 * Never throws: failures come back as a {@link StructuredOutputError}
 * carrying the cleaned text.
 */
export function recoverStructuredOutput(
  raw: string,
  schema: JsonObject,
): RecoveryResult {
  const cleanedText = cleanStructuredText(raw);

  let value: JsonValue;
  try {
    value = JSON.parse(cleanedText);
  } catch (error) {
    logger.debug(
      () =>
        `Structured output is not JSON: ${getErrorMessage(error)}; text: ${cleanedText.slice(0, 500)}`,
    );
    return {
      ok: false,
      error: new StructuredOutputError({
        kind: 'parse',
        message: `Response is not valid JSON: ${getErrorMessage(error)}`,
        cleanedText,
        rawText: raw,
      }),
    };
  }

  const validationError = SchemaValidator.validate(schema, value);
  if (validationError) {
    logger.debug(() => `Structured output failed validation: ${validationError}`);
    return {
      ok: false,
      error: new StructuredOutputError({
        kind: 'validation',
        message: `Response does not match schema: ${validationError}`,
        cleanedText,
        rawText: raw,
      }),
    };
  }

  return { ok: true, value, json: JSON.stringify(value, null, 2) };
}

export function buildSchemaInstructions(schema: JsonObject): string {
  return `

Please format your response as valid JSON that matches this exact schema:

${FENCE}json
${JSON.stringify(schema, null, 2)}
${FENCE}

Important:
- Your response must be valid JSON only
- Do not include any text before or after the JSON
- Follow the schema exactly
- Use proper JSON formatting with quotes around strings
`;
}

/**
 * Returns a copy of `history` whose last user message asks for JSON
 * matching `schema`. A user message is appended when the history does
 * not end with one.
 */
export function appendSchemaInstructions(
  history: readonly IContent[],
  schema: JsonObject,
): IContent[] {
  const instructions = buildSchemaInstructions(schema);
  const result = [...history];
  const last = result[result.length - 1];

  if (last?.speaker !== 'human') {
    result.push({
      speaker: 'human',
      blocks: [{ type: 'text', text: instructions.trim() }],
    });
    return result;
  }

  const textIndex = last.blocks.findIndex((block) => block.type === 'text');
  const blocks =
    textIndex === -1
      ? [...last.blocks, { type: 'text' as const, text: instructions.trim() }]
      : last.blocks.map((block, index) =>
          index === textIndex && block.type === 'text'
            ? { ...block, text: block.text + instructions }
            : block,
        );
  result[result.length - 1] = { ...last, blocks };
  return result;
}
