/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Builds Converse tool specs from tool descriptors.
 *
 * A descriptor either declares its JSON schema directly (possibly in the
 * Gemini style with uppercase types) or carries a zod object schema that is
 * introspected field by field. Converse expects:
 * - name and a non-empty description
 * - inputSchema.json with `type: "object"`
 * - `required` only when non-empty, as an array of strings
 */

import { z } from 'zod';
import { DebugLogger } from '../../debug/index.js';
import type { JsonObject, JsonValue } from '../../services/history/IContent.js';
import { getErrorMessage, ToolSchemaError } from '../errors.js';

const logger = new DebugLogger('incident:bedrock:schema');

export interface ToolSpec {
  name: string;
  description: string;
  inputSchema: JsonObject;
}

export interface DeclaredToolDescriptor {
  name: string;
  description?: string;
  /** JSON schema of the arguments, or a function producing it. */
  parameters?: unknown;
}

export interface ZodToolDescriptor {
  name: string;
  description?: string;
  schema: z.ZodTypeAny;
}

export type ToolDescriptor = DeclaredToolDescriptor | ZodToolDescriptor;

export interface DroppedTool {
  name: string;
  reason: string;
}

export interface ToolSpecBuildResult {
  specs: ToolSpec[];
  dropped: DroppedTool[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toJsonValue(value: unknown): JsonValue | undefined {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted !== undefined) {
        items.push(converted);
      }
    }
    return items;
  }
  if (isRecord(value)) {
    return toJsonObject(value);
  }
  return undefined;
}

function toJsonObject(value: Record<string, unknown>): JsonObject {
  const result: JsonObject = {};
  for (const [key, entry] of Object.entries(value)) {
    const converted = toJsonValue(entry);
    if (converted !== undefined) {
      result[key] = converted;
    }
  }
  return result;
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === 'string')
    : [];
}

function normalizeProperties(properties: Record<string, unknown>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(properties)) {
    if (isRecord(value)) {
      result[key] = normalizePropertySchema(value);
    }
  }
  return result;
}

function normalizePropertySchema(prop: Record<string, unknown>): JsonObject {
  const result = toJsonObject(prop);

  if (typeof prop.type === 'string') {
    result.type = prop.type.toLowerCase();
  }
  if (isRecord(prop.items)) {
    result.items = normalizePropertySchema(prop.items);
  }
  if (isRecord(prop.properties)) {
    result.properties = normalizeProperties(prop.properties);
  }
  if ('required' in prop) {
    const required = stringArray(prop.required);
    if (required.length > 0) {
      result.required = required;
    } else {
      delete result.required;
    }
  }

  return result;
}

/**
 * Normalizes a declared JSON schema into a Converse input schema. Anything
 * that is not an object schema becomes an empty object schema.
 */
export function normalizeDeclaredSchema(schema: unknown): JsonObject {
  if (!isRecord(schema)) {
    return { type: 'object', properties: {} };
  }

  const result = normalizePropertySchema(schema);
  result.type = 'object';
  if (!isRecord(result.properties)) {
    result.properties = {};
  }
  return result;
}

function unwrapZod(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return unwrapZod(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return unwrapZod(schema.removeDefault());
  }
  if (schema instanceof z.ZodEffects) {
    return unwrapZod(schema.innerType());
  }
  return schema;
}

function zodDescription(schema: z.ZodTypeAny): string | undefined {
  if (schema.description) {
    return schema.description;
  }
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return zodDescription(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return zodDescription(schema.removeDefault());
  }
  if (schema instanceof z.ZodEffects) {
    return zodDescription(schema.innerType());
  }
  return undefined;
}

function zodObjectSchema(shape: Record<string, z.ZodTypeAny>): JsonObject {
  const properties: JsonObject = {};
  const required: string[] = [];

  for (const [name, field] of Object.entries(shape)) {
    properties[name] = {
      ...zodTypeSchema(field),
      description: zodDescription(field) ?? `Parameter: ${name}`,
    };
    if (!field.isOptional()) {
      required.push(name);
    }
  }

  const result: JsonObject = { type: 'object', properties };
  if (required.length > 0) {
    result.required = required;
  }
  return result;
}

/**
 * Maps a zod type to the JSON schema of a single value. Types without a
 * JSON-schema counterpart fall back to `string`.
 */
function zodTypeSchema(field: z.ZodTypeAny): JsonObject {
  const schema = unwrapZod(field);

  if (schema instanceof z.ZodString) {
    return { type: 'string' };
  }
  if (schema instanceof z.ZodNumber) {
    return { type: schema.isInt ? 'integer' : 'number' };
  }
  if (schema instanceof z.ZodBigInt) {
    return { type: 'integer' };
  }
  if (schema instanceof z.ZodBoolean) {
    return { type: 'boolean' };
  }
  if (schema instanceof z.ZodArray) {
    return { type: 'array', items: zodTypeSchema(schema.element) };
  }
  if (schema instanceof z.ZodObject) {
    return zodObjectSchema(schema.shape);
  }
  if (schema instanceof z.ZodRecord) {
    return { type: 'object' };
  }
  if (schema instanceof z.ZodEnum) {
    return { type: 'string', enum: stringArray(schema.options) };
  }
  if (schema instanceof z.ZodNativeEnum) {
    return { type: 'string', enum: stringArray(Object.values(schema.enum)) };
  }
  if (schema instanceof z.ZodLiteral) {
    const value = toJsonValue(schema.value);
    if (typeof value === 'number' || typeof value === 'boolean') {
      return { type: typeof value, enum: [value] };
    }
    return { type: 'string', enum: [String(schema.value)] };
  }
  return { type: 'string' };
}

function resolveDeclaredParameters(descriptor: DeclaredToolDescriptor): unknown {
  const { parameters } = descriptor;
  return typeof parameters === 'function' ? parameters() : parameters;
}

/**
 * Derives the Converse tool spec for one descriptor.
 *
 * @throws ToolSchemaError when the descriptor has no name or its schema
 *   cannot be produced
 */
export function buildToolSpec(descriptor: ToolDescriptor): ToolSpec {
  const name = typeof descriptor.name === 'string' ? descriptor.name.trim() : '';
  if (!name) {
    throw new ToolSchemaError(name, 'missing tool name');
  }

  let inputSchema: JsonObject;
  if ('schema' in descriptor) {
    const root = unwrapZod(descriptor.schema);
    if (!(root instanceof z.ZodObject)) {
      throw new ToolSchemaError(name, 'argument schema is not a zod object');
    }
    inputSchema = zodObjectSchema(root.shape);
  } else {
    let declared: unknown;
    try {
      declared = resolveDeclaredParameters(descriptor);
    } catch (error) {
      throw new ToolSchemaError(
        name,
        `parameter schema could not be produced: ${getErrorMessage(error)}`,
      );
    }
    if (declared !== undefined && declared !== null && !isRecord(declared)) {
      throw new ToolSchemaError(name, 'parameter schema is not an object');
    }
    inputSchema = normalizeDeclaredSchema(declared);
  }

  const description = descriptor.description?.trim();
  return {
    name,
    description: description || `Tool: ${name}`,
    inputSchema,
  };
}

/**
 * Builds specs for every descriptor, leaving out (and reporting) the ones
 * that fail instead of failing the whole request.
 */
export function buildToolSpecs(
  descriptors: readonly ToolDescriptor[] | undefined,
): ToolSpecBuildResult {
  const specs: ToolSpec[] = [];
  const dropped: DroppedTool[] = [];

  for (const descriptor of descriptors ?? []) {
    try {
      specs.push(buildToolSpec(descriptor));
    } catch (error) {
      const reason = getErrorMessage(error);
      dropped.push({
        name: typeof descriptor.name === 'string' ? descriptor.name : '',
        reason,
      });
      logger.warn(() => `Excluding tool from request: ${reason}`);
    }
  }

  if (specs.length > 0) {
    logger.debug(
      () =>
        `Built ${specs.length} tool specs: ${specs.map((s) => s.name).join(', ')}`,
    );
  }

  return { specs, dropped };
}
