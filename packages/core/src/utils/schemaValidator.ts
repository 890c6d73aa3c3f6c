/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Ajv } from 'ajv';
import type { SchemaObject, ValidateFunction } from 'ajv';
import addFormatsModule from 'ajv-formats';
import { getErrorMessage } from '../providers/errors.js';

const ajValidator = new Ajv(
  // See: https://ajv.js.org/options.html#strict-mode-options
  {
    // Schemas coming from tool declarations and callers may carry
    // non-standard keywords and formats; ignore them instead of failing.
    strictSchema: false,
    allErrors: true,
  },
);
addFormatsModule.default(ajValidator);

// Compiled validators keyed by the schema's JSON text, so equal schemas
// built as fresh objects compile once
const compiled = new Map<string, ValidateFunction>();

function compile(schema: SchemaObject): ValidateFunction {
  const key = JSON.stringify(schema);
  const cached = compiled.get(key);
  if (cached) {
    return cached;
  }
  // Ajv registers schemas by $id; a changed schema under a known id replaces it
  if (typeof schema.$id === 'string') {
    ajValidator.removeSchema(schema.$id);
  }
  const validate = ajValidator.compile(schema);
  compiled.set(key, validate);
  return validate;
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Simple utility to validate values against JSON Schemas
 */
export class SchemaValidator {
  /**
   * Returns null if the data conforms to the schema (or if there is no
   * schema). Otherwise, returns a string describing the error.
   */
  static validate(schema: unknown, data: unknown): string | null {
    if (schema === undefined || schema === null) {
      return null;
    }
    if (!isSchemaObject(schema)) {
      return 'Schema must be an object';
    }

    let validate: ValidateFunction;
    try {
      validate = compile(schema);
    } catch (error) {
      return `Invalid schema: ${getErrorMessage(error)}`;
    }

    if (!validate(data) && validate.errors) {
      return ajValidator.errorsText(validate.errors, { dataVar: 'data' });
    }

    return null;
  }
}
