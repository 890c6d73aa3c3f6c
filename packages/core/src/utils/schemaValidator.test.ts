/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import { SchemaValidator } from './schemaValidator.js';

describe('SchemaValidator', () => {
  it('allows any value if schema is undefined', () => {
    expect(SchemaValidator.validate(undefined, { foo: 'bar' })).toBeNull();
  });

  it('rejects schemas that are not objects', () => {
    expect(SchemaValidator.validate('string', {})).toBe(
      'Schema must be an object',
    );
  });

  it('allows schema with extra keywords', () => {
    const schema = {
      type: 'object',
      properties: {
        severity: {
          type: 'string',
          enum: ['low', 'high'],
          'enum-descriptions': ['minor', 'page someone'],
        },
      },
    };
    expect(SchemaValidator.validate(schema, { severity: 'high' })).toBeNull();
  });

  it('allows custom format values', () => {
    const schema = {
      type: 'object',
      properties: {
        window: { type: 'string', format: 'prometheus-duration' },
      },
    };
    expect(SchemaValidator.validate(schema, { window: '5m' })).toBeNull();
  });

  it('checks known formats', () => {
    const schema = {
      type: 'object',
      properties: { started: { type: 'string', format: 'date' } },
    };
    expect(SchemaValidator.validate(schema, { started: '2025-04-08' })).toBe(
      null,
    );
    expect(
      SchemaValidator.validate(schema, { started: 'yesterday' }),
    ).not.toBeNull();
  });

  it('reports a missing required property', () => {
    const schema = {
      type: 'object',
      properties: { summary: { type: 'string' } },
      required: ['summary'],
    };
    expect(SchemaValidator.validate(schema, {})).toBe(
      "data must have required property 'summary'",
    );
  });

  it('reports integer mismatches', () => {
    const schema = {
      type: 'object',
      properties: { a: { type: 'integer' } },
    };
    expect(SchemaValidator.validate(schema, { a: 1 })).toBeNull();
    expect(SchemaValidator.validate(schema, { a: 1.5 })).toBe(
      'data/a must be integer',
    );
  });

  it('reports non-object values against an object schema', () => {
    expect(SchemaValidator.validate({ type: 'object' }, [1, 2])).toBe(
      'data must be object',
    );
  });

  describe('schemas with $id', () => {
    const findingSchema = (): Record<string, unknown> => ({
      $id: 'https://example.com/finding',
      type: 'object',
      properties: { a: { type: 'integer' } },
      required: ['a'],
    });

    it('validates repeatedly against equal schemas built afresh', () => {
      expect(SchemaValidator.validate(findingSchema(), { a: 1 })).toBeNull();
      expect(SchemaValidator.validate(findingSchema(), { a: 1 })).toBeNull();
      expect(SchemaValidator.validate(findingSchema(), { a: 'x' })).toBe(
        'data/a must be integer',
      );
    });

    it('uses the latest schema registered under an id', () => {
      const changed = {
        ...findingSchema(),
        properties: { a: { type: 'string' } },
      };
      expect(SchemaValidator.validate(findingSchema(), { a: 1 })).toBeNull();
      expect(SchemaValidator.validate(changed, { a: 'x' })).toBeNull();
      expect(SchemaValidator.validate(changed, { a: 1 })).toBe(
        'data/a must be string',
      );
    });
  });
});
