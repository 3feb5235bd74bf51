/**
 * UNIT-05: Request Validation
 *
 * zod failures become 422 ValidationErrors with dotted field paths.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ValidationError, nonEmptyPatch, normalizeEmail, readJson, validate } from '@social-api/shared';

function failureOf(run: () => unknown): ValidationError {
  try {
    run();
  } catch (err) {
    if (err instanceof ValidationError) {
      return err;
    }
    throw err;
  }
  throw new Error('Expected a ValidationError');
}

describe('UNIT-05: Request Validation', () => {
  it('should report nested fields by their dotted path', () => {
    const schema = z.object({ items: z.array(z.object({ label: z.string().min(1, 'Label is required') })) });

    const err = failureOf(() => validate(schema, { items: [{ label: 'ok' }, { label: '' }] }));

    expect(err.statusCode).toBe(422);
    expect(err.message).toBe('Request validation failed');
    expect(err.errors).toEqual([{ field: 'items.1.label', message: 'Label is required' }]);
  });

  it('should report a top-level failure against the body', () => {
    const err = failureOf(() => validate(z.array(z.string()), { not: 'a list' }));

    expect(err.errors.map((e) => e.field)).toEqual(['body']);
  });

  it('should require at least one field in a patch', () => {
    const schema = nonEmptyPatch({ name: z.string().optional(), note: z.string().nullable().optional() });

    const empty = failureOf(() => validate(schema, {}));

    expect(empty.errors).toEqual([{ field: 'body', message: 'At least one field must be provided' }]);
    expect(validate(schema, { note: null })).toEqual({ note: null });
  });

  it('should reject unknown fields in a patch', () => {
    const schema = nonEmptyPatch({ name: z.string().optional() });

    const err = failureOf(() => validate(schema, { name: 'x', role: 'admin' }));

    expect(err.errors.map((e) => e.field)).toEqual(['body']);
  });

  it('should distinguish a missing body from malformed JSON', () => {
    expect(failureOf(() => readJson({ body: '  ' })).message).toBe('Request body is required');
    expect(failureOf(() => readJson({ body: '{' })).message).toBe('Request body is not valid JSON');
    expect(readJson({ body: '{"a":1}' })).toEqual({ a: 1 });
  });

  it('should normalize email addresses', () => {
    expect(normalizeEmail('  Someone@Example.ORG ')).toBe('someone@example.org');
  });
});
