import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { normalizeArguments, validateArguments } from '../src/validation/tool-arguments.js';
import { parseStructured } from '../src/validation/structured-output.js';
import { decodeJson, isRecord } from '../src/validation/json.js';
import { defineOutputSchema } from '../src/interfaces/output-schema.js';
import { weatherTool } from './helpers/scripted-backend.js';

// ── JSON helpers ──────────────────────────────────────────────────────────────

describe('decodeJson', () => {
  it('decodes valid JSON', () => {
    expect(decodeJson('[1,2]')).toEqual({ ok: true, value: [1, 2] });
  });

  it('reports a reason for invalid JSON', () => {
    const decoded = decodeJson('{');
    expect(decoded.ok).toBe(false);
    expect(!decoded.ok && decoded.reason.length > 0).toBe(true);
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});

// ── normalizeArguments ────────────────────────────────────────────────────────

describe('normalizeArguments', () => {
  it('decodes a JSON-encoded object', () => {
    expect(normalizeArguments('{"city":"Paris"}')).toEqual({ ok: true, arguments: { city: 'Paris' } });
  });

  it('passes a decoded object through', () => {
    const args = { city: 'Paris' };
    const check = normalizeArguments(args);
    expect(check.ok && check.arguments).toBe(args);
  });

  it('treats an empty or blank string as no arguments', () => {
    expect(normalizeArguments('')).toEqual({ ok: true, arguments: {} });
    expect(normalizeArguments('  ')).toEqual({ ok: true, arguments: {} });
  });

  it('reports JsonDecodeError with the raw text as payload', () => {
    const check = normalizeArguments('{"city": Paris}');
    expect(check.ok).toBe(false);
    if (check.ok) return;
    expect(check.error.kind).toBe('JsonDecodeError');
    expect(check.error.message).toMatch(/^Tool arguments are not valid JSON: /);
    expect(check.error.payload).toBe('{"city": Paris}');
  });

  it('rejects JSON that is not an object', () => {
    const check = normalizeArguments('["Paris"]');
    expect(check.ok).toBe(false);
    if (check.ok) return;
    expect(check.error).toEqual({
      kind: 'SchemaMismatch',
      message: 'Tool arguments must be a JSON object.',
      payload: ['Paris'],
    });
  });
});

// ── validateArguments ─────────────────────────────────────────────────────────

describe('validateArguments', () => {
  it('accepts arguments that match the parameter schema', () => {
    expect(validateArguments(weatherTool, { city: 'Paris' })).toBeUndefined();
  });

  it('rejects a missing required property', () => {
    const error = validateArguments(weatherTool, {});
    expect(error?.kind).toBe('SchemaMismatch');
    expect(error?.message).toMatch(/^Arguments for tool 'get_weather' do not match its parameter schema: \/city: /);
    expect(error?.payload).toEqual({});
  });

  it('does not coerce a number into a string', () => {
    const error = validateArguments(weatherTool, { city: 75 });
    expect(error?.message).toContain('/city: ');
  });

  it('rejects an unexpected property', () => {
    const error = validateArguments(weatherTool, { city: 'Paris', units: 'metric' });
    expect(error?.message).toContain('/units: ');
  });
});

// ── parseStructured ───────────────────────────────────────────────────────────

describe('parseStructured', () => {
  const PackAdvice = defineOutputSchema('PackAdvice', {
    umbrella: z.boolean(),
    rationale: z.string(),
  });

  it('returns typed data for a conforming body', () => {
    const check = parseStructured('{"umbrella":false,"rationale":"Clear skies."}', PackAdvice);
    expect(check).toEqual({ ok: true, data: { umbrella: false, rationale: 'Clear skies.' } });
  });

  it('reports JsonDecodeError for a truncated body', () => {
    const check = parseStructured('{"umbrella":', PackAdvice);
    expect(check.ok).toBe(false);
    if (check.ok) return;
    expect(check.error.kind).toBe('JsonDecodeError');
    expect(check.error.message).toMatch(/^Response body is not valid JSON: /);
    expect(check.error.payload).toBe('{"umbrella":');
  });

  it('names the mistyped field', () => {
    const check = parseStructured('{"umbrella":"yes","rationale":"Rain."}', PackAdvice);
    expect(check.ok).toBe(false);
    if (check.ok) return;
    expect(check.error.message).toBe(
      'Response does not match PackAdvice: umbrella: Expected boolean, received string'
    );
  });

  it('lists every issue', () => {
    const check = parseStructured('{"umbrella":"yes"}', PackAdvice);
    expect(check.ok).toBe(false);
    if (check.ok) return;
    expect(check.error.message).toBe(
      'Response does not match PackAdvice: umbrella: Expected boolean, received string; rationale: Required'
    );
  });

  it('rejects extra keys', () => {
    const check = parseStructured('{"umbrella":true,"rationale":"Rain.","extra":1}', PackAdvice);
    expect(check.ok).toBe(false);
    if (check.ok) return;
    expect(check.error.message).toBe(
      "Response does not match PackAdvice: (root): Unrecognized key(s) in object: 'extra'"
    );
  });

  it('rejects a top-level array', () => {
    const check = parseStructured('[]', PackAdvice);
    expect(check.ok).toBe(false);
    if (check.ok) return;
    expect(check.error.kind).toBe('SchemaMismatch');
    expect(check.error.payload).toEqual([]);
  });
});
