import { describe, it, expect } from 'vitest';
import { Type } from '@sinclair/typebox';
import { z } from 'zod';
import { ConversationTurnSchema } from '../src/interfaces/turn.js';
import { ToolSpecSchema, defineTool, toolParametersJson } from '../src/interfaces/tool.js';
import { BackendReplySchema } from '../src/interfaces/backend.js';
import { defineOutputSchema, toJsonSchema } from '../src/interfaces/output-schema.js';
import { failure } from '../src/interfaces/exchange.js';

// ── ConversationTurnSchema ────────────────────────────────────────────────────

describe('ConversationTurnSchema', () => {
  it('accepts a user turn', () => {
    expect(ConversationTurnSchema.safeParse({ role: 'user', content: 'Hello' }).success).toBe(true);
  });

  it('accepts a tool turn with toolCallId', () => {
    const result = ConversationTurnSchema.safeParse({
      role: 'tool',
      content: '{"result": "ok"}',
      toolCallId: 'call_1',
    });
    expect(result.success).toBe(true);
  });

  it('rejects a tool turn without toolCallId', () => {
    const result = ConversationTurnSchema.safeParse({ role: 'tool', content: 'ok' });
    expect(result.success).toBe(false);
  });

  it('rejects an unknown role', () => {
    expect(ConversationTurnSchema.safeParse({ role: 'bot', content: 'Hi' }).success).toBe(false);
  });

  it('accepts structured content', () => {
    const result = ConversationTurnSchema.safeParse({ role: 'user', content: { city: 'Paris' } });
    expect(result.success).toBe(true);
  });
});

// ── ToolSpecSchema ────────────────────────────────────────────────────────────

describe('ToolSpecSchema', () => {
  const parameters = Type.Object({ city: Type.String() });

  it('accepts a TypeBox object schema as parameters', () => {
    const result = ToolSpecSchema.safeParse({
      name: 'get_weather',
      description: 'Get current weather by city.',
      parameters,
    });
    expect(result.success).toBe(true);
  });

  it('rejects a plain object as parameters', () => {
    const result = ToolSpecSchema.safeParse({
      name: 'get_weather',
      description: 'Get current weather by city.',
      parameters: { type: 'object' },
    });
    expect(result.success).toBe(false);
  });

  it('rejects a name with spaces', () => {
    const result = ToolSpecSchema.safeParse({ name: 'get weather', description: 'x', parameters });
    expect(result.success).toBe(false);
  });

  it('defineTool throws on an empty description', () => {
    expect(() => defineTool({ name: 'noop', description: '', parameters })).toThrow();
  });

  it('defineTool returns a frozen spec', () => {
    const tool = defineTool({ name: 'noop', description: 'Does nothing.', parameters });
    expect(Object.isFrozen(tool)).toBe(true);
  });

  it('toolParametersJson yields plain JSON Schema', () => {
    const tool = defineTool({ name: 'get_weather', description: 'Weather.', parameters });
    expect(JSON.parse(JSON.stringify(toolParametersJson(tool)))).toEqual({
      type: 'object',
      properties: { city: { type: 'string' } },
      required: ['city'],
    });
  });
});

// ── BackendReplySchema ────────────────────────────────────────────────────────

describe('BackendReplySchema', () => {
  it('accepts tool calls with string or decoded arguments', () => {
    const result = BackendReplySchema.safeParse({
      type: 'tool_calls',
      calls: [
        { id: 'a', name: 'x', arguments: '{}' },
        { id: 'b', name: 'y', arguments: { k: 1 } },
      ],
    });
    expect(result.success).toBe(true);
  });

  it('rejects a tool_calls reply with no calls', () => {
    expect(BackendReplySchema.safeParse({ type: 'tool_calls', calls: [] }).success).toBe(false);
  });

  it('rejects an error reply without retryable', () => {
    const result = BackendReplySchema.safeParse({ type: 'error', code: '500', message: 'boom' });
    expect(result.success).toBe(false);
  });
});

// ── Output schemas ────────────────────────────────────────────────────────────

describe('defineOutputSchema', () => {
  it('rejects names the backends would refuse', () => {
    expect(() => defineOutputSchema('Pack Advice', { umbrella: z.boolean() })).toThrow(
      "Invalid output schema name 'Pack Advice': use 1-64 letters, digits, '_' or '-'."
    );
  });

  it('builds a strict schema that rejects unknown keys', () => {
    const schema = defineOutputSchema('PackAdvice', { umbrella: z.boolean() });
    expect(schema.schema.safeParse({ umbrella: true, extra: 1 }).success).toBe(false);
  });

  it('renders an inlined JSON Schema without the $schema marker', () => {
    const schema = defineOutputSchema('RepoSummary', {
      name: z.string(),
      topics: z.array(z.string()),
    });
    expect(toJsonSchema(schema)).toEqual({
      type: 'object',
      properties: {
        name: { type: 'string' },
        topics: { type: 'array', items: { type: 'string' } },
      },
      required: ['name', 'topics'],
      additionalProperties: false,
    });
  });
});

describe('failure', () => {
  it('omits payload when none is given', () => {
    expect(failure('TransportError', 'down')).toEqual({
      type: 'error',
      error: { kind: 'TransportError', message: 'down' },
    });
  });

  it('keeps the payload when given', () => {
    expect(failure('JsonDecodeError', 'bad', '{')).toEqual({
      type: 'error',
      error: { kind: 'JsonDecodeError', message: 'bad', payload: '{' },
    });
  });
});
