import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../src/args.js';

describe('parseCliArgs', () => {
  it('shows help with no arguments or a help flag', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['-h'])).toEqual({ kind: 'help' });
  });

  it('recognises the version flag', () => {
    expect(parseCliArgs(['--version'])).toEqual({ kind: 'version' });
    expect(parseCliArgs(['-V'])).toEqual({ kind: 'version' });
  });

  it('parses a scenario with flags in both forms', () => {
    expect(parseCliArgs(['weather', '--api', 'chat', '--mode=strict'])).toEqual({
      kind: 'run',
      scenario: 'weather',
      flags: { api: 'chat', mode: 'strict' },
    });
  });

  it('parses the extract scenario with a repo name', () => {
    expect(parseCliArgs(['extract', '--repo', 'tiny-search', '--model', 'gpt-4o'])).toEqual({
      kind: 'run',
      scenario: 'extract',
      flags: { repo: 'tiny-search', model: 'gpt-4o' },
    });
  });

  it('rejects an unknown scenario', () => {
    expect(parseCliArgs(['forecast'])).toEqual({ kind: 'invalid', message: "Unknown scenario 'forecast'." });
  });

  it('rejects a positional argument after the scenario', () => {
    expect(parseCliArgs(['weather', 'chat'])).toEqual({
      kind: 'invalid',
      message: "Unexpected argument 'chat'.",
    });
  });

  it('rejects a flag without a value', () => {
    expect(parseCliArgs(['weather', '--api'])).toEqual({ kind: 'invalid', message: "Missing value for '--api'." });
    expect(parseCliArgs(['weather', '--api', '--mode', 'weak'])).toEqual({
      kind: 'invalid',
      message: "Missing value for '--api'.",
    });
  });

  it('rejects a flag value outside its choices', () => {
    expect(parseCliArgs(['weather', '--mode', 'loose'])).toEqual({
      kind: 'invalid',
      message: "--mode: Invalid enum value. Expected 'weak' | 'strict', received 'loose'",
    });
  });

  it('rejects an unknown flag', () => {
    expect(parseCliArgs(['weather', '--temperature', '0.2'])).toEqual({
      kind: 'invalid',
      message: "Unrecognized key(s) in object: 'temperature'",
    });
  });
});
