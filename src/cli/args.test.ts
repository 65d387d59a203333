import { describe, expect, it } from 'vitest';
import { flagValue, flagValues, parseArgs } from './args.js';
import { CliUsageError } from './errors.js';
import { parseDecision, parseOverride, parseSelection } from './commands/resume.js';

describe('parseArgs', () => {
  it('should split positionals, value flags and switches', () => {
    const parsed = parseArgs(['request-changes', '--feedback', 'fewer items', '--json', '--stage=scope-boundaries'], [
      'feedback',
      'stage',
    ]);

    expect(parsed.positionals).toEqual(['request-changes']);
    expect(flagValue(parsed, 'feedback')).toBe('fewer items');
    expect(flagValue(parsed, 'stage')).toBe('scope-boundaries');
    expect(parsed.switches.has('json')).toBe(true);
  });

  it('should collect repeated value flags in order', () => {
    const parsed = parseArgs(['--select', 'a=1', '--select', 'b=2'], ['select']);

    expect(flagValues(parsed, 'select')).toEqual(['a=1', 'b=2']);
    expect(flagValue(parsed, 'select')).toBe('b=2');
    expect(flagValues(parsed, 'ack')).toEqual([]);
  });

  it('should reject a value flag without a value', () => {
    expect(() => parseArgs(['--feedback'], ['feedback'])).toThrow('--feedback needs a value');
    expect(() => parseArgs(['--feedback', '--json'], ['feedback'])).toThrow(CliUsageError);
  });
});

describe('resume decisions', () => {
  it('should parse a clarification selection', () => {
    expect(parseSelection('season = all year')).toEqual({ invariant: 'season', option: 'all year' });
    expect(() => parseSelection('season')).toThrow('--select takes <invariant>=<option>, got "season"');
  });

  it('should keep colons inside an override reason', () => {
    expect(parseOverride('community_model:capability-model:club votes: yes')).toEqual({
      invariant: 'community_model',
      stage: 'capability-model',
      reason: 'club votes: yes',
    });
  });

  it('should reject an override naming an unknown stage', () => {
    expect(() => parseOverride('community_model:launch:because')).toThrow('Unknown stage "launch" in --ack');
    expect(() => parseOverride('community_model:capability-model:')).toThrow(CliUsageError);
  });

  it('should build each decision type', () => {
    expect(parseDecision('approve', parseArgs([]))).toEqual({ type: 'approve' });
    expect(
      parseDecision('request-changes', parseArgs(['--feedback', 'split it', '--stage', 'capability-model'], ['feedback', 'stage']))
    ).toEqual({ type: 'request-changes', feedback: 'split it', stage: 'capability-model' });
    expect(parseDecision('resolve', parseArgs(['--select', 'season=all year'], ['select']))).toEqual({
      type: 'resolve-ambiguity',
      selections: [{ invariant: 'season', option: 'all year' }],
    });
  });

  it('should require the flags each decision needs', () => {
    expect(() => parseDecision('request-changes', parseArgs([]))).toThrow('request-changes needs --feedback <text>');
    expect(() => parseDecision('override', parseArgs([]))).toThrow(
      'override needs at least one --ack <invariant>:<stage>:<reason>'
    );
    expect(() => parseDecision('skip', parseArgs([]))).toThrow(
      'Unknown decision "skip"; use approve, request-changes, resolve or override'
    );
  });
});
