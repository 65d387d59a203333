import { describe, expect, it } from 'vitest';
import { ConfigParseError } from '../config/index.js';
import { GenerationFailureError } from '../errors.js';
import { GateDecisionError } from '../workflow/engine.js';
import { StatePersistenceError } from '../workflow/persistence.js';
import { CliUsageError, classifyError, formatErrorWithSuggestions } from './errors.js';

describe('classifyError', () => {
  it('should classify known errors', () => {
    expect(classifyError(new CliUsageError('x'))).toBe('usage');
    expect(classifyError(new StatePersistenceError('x', 'parse_error'))).toBe('state');
    expect(classifyError(new GateDecisionError('x', null, 'approve'))).toBe('gate');
    expect(classifyError(new GenerationFailureError('x', 'idea-analysis', 3))).toBe('pipeline');
    expect(classifyError(new Error('x'))).toBe('unknown');
    expect(classifyError('text')).toBe('unknown');
  });

  it('should treat config parse errors as config problems', () => {
    expect(classifyError(new ConfigParseError('bad toml'))).toBe('config');
  });
});

describe('formatErrorWithSuggestions', () => {
  it('should list suggestions after the message', () => {
    expect(formatErrorWithSuggestions(new GateDecisionError('No decision gate is open', null, 'approve'))).toBe(
      ['Error: No decision gate is open', '', 'Suggestions:', '  - See which gate is open and what it expects: throughline status'].join(
        '\n'
      )
    );
  });
});
