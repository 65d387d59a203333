import { describe, it, expect } from 'vitest';
import { extractJSON, renderPrompt } from './prompt.js';

describe('renderPrompt', () => {
  it('should render task, instruction, context and the schema line', () => {
    const prompt = renderPrompt({
      task: 'idea-analysis',
      schema: 'idea-analysis',
      instruction: 'Analyse the idea.',
      context: 'A garden club app.',
      feedback: [],
    });

    expect(prompt).toBe(
      [
        '# Task: idea-analysis',
        'Analyse the idea.',
        '## Context',
        'A garden club app.',
        "Respond with a single JSON object conforming to the 'idea-analysis' schema. No prose.",
      ].join('\n\n') + '\n'
    );
  });

  it('should add corrective feedback as a bullet list', () => {
    const prompt = renderPrompt({
      task: 'capability-model',
      schema: 'capabilities',
      instruction: 'List capabilities.',
      context: 'ctx',
      feedback: ['keep it closed', 'add a summary'],
    });

    expect(prompt).toContain('## Corrective feedback\n\n- keep it closed\n- add a summary\n\n');
  });
});

describe('extractJSON', () => {
  it('should extract an object surrounded by prose', () => {
    expect(extractJSON('Here you go: {"a": {"b": 1}} thanks')).toBe('{"a": {"b": 1}}');
  });

  it('should fall back to the last balanced object', () => {
    expect(extractJSON('note {oops\n{"x":1}')).toBe('{"x":1}');
  });

  it('should return null when nothing parses', () => {
    expect(extractJSON('no json here')).toBeNull();
    expect(extractJSON('{not json}')).toBeNull();
  });
});
