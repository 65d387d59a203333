/**
 * Prompt text for text-in/text-out backends.
 *
 * @packageDocumentation
 */

import type { GenerationRequest } from './types.js';

/**
 * Renders a request as one prompt document.
 *
 * @example
 * ```typescript
 * renderPrompt({ task: 'idea-analysis', schema: 'idea-analysis', instruction: 'Analyse the idea.',
 *   context: '...', feedback: [] });
 * ```
 */
export function renderPrompt(request: GenerationRequest): string {
  const parts = [
    `# Task: ${request.task}`,
    request.instruction,
    '## Context',
    request.context,
  ];

  if (request.feedback.length > 0) {
    parts.push('## Corrective feedback', request.feedback.map((f) => `- ${f}`).join('\n'));
  }

  parts.push(
    `Respond with a single JSON object conforming to the '${request.schema}' schema. No prose.`
  );
  return parts.join('\n\n') + '\n';
}

/**
 * Extracts the first JSON object from free-form text.
 *
 * Tries brace matching from the first `{`, then from the last `}` backwards,
 * then progressively shorter prefixes.
 *
 * @returns The JSON text, or null if none parses.
 */
export function extractJSON(content: string): string | null {
  const parses = (candidate: string): boolean => {
    try {
      JSON.parse(candidate);
      return true;
    } catch {
      return false;
    }
  };

  const first = content.indexOf('{');
  if (first !== -1) {
    let depth = 0;
    for (let i = first; i < content.length; i++) {
      const ch = content.charAt(i);
      if (ch === '{') {
        depth++;
      } else if (ch === '}') {
        depth--;
        if (depth === 0) {
          const candidate = content.slice(first, i + 1);
          if (parses(candidate)) {
            return candidate;
          }
          break;
        }
      }
    }
  }

  const last = content.lastIndexOf('}');
  if (last !== -1) {
    let depth = 0;
    for (let i = last; i >= 0; i--) {
      const ch = content.charAt(i);
      if (ch === '}') {
        depth++;
      } else if (ch === '{') {
        depth--;
        if (depth === 0) {
          const candidate = content.slice(i, last + 1);
          if (parses(candidate)) {
            return candidate;
          }
          break;
        }
      }
    }
  }

  if (first !== -1 && last !== -1) {
    for (let length = last - first + 1; length > 0; length--) {
      const candidate = content.slice(first, first + length);
      if (parses(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}
