/**
 * In-process generation backend driven by handler functions.
 *
 * Used for dry runs and tests; no subprocess or network.
 *
 * @packageDocumentation
 */

import { extractJSON } from './prompt.js';
import {
  createBackendError,
  createFailureResult,
  createSchemaError,
  createSuccessResult,
  type GenerationBackend,
  type GenerationError,
  type GenerationRequest,
  type GenerationResult,
} from './types.js';

/**
 * What a handler answers: structured data, raw text to parse, or a failure.
 */
export type ScriptedReply =
  | { readonly data: unknown }
  | { readonly raw: string }
  | { readonly error: GenerationError };

/**
 * Handler for one task. `call` counts calls for this task from 1.
 */
export type ScriptedHandler = (
  request: GenerationRequest,
  call: number
) => ScriptedReply | Promise<ScriptedReply>;

/**
 * Replies in order, repeating the last one.
 */
export function sequence(...replies: readonly ScriptedReply[]): ScriptedHandler {
  return (_request, call) => {
    const reply = replies[Math.min(call, replies.length) - 1];
    if (reply === undefined) {
      return { error: createBackendError('Empty reply sequence', false) };
    }
    return reply;
  };
}

export class ScriptedBackend implements GenerationBackend {
  public readonly name = 'scripted';
  /** Every request received, in order. */
  public readonly calls: GenerationRequest[] = [];
  private readonly handlers = new Map<string, ScriptedHandler>();
  private readonly counts = new Map<string, number>();

  constructor(handlers: Readonly<Record<string, ScriptedHandler>> = {}) {
    for (const [task, handler] of Object.entries(handlers)) {
      this.handlers.set(task, handler);
    }
  }

  /**
   * Registers a handler for a task (matched first) or a schema name.
   */
  on(taskOrSchema: string, handler: ScriptedHandler): this {
    this.handlers.set(taskOrSchema, handler);
    return this;
  }

  /**
   * Requests received for one task.
   */
  callsFor(task: string): GenerationRequest[] {
    return this.calls.filter((call) => call.task === task);
  }

  async generate(request: GenerationRequest): Promise<GenerationResult<unknown>> {
    this.calls.push(request);
    const key = this.handlers.has(request.task) ? request.task : request.schema;
    const handler = this.handlers.get(key);
    if (handler === undefined) {
      return createFailureResult(
        createBackendError(`No scripted reply for task '${request.task}'`, false)
      );
    }

    const call = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, call);
    const reply = await handler(request, call);

    if ('error' in reply) {
      return createFailureResult(reply.error);
    }
    if ('raw' in reply) {
      const json = extractJSON(reply.raw);
      if (json === null) {
        return createFailureResult(
          createSchemaError(request.schema, ['(root): no JSON object found in output'], reply.raw)
        );
      }
      const data: unknown = JSON.parse(json);
      return createSuccessResult(data, reply.raw);
    }
    return createSuccessResult(reply.data, JSON.stringify(reply.data));
  }
}
