// pattern: Imperative Shell

/**
 * Scripted model provider for tests. Each call to `complete` consumes the next step.
 */

import type { ModelProvider, ModelRequest, ModelResponse } from '../model/types.js';

export type ScriptStep = ModelResponse | Error | ((request: ModelRequest) => ModelResponse | Promise<ModelResponse>);

export type ScriptedModel = ModelProvider & {
  readonly requests: Array<ModelRequest>;
};

export function textResponse(text: string): ModelResponse {
  return {
    content: text === '' ? [] : [{ type: 'text', text }],
    stop_reason: 'end_turn',
  };
}

export function toolUseResponse(
  calls: ReadonlyArray<{ id: string; name: string; input: Record<string, unknown> }>,
  text = '',
): ModelResponse {
  return {
    content: [
      ...(text === '' ? [] : [{ type: 'text' as const, text }]),
      ...calls.map((call) => ({ type: 'tool_use' as const, ...call })),
    ],
    stop_reason: 'tool_use',
  };
}

export function createScriptedModel(steps: ReadonlyArray<ScriptStep>): ScriptedModel {
  const requests: Array<ModelRequest> = [];
  let next = 0;

  return {
    requests,
    async complete(request: ModelRequest): Promise<ModelResponse> {
      requests.push({ ...request, messages: request.messages.map((m) => ({ ...m })) });
      const step = steps[next++];
      if (step === undefined) {
        throw new Error(`scripted model exhausted after ${steps.length} calls`);
      }
      if (step instanceof Error) {
        throw step;
      }
      return typeof step === 'function' ? step(request) : step;
    },
  };
}
