// pattern: Imperative Shell

/**
 * Agent turn loop.
 * Calls the model with the turn context, dispatches requested tools through the
 * agent's own registry, and feeds results back until the model produces a reply.
 */

import { buildTurnMessages, emptyReplyPlaceholder, maxRoundsWarning } from './context.js';
import type { Agent, AgentDependencies, TurnContext } from './types.js';
import type { ContentBlock, Message, ModelResponse, ToolUseBlock } from '../model/types.js';
import { extractText } from '../model/types.js';
import type { TranscriptMessage } from '../conversation/types.js';
import { BackendUnavailableError, isAbortError } from '../errors.js';

export function createAgent(deps: AgentDependencies): Agent {
  const { name, instructions, model, registry, config } = deps;
  const tools = registry.toModelTools();

  async function complete(
    messages: ReadonlyArray<Message>,
    signal: AbortSignal | undefined,
    withTools = true,
  ): Promise<ModelResponse> {
    try {
      return await model.complete({
        messages,
        system: instructions,
        tools: withTools ? tools : undefined,
        model: config.model_name,
        max_tokens: config.max_tokens,
        temperature: config.temperature,
        signal,
      });
    } catch (error) {
      if (isAbortError(error, signal)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new BackendUnavailableError('model', `${name}: model backend failed: ${reason}`, { cause: error });
    }
  }

  function reply(content: string, turnIndex: number): TranscriptMessage {
    const text = content.trim() === '' ? emptyReplyPlaceholder(name) : content;
    return Object.freeze({ sender: name, content: text, turnIndex });
  }

  async function takeTurn(
    transcript: ReadonlyArray<TranscriptMessage>,
    context: TurnContext,
  ): Promise<TranscriptMessage> {
    const { task, turnIndex, signal, onEvent } = context;
    const messages = buildTurnMessages(name, task, transcript);

    for (let round = 0; round < config.max_tool_rounds; round++) {
      signal?.throwIfAborted();
      const response = await complete(messages, signal);

      const toolUses = response.content.filter((block): block is ToolUseBlock => block.type === 'tool_use');
      if (response.stop_reason !== 'tool_use' || toolUses.length === 0) {
        return reply(extractText(response.content), turnIndex);
      }

      messages.push({ role: 'assistant', content: response.content });

      const results: Array<ContentBlock> = [];
      for (const toolUse of toolUses) {
        onEvent?.({
          type: 'tool_call',
          agent: name,
          turnIndex,
          toolUseId: toolUse.id,
          name: toolUse.name,
          input: toolUse.input,
        });

        const result = await registry.dispatch(toolUse.name, toolUse.input, { signal });
        const output = result.success ? result.output : `Error: ${result.error ?? 'tool failed'}`;

        onEvent?.({
          type: 'tool_result',
          agent: name,
          turnIndex,
          toolUseId: toolUse.id,
          name: toolUse.name,
          output,
          isError: !result.success,
        });

        results.push({ type: 'tool_result', tool_use_id: toolUse.id, content: output, is_error: !result.success });
      }

      // Results go back together, directly after the assistant message that asked for them.
      messages.push({ role: 'user', content: results });
    }

    // Out of tool rounds: one last call without tools so the turn still ends with an answer.
    signal?.throwIfAborted();
    messages.push({ role: 'user', content: maxRoundsWarning(config.max_tool_rounds) });
    const final = await complete(messages, signal, false);
    return reply(extractText(final.content), turnIndex);
  }

  return {
    name,
    instructions,
    tools: registry.names(),
    takeTurn,
  };
}
