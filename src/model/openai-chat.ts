// pattern: Imperative Shell

import OpenAI from "openai";
import type {
  ContentBlock,
  Message,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  StopReason,
  ToolDefinition,
} from "./types.js";
import { ModelError } from "./types.js";

/**
 * The one chat-completions call the adapter needs.
 * Both OpenAI and AzureOpenAI clients satisfy it through `client.chat.completions.create`.
 */
export type ChatCompletionCreate = (
  body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
  options?: { signal?: AbortSignal },
) => Promise<OpenAI.Chat.ChatCompletion>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeToolDefinitions(
  tools: ReadonlyArray<ToolDefinition>
): Array<OpenAI.Chat.ChatCompletionTool> {
  return tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.input_schema,
    },
  }));
}

function parseToolArguments(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = raw.trim() === "" ? {} : JSON.parse(raw);
  } catch {
    throw new ModelError("api_error", `failed to parse tool call arguments: ${raw}`);
  }
  if (!isRecord(parsed)) {
    throw new ModelError("api_error", `tool call arguments are not an object: ${raw}`);
  }
  return parsed;
}

function normalizeContentBlocks(
  content: string | null,
  toolCalls: Array<OpenAI.Chat.ChatCompletionMessageToolCall> | undefined
): Array<ContentBlock> {
  const blocks: Array<ContentBlock> = [];

  if (content) {
    blocks.push({ type: "text", text: content });
  }

  for (const toolCall of toolCalls ?? []) {
    blocks.push({
      type: "tool_use",
      id: toolCall.id,
      name: toolCall.function.name,
      input: parseToolArguments(toolCall.function.arguments),
    });
  }

  return blocks;
}

function normalizeStopReason(finishReason: string | null): StopReason {
  if (finishReason === "tool_calls") {
    return "tool_use";
  }
  if (finishReason === "length") {
    return "max_tokens";
  }
  if (finishReason === "stop") {
    return "end_turn";
  }
  return "stop_sequence";
}

/**
 * Convert one port message into chat-completions messages.
 * Tool results become `tool` role messages, one per result, so they directly
 * follow the assistant message that requested them.
 */
export function normalizeMessage(msg: Message): Array<OpenAI.Chat.ChatCompletionMessageParam> {
  if (typeof msg.content === "string") {
    return msg.role === "user"
      ? [{ role: "user", content: msg.content }]
      : [{ role: "assistant", content: msg.content }];
  }

  if (msg.role === "assistant") {
    const text = msg.content
      .flatMap((block) => (block.type === "text" ? [block.text] : []))
      .join("");
    const toolCalls: Array<OpenAI.Chat.ChatCompletionMessageToolCall> = msg.content.flatMap((block) =>
      block.type === "tool_use"
        ? [{ id: block.id, type: "function" as const, function: { name: block.name, arguments: JSON.stringify(block.input) } }]
        : []
    );

    return [
      {
        role: "assistant",
        content: text || null,
        ...(toolCalls.length > 0 && { tool_calls: toolCalls }),
      },
    ];
  }

  const messages: Array<OpenAI.Chat.ChatCompletionMessageParam> = [];
  for (const block of msg.content) {
    if (block.type === "tool_result") {
      messages.push({ role: "tool", tool_call_id: block.tool_use_id, content: block.content });
    } else if (block.type === "text") {
      messages.push({ role: "user", content: block.text });
    }
  }
  return messages;
}

function toModelError(error: unknown): unknown {
  if (error instanceof OpenAI.APIUserAbortError) {
    return error;
  }
  if (error instanceof OpenAI.AuthenticationError) {
    return new ModelError("auth", error.message || "authentication failed");
  }
  if (error instanceof OpenAI.RateLimitError) {
    return new ModelError("rate_limit", error.message || "rate limit exceeded");
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ModelError("timeout", error.message || "request timed out");
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ModelError("connection", error.message || "connection error");
  }
  if (error instanceof OpenAI.APIError) {
    return new ModelError("api_error", error.message || "api error");
  }
  return error;
}

export function createOpenAIChatAdapter(create: ChatCompletionCreate): ModelProvider {
  return {
    async complete(request: ModelRequest): Promise<ModelResponse> {
      const messages: Array<OpenAI.Chat.ChatCompletionMessageParam> = [];

      if (request.system) {
        messages.push({ role: "system", content: request.system });
      }

      messages.push(...request.messages.flatMap(normalizeMessage));

      let response: OpenAI.Chat.ChatCompletion;
      try {
        response = await create(
          {
            model: request.model,
            max_tokens: request.max_tokens,
            tools: request.tools && request.tools.length > 0 ? normalizeToolDefinitions(request.tools) : undefined,
            temperature: request.temperature,
            messages,
          },
          { signal: request.signal },
        );
      } catch (error) {
        throw toModelError(error);
      }

      const choice = response.choices[0];
      if (!choice) {
        throw new ModelError("api_error", "no choices in response");
      }

      return {
        content: normalizeContentBlocks(choice.message.content, choice.message.tool_calls),
        stop_reason: normalizeStopReason(choice.finish_reason),
      };
    },
  };
}
