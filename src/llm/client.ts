import OpenAI from "openai";
import { ChatOpenAI } from "@langchain/openai";
import type { BaseMessage } from "@langchain/core/messages";
import type { StructuredToolInterface } from "@langchain/core/tools";
import { z } from "zod";
import type { LlmConfig } from "../config/env";
import { ReasoningEngineError } from "../errors";
import { safeJsonParse } from "../utils";

export type ChatMessage = { role: "system" | "user" | "assistant"; content: string };

export interface ModelCallOptions {
  signal?: AbortSignal;
}

export interface JsonModel {
  completeJson(messages: ChatMessage[], options?: ModelCallOptions): Promise<string>;
}

export interface ChatModelLike {
  invoke(messages: BaseMessage[], options?: ModelCallOptions): Promise<BaseMessage>;
}

export interface ToolCallLike {
  name: string;
  args: Record<string, unknown>;
}

export interface ToolCallingChatModel {
  bindTools(
    tools: StructuredToolInterface[],
    kwargs?: { tool_choice?: string }
  ): { invoke(messages: BaseMessage[], options?: ModelCallOptions): Promise<{ tool_calls?: ToolCallLike[] }> };
}

export class OpenAIJsonModel implements JsonModel {
  private readonly client: OpenAI;

  constructor(private readonly config: LlmConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL });
  }

  async completeJson(messages: ChatMessage[], { signal }: ModelCallOptions = {}): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.config.model,
        response_format: { type: "json_object" },
        temperature: 0,
        messages,
        max_tokens: 200
      },
      { signal }
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new ReasoningEngineError("Model returned empty response");
    }
    return content;
  }
}

export function createChatModel(config: LlmConfig): ChatOpenAI {
  return new ChatOpenAI({
    model: config.model,
    apiKey: config.apiKey,
    temperature: 0.2,
    maxTokens: 1200,
    configuration: config.baseURL ? { baseURL: config.baseURL } : undefined
  });
}

export async function askModel<T>(
  model: JsonModel,
  messages: ChatMessage[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: ModelCallOptions = {}
): Promise<T> {
  const content = await model.completeJson(messages, options);
  const parsed = safeJsonParse<unknown>(content);
  if (parsed === null) {
    throw new ReasoningEngineError("Model returned invalid JSON");
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new ReasoningEngineError(`Model response failed validation: ${result.error.message}`);
  }
  return result.data;
}

export function extractText(message: BaseMessage): string {
  const content = message.content;
  if (typeof content === "string") {
    return content.trim();
  }
  if (Array.isArray(content)) {
    return content
      .map((chunk) => {
        if (typeof chunk === "string") {
          return chunk;
        }
        if ("text" in chunk && typeof chunk.text === "string") {
          return chunk.text;
        }
        return "";
      })
      .join("")
      .trim();
  }
  return "";
}
