/**
 * LLM providers for touchpilot.
 *
 * Supports:
 * - OpenAI, Groq and OpenRouter through the OpenAI SDK and their
 *   OpenAI-compatible endpoints
 * - AWS Bedrock, Anthropic models (Messages API body)
 *
 * A planner returns the raw reply text; turning it into an Action is the
 * response interpreter's job.
 */

import OpenAI from "openai";
import { BedrockRuntimeClient, InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import { z } from "zod";
import { getModel, type AgentConfig } from "./config.js";
import { BEDROCK_ANTHROPIC_MODELS, GROQ_API_BASE_URL, OPENROUTER_API_BASE_URL } from "./constants.js";
import { ConfigurationError } from "./errors.js";
import { buildMessages, type ChatMessage, type PlanRequest } from "./prompts.js";
import type { Action } from "./types.js";

export interface Planner {
  readonly name: string;
  /** Raw reply text, or an already-built action. */
  planAction(request: PlanRequest): Promise<string | Action>;
}

// ===========================================
// OpenAI-compatible Provider (OpenAI / Groq / OpenRouter)
// ===========================================

function textOf(content: ChatMessage["content"]): string {
  if (typeof content === "string") return content;
  return content.map((p) => (p.type === "text" ? p.text : "")).join("\n");
}

export function toOpenAIMessages(
  messages: ChatMessage[],
  supportsImages: boolean
): OpenAI.ChatCompletionMessageParam[] {
  return messages.map((msg): OpenAI.ChatCompletionMessageParam => {
    if (msg.role === "system") return { role: "system", content: textOf(msg.content) };
    if (msg.role === "assistant") return { role: "assistant", content: textOf(msg.content) };
    if (typeof msg.content === "string") return { role: "user", content: msg.content };
    const parts = msg.content.map((part): OpenAI.ChatCompletionContentPart => {
      if (part.type === "text") return { type: "text", text: part.text };
      if (supportsImages) {
        return { type: "image_url", image_url: { url: `data:${part.mimeType};base64,${part.base64}`, detail: "high" } };
      }
      // Text-only models get a placeholder
      return { type: "text", text: "[Screenshot attached]" };
    });
    return { role: "user", content: parts };
  });
}

export interface OpenAIPlannerOptions {
  name: string;
  apiKey: string;
  model: string;
  baseURL?: string;
  supportsImages?: boolean;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAIPlanner implements Planner {
  readonly name: string;
  private readonly client: OpenAI;
  private readonly options: OpenAIPlannerOptions;

  constructor(options: OpenAIPlannerOptions) {
    this.name = options.name;
    this.options = options;
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  async planAction(request: PlanRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.options.model,
      messages: toOpenAIMessages(buildMessages(request), this.options.supportsImages ?? true),
      temperature: this.options.temperature ?? 0.2,
      max_tokens: this.options.maxTokens ?? 1024,
    });
    return response.choices[0]?.message.content ?? "";
  }
}

// ===========================================
// AWS Bedrock Provider (Anthropic)
// ===========================================

type AnthropicContent =
  | { type: "text"; text: string }
  | { type: "image"; source: { type: "base64"; media_type: string; data: string } };

export function isAnthropicModel(model: string): boolean {
  return BEDROCK_ANTHROPIC_MODELS.some((id) => model.includes(id));
}

export function buildAnthropicBody(messages: ChatMessage[], maxTokens = 1024): string {
  const systemMsg = messages.find((m) => m.role === "system");
  const converted = messages
    .filter((m) => m.role !== "system")
    .map((msg) => {
      if (typeof msg.content === "string") return { role: msg.role, content: msg.content };
      const parts = msg.content.map((part): AnthropicContent => {
        if (part.type === "text") return { type: "text", text: part.text };
        return { type: "image", source: { type: "base64", media_type: part.mimeType, data: part.base64 } };
      });
      return { role: msg.role, content: parts };
    });

  return JSON.stringify({
    anthropic_version: "bedrock-2023-05-31",
    max_tokens: maxTokens,
    system: typeof systemMsg?.content === "string" ? systemMsg.content : "",
    messages: converted,
  });
}

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

/** Joined text blocks of a Messages API response body. */
export function extractAnthropicText(body: string): string {
  const parsed = anthropicResponseSchema.safeParse(JSON.parse(body));
  if (!parsed.success) return "";
  return parsed.data.content
    .filter((block) => block.type === "text")
    .map((block) => block.text ?? "")
    .join("");
}

export class BedrockPlanner implements Planner {
  readonly name = "bedrock";
  private readonly client: BedrockRuntimeClient;
  private readonly model: string;

  constructor(region: string, model: string) {
    if (!isAnthropicModel(model)) {
      throw new ConfigurationError("Bedrock planner needs an Anthropic model", [`BEDROCK_MODEL: ${model}`]);
    }
    this.client = new BedrockRuntimeClient({ region });
    this.model = model;
  }

  async planAction(request: PlanRequest): Promise<string> {
    const command = new InvokeModelCommand({
      modelId: this.model,
      body: new TextEncoder().encode(buildAnthropicBody(buildMessages(request))),
      contentType: "application/json",
      accept: "application/json",
    });
    const response = await this.client.send(command);
    return extractAnthropicText(new TextDecoder().decode(response.body));
  }
}

// ===========================================
// Factory
// ===========================================

function requireKey(key: string | undefined, name: string): string {
  if (!key) throw new ConfigurationError(`${name} is required`);
  return key;
}

export function getPlanner(config: AgentConfig): Planner {
  const model = getModel(config);
  switch (config.llmProvider) {
    case "bedrock":
      return new BedrockPlanner(config.awsRegion, model);
    case "groq":
      return new OpenAIPlanner({
        name: "groq",
        apiKey: requireKey(config.groqApiKey, "GROQ_API_KEY"),
        model,
        baseURL: GROQ_API_BASE_URL,
      });
    case "openrouter":
      return new OpenAIPlanner({
        name: "openrouter",
        apiKey: requireKey(config.openrouterApiKey, "OPENROUTER_API_KEY"),
        model,
        baseURL: OPENROUTER_API_BASE_URL,
      });
    case "openai":
      return new OpenAIPlanner({
        name: "openai",
        apiKey: requireKey(config.openaiApiKey, "OPENAI_API_KEY"),
        model,
      });
  }
}
