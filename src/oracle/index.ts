// ============================================================================
// CLASSIFICATION ORACLE
// ============================================================================
// The natural-language classifier behind the engine. Its answer is returned
// raw (text or tool-call arguments) and decoded by the caller; this module
// only talks to the model.

import { ChatBedrockConverse } from "@langchain/aws";
import { ChatOpenAI } from "@langchain/openai";
import { SystemMessage, HumanMessage, type BaseMessage } from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { MessageContent } from "@langchain/core/messages";

import { OracleUnavailableError } from "../engine/errors.js";
import { loadLexicon } from "../lexicon/index.js";
import type { TextCompleter } from "../summary/index.js";
import {
  DEFAULT_LLM_CONFIG,
  type IdeaTree,
  type LLMConfig,
  type Locale,
  type RawProposal,
} from "../types/index.js";
import { buildClassificationPrompt, buildSystemPrompt, CLASSIFY_NOTE_TOOL } from "./prompt.js";

export { buildClassificationPrompt, buildSystemPrompt, CLASSIFY_NOTE_TOOL } from "./prompt.js";

/**
 * Anything that can classify a note against the current tree.
 * Implementations throw OracleUnavailableError on transport failure or timeout.
 */
export interface ClassificationOracle {
  classify(noteText: string, tree: IdeaTree, locale: Locale, now?: Date): Promise<RawProposal>;
}

// ============================================================================
// LLM MODEL CREATION
// ============================================================================

export function createModel(llmConfig: LLMConfig): BaseChatModel {
  const temperature = llmConfig.temperature ?? DEFAULT_LLM_CONFIG.temperature;

  switch (llmConfig.provider) {
    case "bedrock":
      return new ChatBedrockConverse({
        model: llmConfig.bedrock?.model || "anthropic.claude-3-5-sonnet-20241022-v2:0",
        region: llmConfig.bedrock?.region || "us-east-1",
        temperature,
      });
    case "openai":
      if (!llmConfig.openai) throw new Error("OpenAI config not found");
      return new ChatOpenAI({
        modelName: llmConfig.openai.model,
        openAIApiKey: llmConfig.openai.apiKey,
        configuration: { baseURL: llmConfig.openai.baseUrl },
        temperature,
      });
    case "local":
      if (!llmConfig.local) throw new Error("Local config not found");
      return new ChatOpenAI({
        modelName: llmConfig.local.model,
        openAIApiKey: llmConfig.local.apiKey || "not-needed",
        configuration: { baseURL: llmConfig.local.baseUrl },
        temperature,
      });
  }
}

/**
 * Flattens message content to its text parts.
 */
export function contentToText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((part) => (part.type === "text" && "text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    return error.name === "TimeoutError" || error.name === "AbortError" ? "request timed out" : error.message;
  }
  return String(error);
}

// ============================================================================
// LANGCHAIN ORACLE
// ============================================================================

export interface LangChainOracleOptions {
  timeoutMs?: number;
  toolCalling?: boolean;
}

export class LangChainOracle implements ClassificationOracle, TextCompleter {
  private readonly timeoutMs: number;
  private readonly toolCalling: boolean;

  constructor(
    private readonly model: BaseChatModel,
    options: LangChainOracleOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LLM_CONFIG.timeoutMs ?? 240_000;
    this.toolCalling = options.toolCalling ?? false;
  }

  static fromConfig(llmConfig: LLMConfig): LangChainOracle {
    return new LangChainOracle(createModel(llmConfig), {
      timeoutMs: llmConfig.timeoutMs,
      toolCalling: llmConfig.toolCalling,
    });
  }

  async classify(noteText: string, tree: IdeaTree, locale: Locale, now = new Date()): Promise<RawProposal> {
    const lexicon = loadLexicon(locale);
    const messages: BaseMessage[] = [
      new SystemMessage(buildSystemPrompt(lexicon)),
      new HumanMessage(buildClassificationPrompt(noteText, tree, lexicon, now)),
    ];

    try {
      return this.toolCalling ? await this.invokeWithTools(messages) : await this.invokeForText(messages);
    } catch (error) {
      throw new OracleUnavailableError(`Classifier unavailable: ${describeFailure(error)}`, { cause: error });
    }
  }

  /**
   * Free-form completion, used for tree summaries.
   */
  async complete(system: string, prompt: string): Promise<string> {
    try {
      const response = await this.model.invoke([new SystemMessage(system), new HumanMessage(prompt)], {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return contentToText(response.content);
    } catch (error) {
      throw new OracleUnavailableError(`Summarizer unavailable: ${describeFailure(error)}`, { cause: error });
    }
  }

  private async invokeForText(messages: BaseMessage[]): Promise<RawProposal> {
    const response = await this.model.invoke(messages, { signal: AbortSignal.timeout(this.timeoutMs) });
    return { kind: "text", text: contentToText(response.content) };
  }

  /**
   * Tool calls become proposals directly. A model that answers in prose
   * instead is read as text.
   */
  private async invokeWithTools(messages: BaseMessage[]): Promise<RawProposal> {
    if (!this.model.bindTools) {
      throw new Error("The configured model does not support tool calling");
    }
    const bound = this.model.bindTools([CLASSIFY_NOTE_TOOL]);
    const response = await bound.invoke(messages, { signal: AbortSignal.timeout(this.timeoutMs) });

    const calls = (response.tool_calls ?? [])
      .filter((call) => call.name === CLASSIFY_NOTE_TOOL.function.name)
      .map((call) => call.args);

    if (calls.length > 0) return { kind: "tool-call", calls };
    return { kind: "text", text: contentToText(response.content) };
  }
}
