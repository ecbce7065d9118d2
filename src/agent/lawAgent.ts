import pLimit from "p-limit";
import type { AppConfig } from "../config/env";
import { createChatModel, OpenAIJsonModel } from "../llm/client";
import { DEFAULT_TEMPLATES, ResponseTemplates } from "../llm/prompt";
import type { SessionDependencies } from "../session";
import type { AgentResponse, NoDataReason, RetrievalAttempt } from "../types";
import { ConsultationAbortedError } from "../errors";
import { describeError, sleep, throwIfAborted } from "../utils";
import { QueryReformulator, ToolCallReformulator, VerbatimReformulator } from "./reformulate";
import { KeywordScopeClassifier, LlmScopeClassifier, ScopeClassifier } from "./scope";
import { ConsultationState, createConsultationState, finalizeResponse, recordAttempt, transition } from "./state";
import { AnswerSynthesizer, ExtractiveSynthesizer, LlmAnswerSynthesizer, payloadText } from "./synthesize";
import { createExpertTool, ExpertTool } from "./tools";

export const DEFAULT_NO_CONTEXT_MARKERS = ["[no-context]"];

export interface LawAgentOptions {
  classifier: ScopeClassifier;
  reformulator: QueryReformulator;
  synthesizer: AnswerSynthesizer;
  expert: ExpertTool;
  templates?: ResponseTemplates;
  maxAttempts?: number;
  retryDelayMs?: number;
  noContextMarkers?: string[];
}

export interface AnswerOptions {
  signal?: AbortSignal;
}

export interface AnswerManyOptions extends AnswerOptions {
  concurrency?: number;
}

export type BatchAnswer =
  | { query: string; ok: true; response: AgentResponse }
  | { query: string; ok: false; error: Error };

export class LawAgent {
  private readonly templates: ResponseTemplates;

  private readonly maxAttempts: number;

  private readonly retryDelayMs: number;

  private readonly noContextMarkers: string[];

  constructor(private readonly options: LawAgentOptions) {
    this.templates = options.templates ?? DEFAULT_TEMPLATES;
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? 2));
    this.retryDelayMs = options.retryDelayMs ?? 0;
    this.noContextMarkers = options.noContextMarkers ?? DEFAULT_NO_CONTEXT_MARKERS;
  }

  async answer(query: string, { signal }: AnswerOptions = {}): Promise<AgentResponse> {
    if (query.trim().length === 0) {
      throw new TypeError("Query must be a non-empty string");
    }
    throwIfAborted(signal);

    let state = createConsultationState(query);
    const scope = await this.options.classifier.classify(query, { signal });
    throwIfAborted(signal);
    if (scope.decision === "refuse") {
      state = transition(state, "refuse");
      return finalizeResponse(state, "refused", scope.refusal);
    }

    let previousQuery: string | undefined;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      if (attempt > 1) {
        state = transition(state, "retry");
        await sleep(this.retryDelayMs, signal);
      }
      state = transition(state, "invoke");

      const searchQuery = await this.reformulate(query, attempt, previousQuery, signal);
      throwIfAborted(signal);
      const startedAt = new Date().toISOString();
      const result = await this.options.expert.call(searchQuery, { signal });
      const record: RetrievalAttempt = { query: searchQuery, result, startedAt, finishedAt: new Date().toISOString() };
      state = recordAttempt(state, record);
      state = transition(state, "evaluate");

      if (result.ok) {
        if (!this.isUsable(result.payload)) {
          return this.noData(state, "empty_payload");
        }
        const text = await this.options.synthesizer.synthesize({ question: query, evidence: result }, { signal });
        throwIfAborted(signal);
        if (text === null) {
          return this.noData(state, "empty_payload");
        }
        state = transition(state, "synthesize");
        return finalizeResponse(state, "answered", text);
      }

      console.warn(`Expert retrieval attempt ${attempt}/${this.maxAttempts} failed (${result.kind}): ${result.detail}`);
      previousQuery = searchQuery;
    }

    return this.noData(state, "retrieval_failed");
  }

  /** Each query settles on its own; one failure does not discard the other answers. */
  async answerMany(queries: string[], { concurrency = 4, signal }: AnswerManyOptions = {}): Promise<BatchAnswer[]> {
    const limit = pLimit(concurrency);
    const settled = await Promise.allSettled(queries.map((query) => limit(() => this.answer(query, { signal }))));
    return settled.map((outcome, index): BatchAnswer => {
      const query = queries[index];
      if (outcome.status === "fulfilled") {
        return { query, ok: true, response: outcome.value };
      }
      const error = outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
      return { query, ok: false, error };
    });
  }

  private async reformulate(
    question: string,
    attempt: number,
    previousQuery: string | undefined,
    signal?: AbortSignal
  ): Promise<string> {
    try {
      return await this.options.reformulator.reformulate({ question, attempt, previousQuery }, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new ConsultationAbortedError();
      }
      console.warn("Query reformulation failed, searching with the original question", describeError(error));
      return question.trim();
    }
  }

  private isUsable(payload: string): boolean {
    const text = payloadText(payload).trim();
    return text.length > 0 && !this.noContextMarkers.some((marker) => text.includes(marker));
  }

  private noData(state: ConsultationState, reason: NoDataReason): AgentResponse {
    return finalizeResponse(transition(state, "no_data"), "no_data", this.templates.notFound, reason);
  }
}

export function buildLawAgent(
  config: Pick<AppConfig, "llm" | "scopeClassifier" | "firmName" | "retrieval">,
  session: SessionDependencies
): LawAgent {
  const expert = createExpertTool(session);
  const promptOptions = { firmName: config.firmName, templates: DEFAULT_TEMPLATES };

  const classifier: ScopeClassifier =
    config.scopeClassifier === "llm" && config.llm
      ? new LlmScopeClassifier(new OpenAIJsonModel(config.llm))
      : new KeywordScopeClassifier();

  const chatModel = config.llm ? createChatModel(config.llm) : null;
  const reformulator: QueryReformulator = chatModel
    ? new ToolCallReformulator(chatModel, expert.definition, promptOptions)
    : new VerbatimReformulator();
  const synthesizer: AnswerSynthesizer = chatModel
    ? new LlmAnswerSynthesizer(chatModel, promptOptions)
    : new ExtractiveSynthesizer();

  return new LawAgent({
    classifier,
    reformulator,
    synthesizer,
    expert,
    templates: DEFAULT_TEMPLATES,
    maxAttempts: config.retrieval.maxAttempts,
    retryDelayMs: config.retrieval.retryDelayMs
  });
}
