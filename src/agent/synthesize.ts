import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import { ChatModelLike, extractText, ModelCallOptions } from "../llm/client";
import { buildSynthesisPrompt, buildSystemPrompt, NO_GROUNDED_ANSWER, PromptOptions } from "../llm/prompt";
import { ConsultationAbortedError, ReasoningEngineError } from "../errors";
import type { RetrievalSuccess } from "../types";
import { describeError, safeJsonParse } from "../utils";

export interface GroundedContext {
  question: string;
  evidence: RetrievalSuccess;
}

export interface AnswerSynthesizer {
  /** Resolves to null when the evidence does not answer the question. */
  synthesize(context: GroundedContext, options?: ModelCallOptions): Promise<string | null>;
}

// Markers must be followed by whitespace: "1.5 مليون" is a figure, not an item.
const LIST_MARKER = /^\s*(?:[-*•▪◦]|[0-9٠-٩]+[.)\-–:]|\([0-9٠-٩]+\))\s+/;

export function payloadText(payload: string): string {
  const parsed = safeJsonParse<unknown>(payload);
  if (parsed && typeof parsed === "object" && "response" in parsed && typeof parsed.response === "string") {
    return parsed.response;
  }
  return payload;
}

export class ExtractiveSynthesizer implements AnswerSynthesizer {
  async synthesize({ evidence }: GroundedContext): Promise<string | null> {
    const lines = payloadText(evidence.payload)
      .split(/\r?\n/)
      .map((line) => line.replace(LIST_MARKER, "").trim())
      .filter((line) => line.length > 0);

    if (lines.length === 0) {
      return null;
    }
    if (lines.length === 1) {
      return lines[0];
    }
    return lines.map((line) => `- ${line}`).join("\n");
  }
}

export class LlmAnswerSynthesizer implements AnswerSynthesizer {
  constructor(
    private readonly model: ChatModelLike,
    private readonly promptOptions: PromptOptions = {}
  ) {}

  async synthesize({ question, evidence }: GroundedContext, { signal }: ModelCallOptions = {}): Promise<string | null> {
    let text: string;
    try {
      const response = await this.model.invoke(
        [
          new SystemMessage(buildSystemPrompt(this.promptOptions)),
          new HumanMessage(buildSynthesisPrompt(question, payloadText(evidence.payload)))
        ],
        { signal }
      );
      text = extractText(response);
    } catch (error) {
      if (signal?.aborted) {
        throw new ConsultationAbortedError();
      }
      throw new ReasoningEngineError(`Answer synthesis failed: ${describeError(error)}`, error);
    }

    if (text.length === 0 || text.includes(NO_GROUNDED_ANSWER)) {
      return null;
    }
    return text;
  }
}
