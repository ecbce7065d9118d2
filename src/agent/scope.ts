import { z } from "zod";
import { ConsultationAbortedError } from "../errors";
import { askModel, JsonModel } from "../llm/client";
import { buildScopePrompt, DEFAULT_TEMPLATES } from "../llm/prompt";
import { describeError, normalizeArabic } from "../utils";
import scopeTerms from "./scope-terms.json";

export type ScopeDecision = { decision: "proceed"; reason?: string } | { decision: "refuse"; refusal: string; reason?: string };

export interface ClassifyOptions {
  signal?: AbortSignal;
}

export interface ScopeClassifier {
  classify(query: string, options?: ClassifyOptions): Promise<ScopeDecision>;
}

const ScopeVerdictSchema = z.object({
  decision: z.enum(["proceed", "refuse"]),
  reason: z.string().optional()
});

export class LlmScopeClassifier implements ScopeClassifier {
  constructor(
    private readonly model: JsonModel,
    private readonly refusal: string = DEFAULT_TEMPLATES.refusal
  ) {}

  async classify(query: string, { signal }: ClassifyOptions = {}): Promise<ScopeDecision> {
    try {
      const verdict = await askModel(
        this.model,
        [
          { role: "system", content: buildScopePrompt() },
          { role: "user", content: query }
        ],
        ScopeVerdictSchema,
        { signal }
      );
      if (verdict.decision === "refuse") {
        return { decision: "refuse", refusal: this.refusal, reason: verdict.reason };
      }
      return { decision: "proceed", reason: verdict.reason };
    } catch (error) {
      if (signal?.aborted) {
        throw new ConsultationAbortedError();
      }
      console.warn("Scope classification failed, proceeding to retrieval", describeError(error));
      return { decision: "proceed", reason: "classifier unavailable" };
    }
  }
}

export interface KeywordLists {
  inDomain: string[];
  outOfDomain: string[];
}

// Attached conjunctions, prepositions and the article: و ف ب ك ل ال and their combinations.
const PROCLITICS = ["", "ال", "و", "ف", "ب", "ك", "ل", "وال", "فال", "بال", "كال", "لل", "ولل", "وب", "ول", "فب", "فل"];

export function tokenize(text: string): string[] {
  return normalizeArabic(text)
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

function tokenMatches(token: string, term: string): boolean {
  return PROCLITICS.some((prefix) => token === prefix + term);
}

function containsPhrase(tokens: string[], phrase: string[]): boolean {
  for (let start = 0; start + phrase.length <= tokens.length; start += 1) {
    if (phrase.every((term, offset) => tokenMatches(tokens[start + offset], term))) {
      return true;
    }
  }
  return false;
}

export class KeywordScopeClassifier implements ScopeClassifier {
  private readonly inDomain: string[][];

  private readonly outOfDomain: string[][];

  constructor(
    lists: KeywordLists = scopeTerms,
    private readonly refusal: string = DEFAULT_TEMPLATES.refusal
  ) {
    this.inDomain = lists.inDomain.map(tokenize).filter((phrase) => phrase.length > 0);
    this.outOfDomain = lists.outOfDomain.map(tokenize).filter((phrase) => phrase.length > 0);
  }

  async classify(query: string): Promise<ScopeDecision> {
    const tokens = tokenize(query);
    const domainHit = this.inDomain.find((phrase) => containsPhrase(tokens, phrase));
    if (domainHit) {
      return { decision: "proceed", reason: `matched "${domainHit.join(" ")}"` };
    }
    const outsideHit = this.outOfDomain.find((phrase) => containsPhrase(tokens, phrase));
    if (outsideHit) {
      return { decision: "refuse", refusal: this.refusal, reason: `matched "${outsideHit.join(" ")}"` };
    }
    return { decision: "proceed", reason: "ambiguous" };
  }
}
