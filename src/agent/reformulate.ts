import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import type { StructuredToolInterface } from "@langchain/core/tools";
import type { ModelCallOptions, ToolCallingChatModel } from "../llm/client";
import { buildReformulationPrompt, buildSystemPrompt, PromptOptions } from "../llm/prompt";
import { EXPERT_TOOL_NAME, ExpertInputSchema } from "./tools";

export interface ReformulationInput {
  question: string;
  attempt: number;
  previousQuery?: string;
}

export interface QueryReformulator {
  reformulate(input: ReformulationInput, options?: ModelCallOptions): Promise<string>;
}

export class VerbatimReformulator implements QueryReformulator {
  async reformulate({ question }: ReformulationInput): Promise<string> {
    return question.trim();
  }
}

/**
 * Lets the chat model phrase the search by forcing it to call the expert
 * tool; only the tool-call argument is used, never free text.
 */
export class ToolCallReformulator implements QueryReformulator {
  constructor(
    private readonly model: ToolCallingChatModel,
    private readonly tool: StructuredToolInterface,
    private readonly promptOptions: PromptOptions = {}
  ) {}

  async reformulate({ question, previousQuery }: ReformulationInput, { signal }: ModelCallOptions = {}): Promise<string> {
    const bound = this.model.bindTools([this.tool], { tool_choice: EXPERT_TOOL_NAME });
    const response = await bound.invoke(
      [
        new SystemMessage(buildSystemPrompt(this.promptOptions)),
        new HumanMessage(buildReformulationPrompt(question, previousQuery))
      ],
      { signal }
    );

    const call = response.tool_calls?.find((candidate) => candidate.name === EXPERT_TOOL_NAME);
    if (!call) {
      throw new Error("Model did not call the expert tool");
    }
    const parsed = ExpertInputSchema.safeParse(call.args);
    if (!parsed.success) {
      throw new Error(`Expert tool call had invalid arguments: ${parsed.error.message}`);
    }
    return parsed.data.query;
  }
}
