import { z } from "zod";
import { DynamicStructuredTool, StructuredToolInterface } from "@langchain/core/tools";
import { fetchExpert, ExpertTarget } from "../data/expert";
import type { RetrievalResult } from "../types";

export const EXPERT_TOOL_NAME = "expert";

export const ExpertInputSchema = z.object({
  query: z.string().trim().min(1).describe("Search query about Saudi bankruptcy law")
});

export type ExpertInput = z.infer<typeof ExpertInputSchema>;

export interface ExpertCallOptions {
  signal?: AbortSignal;
}

/**
 * The single path from reasoning to ground-truth data. `call` feeds the
 * orchestration loop; `definition` is what the chat model is allowed to see.
 */
export interface ExpertTool {
  readonly name: typeof EXPERT_TOOL_NAME;
  readonly definition: StructuredToolInterface;
  call(query: string, options?: ExpertCallOptions): Promise<RetrievalResult>;
}

export function renderToolOutput(result: RetrievalResult): string {
  return result.ok ? result.payload : `Failed to get information from expert: ${result.detail}`;
}

export function createExpertTool(target: ExpertTarget): ExpertTool {
  const call = (query: string, options: ExpertCallOptions = {}) => fetchExpert(target, query, options);

  const definition = new DynamicStructuredTool({
    name: EXPERT_TOOL_NAME,
    description: "Use this tool to get information about the Saudi bankruptcy law from the internal legal database.",
    schema: ExpertInputSchema,
    func: async ({ query }: ExpertInput) => renderToolOutput(await call(query))
  });

  return { name: EXPERT_TOOL_NAME, definition, call };
}
