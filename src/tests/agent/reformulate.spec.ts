import { describe, expect, it } from "vitest";
import type { BaseMessage } from "@langchain/core/messages";
import type { StructuredToolInterface } from "@langchain/core/tools";
import { ToolCallReformulator, VerbatimReformulator } from "../../agent/reformulate";
import { createExpertTool } from "../../agent/tools";
import type { ToolCallingChatModel, ToolCallLike } from "../../llm/client";
import { createFakeExpert } from "../helpers";

function toolCallingModel(toolCalls: ToolCallLike[]) {
  const bindings: Array<{ tools: StructuredToolInterface[]; toolChoice?: string }> = [];
  const prompts: BaseMessage[][] = [];
  const model: ToolCallingChatModel = {
    bindTools(tools, kwargs) {
      bindings.push({ tools, toolChoice: kwargs?.tool_choice });
      return {
        async invoke(messages: BaseMessage[]) {
          prompts.push(messages);
          return { tool_calls: toolCalls };
        }
      };
    }
  };
  return { model, bindings, prompts };
}

describe("VerbatimReformulator", () => {
  it("searches with the trimmed question", async () => {
    const reformulator = new VerbatimReformulator();

    await expect(reformulator.reformulate({ question: "  ما هي التسوية الوقائية؟ ", attempt: 1 })).resolves.toBe(
      "ما هي التسوية الوقائية؟"
    );
  });
});

describe("ToolCallReformulator", () => {
  const { target } = createFakeExpert([{ status: 200, body: "ok" }]);
  const expert = createExpertTool(target);

  it("forces a call to the expert tool and returns its query argument", async () => {
    const { model, bindings } = toolCallingModel([
      { name: "expert", args: { query: "إجراءات التصفية الإدارية في نظام الإفلاس السعودي" } }
    ]);
    const reformulator = new ToolCallReformulator(model, expert.definition);

    const query = await reformulator.reformulate({ question: "ما هي إجراءات التصفية الإدارية؟", attempt: 1 });

    expect(query).toBe("إجراءات التصفية الإدارية في نظام الإفلاس السعودي");
    expect(bindings).toHaveLength(1);
    expect(bindings[0].toolChoice).toBe("expert");
    expect(bindings[0].tools.map((tool) => tool.name)).toEqual(["expert"]);
  });

  it("mentions the failed search when asked for a new wording", async () => {
    const { model, prompts } = toolCallingModel([{ name: "expert", args: { query: "صياغة جديدة" } }]);
    const reformulator = new ToolCallReformulator(model, expert.definition);

    await reformulator.reformulate({ question: "سؤال", attempt: 2, previousQuery: "صياغة قديمة" });

    expect(prompts[0][1].content).toContain('The previous search "صياغة قديمة" failed.');
  });

  it("rejects responses without an expert tool call", async () => {
    const { model } = toolCallingModel([]);
    const reformulator = new ToolCallReformulator(model, expert.definition);

    await expect(reformulator.reformulate({ question: "سؤال", attempt: 1 })).rejects.toThrow(
      "Model did not call the expert tool"
    );
  });

  it("rejects tool calls with an empty query", async () => {
    const { model } = toolCallingModel([{ name: "expert", args: { query: "   " } }]);
    const reformulator = new ToolCallReformulator(model, expert.definition);

    await expect(reformulator.reformulate({ question: "سؤال", attempt: 1 })).rejects.toThrow(
      "Expert tool call had invalid arguments"
    );
  });
});
