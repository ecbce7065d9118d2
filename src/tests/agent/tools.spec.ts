import { describe, expect, it } from "vitest";
import { createExpertTool, EXPERT_TOOL_NAME, renderToolOutput } from "../../agent/tools";
import { createFakeExpert } from "../helpers";

describe("createExpertTool", () => {
  it("exposes a single tool named expert", () => {
    const { target } = createFakeExpert([{ status: 200, body: "ok" }]);
    const tool = createExpertTool(target);

    expect(tool.name).toBe(EXPERT_TOOL_NAME);
    expect(tool.definition.name).toBe("expert");
  });

  it("returns the structured retrieval result to the orchestration loop", async () => {
    const { target, requests } = createFakeExpert([{ status: 200, body: "نص المادة الأولى" }]);
    const tool = createExpertTool(target);

    const result = await tool.call("المادة الأولى من نظام الإفلاس");

    expect(result).toEqual({ ok: true, payload: "نص المادة الأولى" });
    expect(requests[0].body).toEqual({ query: "المادة الأولى من نظام الإفلاس" });
  });

  it("returns text to the chat model through the tool definition", async () => {
    const { target, requests } = createFakeExpert([{ status: 200, body: "نص المادة الأولى" }]);
    const tool = createExpertTool(target);

    const output = await tool.definition.invoke({ query: "المادة الأولى" });

    expect(output).toBe("نص المادة الأولى");
    expect(requests).toHaveLength(1);
  });

  it("describes failures in the tool text", async () => {
    const { target } = createFakeExpert([{ status: 503, body: "maintenance" }]);
    const tool = createExpertTool(target);

    const output = await tool.definition.invoke({ query: "المادة الأولى" });

    expect(output).toBe("Failed to get information from expert: 503 maintenance");
  });
});

describe("renderToolOutput", () => {
  it("renders network failures with their detail", () => {
    expect(renderToolOutput({ ok: false, kind: "network_error", detail: "Request timed out after 15000ms" })).toBe(
      "Failed to get information from expert: Request timed out after 15000ms"
    );
  });
});
