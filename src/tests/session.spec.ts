import http from "node:http";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createSessionDependencies, RETRIEVAL_TIMEOUT_MS, withSession } from "../session";

const CONFIG = { expert: { endpoint: "http://expert.test/query", apiKey: "test-secret" } };

describe("session dependencies", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("shares one client configured with the retrieval timeout", () => {
    const session = createSessionDependencies(CONFIG);

    expect(session.endpoint).toBe("http://expert.test/query");
    expect(session.apiKey).toBe("test-secret");
    expect(session.http.defaults.timeout).toBe(RETRIEVAL_TIMEOUT_MS);
    session.close();
  });

  it("releases the connection pool once even when closed twice", () => {
    const destroy = vi.spyOn(http.Agent.prototype, "destroy");
    const session = createSessionDependencies(CONFIG);

    session.close();
    session.close();

    expect(destroy).toHaveBeenCalledTimes(2);
  });

  it("releases the session when the work fails", async () => {
    const destroy = vi.spyOn(http.Agent.prototype, "destroy");

    await expect(
      withSession(CONFIG, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(destroy).toHaveBeenCalledTimes(2);
  });

  it("returns the result of the work", async () => {
    await expect(withSession(CONFIG, async (session) => session.endpoint)).resolves.toBe("http://expert.test/query");
  });
});
