import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { loadApiDocument, toHttpError } from "../app";
import { ReasoningEngineError } from "../errors";

describe("toHttpError", () => {
  it("maps reasoning engine failures to 502", () => {
    expect(toHttpError(new ReasoningEngineError("Answer synthesis failed: timeout"))).toEqual({
      status: 502,
      message: "The reasoning engine is temporarily unavailable."
    });
  });

  it("keeps the status of malformed request bodies", () => {
    const malformed = Object.assign(new SyntaxError("Unexpected token } in JSON"), { status: 400 });

    expect(toHttpError(malformed)).toEqual({
      status: 400,
      message: "Request body must be a JSON object with a non-empty query string."
    });
  });

  it("treats everything else as a server error", () => {
    expect(toHttpError(new Error("boom"))).toEqual({ status: 500, message: "Unexpected server error" });
    expect(toHttpError(Object.assign(new Error("upstream"), { status: 503 }))).toEqual({
      status: 500,
      message: "Unexpected server error"
    });
  });
});

describe("loadApiDocument", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "api-doc-"));
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a JSON object", async () => {
    const file = path.join(dir, "swagger.json");
    await writeFile(file, JSON.stringify({ openapi: "3.0.0", paths: {} }));

    await expect(loadApiDocument(file)).resolves.toEqual({ openapi: "3.0.0", paths: {} });
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("disables the docs when the file is missing", async () => {
    await expect(loadApiDocument(path.join(dir, "missing.json"))).resolves.toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("disables the docs when the file is not a JSON object", async () => {
    const file = path.join(dir, "swagger.json");
    await writeFile(file, "[1, 2]");

    await expect(loadApiDocument(file)).resolves.toBeNull();
    expect(console.warn).toHaveBeenCalledWith(`API document at ${file} is not a JSON object, /docs disabled`);
  });
});
