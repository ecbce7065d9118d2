import express, { Application, NextFunction, Request, Response } from "express";
import { readFile } from "node:fs/promises";
import swaggerUi from "swagger-ui-express";
import helmet from "helmet";
import { ReasoningEngineError } from "./errors";
import { createRouter, RouterDependencies } from "./routes";
import { describeError, safeJsonParse } from "./utils";

export type ApiDocument = Record<string, unknown>;

export interface AppDependencies extends RouterDependencies {
  apiDocument?: ApiDocument | null;
}

export interface HttpErrorReply {
  status: number;
  message: string;
}

/** Missing or unreadable documents disable `/docs`; they never stop the service. */
export async function loadApiDocument(filePath: string): Promise<ApiDocument | null> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    console.warn(`API document unavailable at ${filePath} (${describeError(error)}), /docs disabled`);
    return null;
  }

  const parsed = safeJsonParse<unknown>(raw);
  if (!isApiDocument(parsed)) {
    console.warn(`API document at ${filePath} is not a JSON object, /docs disabled`);
    return null;
  }
  return parsed;
}

function isApiDocument(value: unknown): value is ApiDocument {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function clientErrorStatus(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status >= 400 && error.status < 500 ? error.status : null;
  }
  return null;
}

export function toHttpError(error: unknown): HttpErrorReply {
  if (error instanceof ReasoningEngineError) {
    return { status: 502, message: "The reasoning engine is temporarily unavailable." };
  }
  // express.json() marks malformed bodies with a 4xx status.
  const status = clientErrorStatus(error);
  if (status !== null) {
    return { status, message: "Request body must be a JSON object with a non-empty query string." };
  }
  return { status: 500, message: "Unexpected server error" };
}

export function createApp({ agent, consultationLog, apiDocument }: AppDependencies): Application {
  const app = express();
  const startedAt = Date.now();

  app.use(helmet());
  app.use(express.json({ limit: "1mb" }));

  if (apiDocument) {
    app.use("/docs", swaggerUi.serve, swaggerUi.setup(apiDocument));
  }

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      consultationLog: consultationLog ? "enabled" : "disabled",
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000)
    });
  });

  app.use(createRouter({ agent, consultationLog }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const reply = toHttpError(err);
    if (reply.status >= 500) {
      console.error(`Request failed with ${reply.status}`, err);
    }
    res.status(reply.status).json({ message: reply.message });
  });

  return app;
}
