import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { LawAgent } from "./agent/lawAgent";
import { ConsultationAbortedError } from "./errors";
import type { ConsultationLog } from "./types";

const AskBodySchema = z.object({
  query: z.string().trim().min(1)
});

export interface RouterDependencies {
  agent: Pick<LawAgent, "answer">;
  consultationLog?: ConsultationLog | null;
}

export function createRouter({ agent, consultationLog }: RouterDependencies): Router {
  const router = Router();

  router.post("/ask", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = AskBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: "Request body must include a non-empty query string." });
    }
    const { query } = parsed.data;

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const response = await agent.answer(query, { signal: controller.signal });

      if (consultationLog) {
        await consultationLog.record({ query, response }).catch((error: unknown) => {
          console.error("Failed to record consultation", error);
        });
      }

      return res.json({
        outcome: response.outcome,
        answer: response.text,
        ...(response.reason ? { reason: response.reason } : {})
      });
    } catch (error) {
      if (error instanceof ConsultationAbortedError) {
        return undefined;
      }
      return next(error);
    }
  });

  return router;
}
