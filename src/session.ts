import http from "node:http";
import https from "node:https";
import axios, { AxiosInstance } from "axios";
import type { AppConfig } from "./config/env";

export const RETRIEVAL_TIMEOUT_MS = 15_000;

/**
 * Long-lived resources borrowed by every consultation: one pooled HTTP client
 * and the knowledge-base credential. Read-only once created.
 */
export interface SessionDependencies {
  readonly http: AxiosInstance;
  readonly endpoint: string;
  readonly apiKey: string;
  close(): void;
}

export function createSessionDependencies(config: Pick<AppConfig, "expert">): SessionDependencies {
  const httpAgent = new http.Agent({ keepAlive: true });
  const httpsAgent = new https.Agent({ keepAlive: true });
  const client = axios.create({
    httpAgent,
    httpsAgent,
    timeout: RETRIEVAL_TIMEOUT_MS
  });

  let closed = false;
  return {
    http: client,
    endpoint: config.expert.endpoint,
    apiKey: config.expert.apiKey,
    close() {
      if (closed) return;
      closed = true;
      httpAgent.destroy();
      httpsAgent.destroy();
    }
  };
}

export async function withSession<T>(
  config: Pick<AppConfig, "expert">,
  fn: (session: SessionDependencies) => Promise<T>
): Promise<T> {
  const session = createSessionDependencies(config);
  try {
    return await fn(session);
  } finally {
    session.close();
  }
}
