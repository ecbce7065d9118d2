import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import type { ExpertTarget } from "../data/expert";

export const TEST_ENDPOINT = "http://expert.test/query";
export const TEST_API_KEY = "test-secret";

export interface RecordedRequest {
  method?: string;
  url?: string;
  apiKey: unknown;
  accept: unknown;
  body: unknown;
}

export type FakeReply =
  | { status: number; body: string }
  | { networkError: string; code: string }
  | { hang: true };

export interface FakeExpert {
  target: ExpertTarget;
  requests: RecordedRequest[];
}

/**
 * Knowledge-base stand-in: an axios instance whose adapter answers in process.
 * Replies are consumed in order; the last one repeats.
 */
export function createFakeExpert(replies: FakeReply[]): FakeExpert {
  const requests: RecordedRequest[] = [];

  const http = axios.create({
    adapter: (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      requests.push({
        method: config.method,
        url: config.url,
        apiKey: config.headers.get("X-API-Key"),
        accept: config.headers.get("Accept"),
        body: typeof config.data === "string" ? JSON.parse(config.data) : config.data
      });

      const reply = replies[Math.min(requests.length - 1, replies.length - 1)];
      if ("hang" in reply) {
        return new Promise((_resolve, reject) => {
          config.signal?.addEventListener?.("abort", () => reject(new axios.CanceledError()));
        });
      }
      if ("networkError" in reply) {
        return Promise.reject(new AxiosError(reply.networkError, reply.code, config));
      }
      return Promise.resolve({
        data: reply.body,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config
      });
    }
  });

  return {
    target: { http, endpoint: TEST_ENDPOINT, apiKey: TEST_API_KEY },
    requests
  };
}
