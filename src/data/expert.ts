import axios, { AxiosInstance } from "axios";
import { ConsultationAbortedError } from "../errors";
import { RETRIEVAL_TIMEOUT_MS } from "../session";
import type { RetrievalRequest, RetrievalResult } from "../types";
import { throwIfAborted } from "../utils";

export interface ExpertTarget {
  http: AxiosInstance;
  endpoint: string;
  apiKey: string;
}

export interface FetchExpertOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export async function fetchExpert(
  target: ExpertTarget,
  query: string,
  { signal, timeoutMs = RETRIEVAL_TIMEOUT_MS }: FetchExpertOptions = {}
): Promise<RetrievalResult> {
  throwIfAborted(signal);

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onCallerAbort = () => controller.abort();
  signal?.addEventListener("abort", onCallerAbort, { once: true });

  const body: RetrievalRequest = { query };

  try {
    const response = await target.http.post<unknown>(target.endpoint, body, {
      headers: {
        accept: "application/json",
        "Content-Type": "application/json",
        "X-API-Key": target.apiKey
      },
      responseType: "text",
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
      timeout: timeoutMs,
      signal: controller.signal
    });

    const text = asText(response.data);
    if (response.status < 200 || response.status >= 300) {
      return {
        ok: false,
        kind: "http_status_error",
        status: response.status,
        detail: `${response.status} ${text}`.trim()
      };
    }
    return { ok: true, payload: text };
  } catch (error) {
    if (signal?.aborted && !timedOut) {
      throw new ConsultationAbortedError();
    }
    if (timedOut || isTimeout(error)) {
      return { ok: false, kind: "network_error", detail: `Request timed out after ${timeoutMs}ms` };
    }
    return { ok: false, kind: "network_error", detail: describeNetworkError(error) };
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onCallerAbort);
  }
}

function asText(data: unknown): string {
  if (typeof data === "string") return data;
  if (data === undefined || data === null) return "";
  return JSON.stringify(data);
}

function isTimeout(error: unknown): boolean {
  return axios.isAxiosError(error) && (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT");
}

function describeNetworkError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
