export interface RetrievalRequest {
  query: string;
}

export type RetrievalFailureKind = "network_error" | "http_status_error";

export interface RetrievalSuccess {
  ok: true;
  payload: string;
}

export interface RetrievalFailure {
  ok: false;
  kind: RetrievalFailureKind;
  detail: string;
  status?: number;
}

export type RetrievalResult = RetrievalSuccess | RetrievalFailure;

export type ConsultationOutcome = "answered" | "no_data" | "refused";

export type NoDataReason = "retrieval_failed" | "empty_payload";

export type ConsultationStage = "classify" | "invoke" | "evaluate" | "retry" | "synthesize" | "no_data" | "refuse";

export interface RetrievalAttempt {
  query: string;
  result: RetrievalResult;
  startedAt: string;
  finishedAt: string;
}

export interface AgentResponse {
  outcome: ConsultationOutcome;
  text: string;
  reason?: NoDataReason;
  searchQueries: string[];
  attempts: number;
  trace: ConsultationStage[];
}

export interface ConsultationLogEntry {
  query: string;
  response: AgentResponse;
}

export interface ConsultationLog {
  record(entry: ConsultationLogEntry): Promise<void>;
}
