import type {
  AgentResponse,
  ConsultationOutcome,
  ConsultationStage,
  NoDataReason,
  RetrievalAttempt
} from "../types";

export interface ConsultationState {
  query: string;
  stage: ConsultationStage;
  trace: ConsultationStage[];
  attempts: RetrievalAttempt[];
}

const ALLOWED_TRANSITIONS: Record<ConsultationStage, ConsultationStage[]> = {
  classify: ["invoke", "refuse"],
  invoke: ["evaluate"],
  evaluate: ["synthesize", "retry", "no_data"],
  retry: ["invoke"],
  synthesize: [],
  no_data: [],
  refuse: []
};

export function createConsultationState(query: string): ConsultationState {
  return {
    query,
    stage: "classify",
    trace: ["classify"],
    attempts: []
  } satisfies ConsultationState;
}

export function transition(state: ConsultationState, next: ConsultationStage): ConsultationState {
  if (!ALLOWED_TRANSITIONS[state.stage].includes(next)) {
    throw new Error(`Illegal consultation transition ${state.stage} -> ${next}`);
  }
  return {
    ...state,
    stage: next,
    trace: [...state.trace, next]
  };
}

export function recordAttempt(state: ConsultationState, attempt: RetrievalAttempt): ConsultationState {
  return {
    ...state,
    attempts: [...state.attempts, attempt]
  };
}

export function finalizeResponse(
  state: ConsultationState,
  outcome: ConsultationOutcome,
  text: string,
  reason?: NoDataReason
): AgentResponse {
  return {
    outcome,
    text,
    ...(reason ? { reason } : {}),
    searchQueries: state.attempts.map((attempt) => attempt.query),
    attempts: state.attempts.length,
    trace: state.trace
  };
}
