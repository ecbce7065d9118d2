export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ConsultationAbortedError extends Error {
  constructor() {
    super("Consultation was cancelled by the caller");
    this.name = "ConsultationAbortedError";
  }
}

export class ReasoningEngineError extends Error {
  constructor(message: string, readonly cause?: unknown) {
    super(message);
    this.name = "ReasoningEngineError";
  }
}
