import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../errors";

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  EXPERT_API_URL: z.string().url().default("http://localhost:9621/query"),
  EXPERT_API_KEY: z.string().trim().min(1, "EXPERT_API_KEY is required"),
  RETRIEVAL_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
  RETRIEVAL_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(250),
  LLM_MODEL: z.string().min(1).default("openai/gpt-4o-mini"),
  OPEN_ROUTER_API_KEY: optionalString,
  OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
  OPENAI_API_KEY: optionalString,
  SCOPE_CLASSIFIER: z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.enum(["llm", "keywords"]).optional()
  ),
  AGENT_FIRM_NAME: optionalString,
  CONSULTATION_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  DATABASE_URL: optionalString,
  PGHOST: optionalString,
  PGPORT: z.coerce.number().int().positive().optional(),
  PGUSER: optionalString,
  PGPASSWORD: optionalString,
  PGDATABASE: optionalString,
  PGSSLMODE: optionalString
});

export interface LlmConfig {
  model: string;
  apiKey: string;
  baseURL?: string;
}

export type DatabaseConfig =
  | { connectionString: string }
  | {
      host: string;
      port?: number;
      user?: string;
      password?: string;
      database?: string;
      ssl?: { rejectUnauthorized: boolean };
    };

export interface AppConfig {
  port: number;
  expert: {
    endpoint: string;
    apiKey: string;
  };
  retrieval: {
    maxAttempts: number;
    retryDelayMs: number;
  };
  llm: LlmConfig | null;
  scopeClassifier: "llm" | "keywords";
  firmName?: string;
  concurrency: number;
  database: DatabaseConfig | null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment configuration (${issues.join("; ")})`);
  }
  const values = parsed.data;

  const llm: LlmConfig | null = values.OPEN_ROUTER_API_KEY
    ? { model: values.LLM_MODEL, apiKey: values.OPEN_ROUTER_API_KEY, baseURL: values.OPENROUTER_BASE_URL }
    : values.OPENAI_API_KEY
      ? { model: values.LLM_MODEL, apiKey: values.OPENAI_API_KEY }
      : null;

  const scopeClassifier = values.SCOPE_CLASSIFIER ?? (llm ? "llm" : "keywords");
  if (scopeClassifier === "llm" && !llm) {
    throw new ConfigurationError("SCOPE_CLASSIFIER=llm requires OPEN_ROUTER_API_KEY or OPENAI_API_KEY");
  }

  return {
    port: values.PORT,
    expert: {
      endpoint: values.EXPERT_API_URL,
      apiKey: values.EXPERT_API_KEY
    },
    retrieval: {
      maxAttempts: values.RETRIEVAL_MAX_ATTEMPTS,
      retryDelayMs: values.RETRIEVAL_RETRY_DELAY_MS
    },
    llm,
    scopeClassifier,
    firmName: values.AGENT_FIRM_NAME,
    concurrency: values.CONSULTATION_CONCURRENCY,
    database: resolveDatabaseConfig(values)
  };
}

function resolveDatabaseConfig(values: z.infer<typeof EnvSchema>): DatabaseConfig | null {
  if (values.DATABASE_URL) {
    return { connectionString: values.DATABASE_URL };
  }
  if (!values.PGHOST) {
    return null;
  }
  return {
    host: values.PGHOST,
    port: values.PGPORT,
    user: values.PGUSER,
    password: values.PGPASSWORD,
    database: values.PGDATABASE,
    ssl: values.PGSSLMODE === "require" ? { rejectUnauthorized: false } : undefined
  };
}
