export interface RecognitionConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
}

export interface CrmConfig {
  baseUrl: string;
  username: string;
  password: string;
  caseEntity: string;
  personEntity: string;
}

export interface AppConfig {
  mongoUri: string;
  mongoDb: string;
  storageRoot: string;
  httpTimeoutMs: number;
  userAgent: string;
  retryCount: number;
  retryBackoffMs: number;
  maxUnitAttempts: number;
  pagesPerUnit: number;
  staleProcessingMinutes: number;
  recognition: RecognitionConfig;
  crm: CrmConfig;
}

export type Env = Record<string, string | undefined>;

const DEFAULT_RECOGNITION_BASE_URL = "https://api.mistral.ai/v1";

function parseIntEnv(env: Env, name: string, defaultValue: number): number {
  const raw = env[name];
  if (!raw) {
    return defaultValue;
  }

  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`ENV ${name} must be an integer. Received: ${raw}`);
  }
  return parsed;
}

function parsePositiveIntEnv(env: Env, name: string, defaultValue: number): number {
  const parsed = parseIntEnv(env, name, defaultValue);
  if (parsed <= 0) {
    throw new Error(`ENV ${name} must be greater than zero. Received: ${parsed}`);
  }
  return parsed;
}

function parseFloatEnv(env: Env, name: string, defaultValue: number): number {
  const raw = env[name];
  if (!raw) {
    return defaultValue;
  }

  const parsed = Number.parseFloat(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`ENV ${name} must be a number. Received: ${raw}`);
  }
  return parsed;
}

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, "");
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    mongoUri: env.MONGO_URI ?? "mongodb://localhost:27017",
    mongoDb: env.MONGO_DB ?? "oficios",
    storageRoot: env.STORAGE_ROOT ?? "./data/oficios",
    httpTimeoutMs: parsePositiveIntEnv(env, "HTTP_TIMEOUT_MS", 30000),
    userAgent: env.USER_AGENT ?? "Oficios-Pipeline/1.0",
    retryCount: parseIntEnv(env, "RETRY_COUNT", 3),
    retryBackoffMs: parseIntEnv(env, "RETRY_BACKOFF_MS", 500),
    maxUnitAttempts: parsePositiveIntEnv(env, "MAX_UNIT_ATTEMPTS", 3),
    pagesPerUnit: parsePositiveIntEnv(env, "PAGES_PER_UNIT", 1),
    staleProcessingMinutes: parsePositiveIntEnv(env, "STALE_PROCESSING_MINUTES", 30),
    recognition: {
      baseUrl: normalizeBaseUrl(env.RECOGNITION_BASE_URL ?? DEFAULT_RECOGNITION_BASE_URL),
      apiKey: env.RECOGNITION_API_KEY ?? "",
      model: env.RECOGNITION_MODEL ?? "mistral-large-latest",
      temperature: parseFloatEnv(env, "RECOGNITION_TEMPERATURE", 0.1),
    },
    crm: {
      baseUrl: normalizeBaseUrl(env.CRM_BASE_URL ?? "http://localhost:5000"),
      username: env.CRM_USERNAME ?? "",
      password: env.CRM_PASSWORD ?? "",
      caseEntity: env.CRM_CASE_ENTITY ?? "Case",
      personEntity: env.CRM_PERSON_ENTITY ?? "CasePerson",
    },
  };
}
