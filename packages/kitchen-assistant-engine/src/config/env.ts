export type EngineConfig = {
  collaboratorTimeoutMs: number;
  allowMissing: number;
  allowMissingRelaxation: number;
  expiryWindowDays: number;
  sessionIdleMs: number;
  searchTopK: number;
  defaultServings: number;
  useModelClassifier: boolean;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  collaboratorTimeoutMs: 4_000,
  allowMissing: 2,
  allowMissingRelaxation: 2,
  expiryWindowDays: 3,
  sessionIdleMs: 30 * 60 * 1000,
  searchTopK: 20,
  defaultServings: 2,
  useModelClassifier: true,
};

export function readEngineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    collaboratorTimeoutMs: readInteger(
      env,
      "KITCHEN_ASSISTANT_COLLABORATOR_TIMEOUT_MS",
      DEFAULT_ENGINE_CONFIG.collaboratorTimeoutMs,
      { min: 1 },
    ),
    allowMissing: readInteger(env, "KITCHEN_ASSISTANT_ALLOW_MISSING", DEFAULT_ENGINE_CONFIG.allowMissing, {
      min: 0,
    }),
    allowMissingRelaxation: readInteger(
      env,
      "KITCHEN_ASSISTANT_ALLOW_MISSING_RELAXATION",
      DEFAULT_ENGINE_CONFIG.allowMissingRelaxation,
      { min: 0 },
    ),
    expiryWindowDays: readInteger(
      env,
      "KITCHEN_ASSISTANT_EXPIRY_WINDOW_DAYS",
      DEFAULT_ENGINE_CONFIG.expiryWindowDays,
      { min: 0 },
    ),
    sessionIdleMs: readInteger(env, "KITCHEN_ASSISTANT_SESSION_IDLE_MS", DEFAULT_ENGINE_CONFIG.sessionIdleMs, {
      min: 1,
    }),
    searchTopK: readInteger(env, "KITCHEN_ASSISTANT_SEARCH_TOP_K", DEFAULT_ENGINE_CONFIG.searchTopK, {
      min: 1,
    }),
    defaultServings: readInteger(
      env,
      "KITCHEN_ASSISTANT_DEFAULT_SERVINGS",
      DEFAULT_ENGINE_CONFIG.defaultServings,
      { min: 1 },
    ),
    useModelClassifier: readBoolean(
      env,
      "KITCHEN_ASSISTANT_MODEL_CLASSIFIER",
      DEFAULT_ENGINE_CONFIG.useModelClassifier,
    ),
  };
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  bounds: { min: number },
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < bounds.min || String(value) !== raw.trim()) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw new Error(`invalid ${name}: ${raw}`);
}
