import { ConversationStateSchema, type ConversationState } from "@kitchen-assistant/contracts";
import { defaultLogger, type EngineLogger } from "../logger.js";
import { emptyPreferences } from "../domain/preferences.js";
import { isPersistedStage } from "./state-machine.js";

export type StateValidation = { ok: true; state: ConversationState } | { ok: false; problems: string[] };

export function createConversationState(sessionId: string, now: Date): ConversationState {
  const timestamp = now.toISOString();
  return {
    sessionId,
    stage: "INITIAL",
    preferences: emptyPreferences(),
    pantrySnapshot: [],
    pendingCandidates: [],
    createdAt: timestamp,
    lastActiveAt: timestamp,
    turnCount: 0,
  };
}

export function validateConversationState(value: unknown): StateValidation {
  const parsed = ConversationStateSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, problems: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) };
  }

  const state = parsed.data;
  const problems: string[] = [];
  const fresh = state.stage === "INITIAL" && state.turnCount === 0;
  if (!fresh && !isPersistedStage(state.stage)) {
    problems.push(`stage ${state.stage} cannot persist between turns`);
  }
  if (state.pendingCandidates.length > 0 && state.stage !== "AWAITING_SELECTION") {
    problems.push("pending candidates outside AWAITING_SELECTION");
  }
  if (state.stage === "AWAITING_SELECTION" && state.pendingCandidates.length === 0) {
    problems.push("AWAITING_SELECTION without pending candidates");
  }
  const ids = state.pendingCandidates.map((candidate) => candidate.recipe.id);
  if (new Set(ids).size !== ids.length) {
    problems.push("pending candidates repeat a recipe id");
  }

  return problems.length > 0 ? { ok: false, problems } : { ok: true, state };
}

export type InMemorySessionStoreOptions = {
  idleMs: number;
  logger?: EngineLogger;
};

/**
 * Conversation states keyed by session id. States are copied on the way in
 * and out, so a turn works on a private draft until it commits.
 */
export class InMemorySessionStore {
  private readonly sessions = new Map<string, ConversationState>();
  private readonly idleMs: number;
  private readonly logger: EngineLogger;

  constructor(options: InMemorySessionStoreOptions) {
    this.idleMs = options.idleMs;
    this.logger = options.logger ?? defaultLogger;
  }

  get size(): number {
    return this.sessions.size;
  }

  get(sessionId: string): ConversationState | undefined {
    const state = this.sessions.get(sessionId);
    return state ? structuredClone(state) : undefined;
  }

  getOrCreate(sessionId: string, now: Date): ConversationState {
    return this.get(sessionId) ?? createConversationState(sessionId, now);
  }

  commit(state: ConversationState): void {
    const validation = validateConversationState(state);
    if (!validation.ok) {
      throw new Error(`refusing to commit session ${state.sessionId}: ${validation.problems.join("; ")}`);
    }
    this.sessions.set(state.sessionId, structuredClone(validation.state));
  }

  /** Stores a value without validation; for loading snapshots written elsewhere. */
  restore(sessionId: string, snapshot: ConversationState): void {
    this.sessions.set(sessionId, structuredClone(snapshot));
  }

  evict(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  evictIdle(now: Date): string[] {
    const evicted: string[] = [];
    for (const [sessionId, state] of this.sessions) {
      if (now.getTime() - Date.parse(state.lastActiveAt) >= this.idleMs) {
        this.sessions.delete(sessionId);
        evicted.push(sessionId);
      }
    }

    if (evicted.length > 0) {
      this.logger.info(`evicted ${evicted.length} idle session(s)`);
    }
    return evicted;
  }

  startEvictionSweep(intervalMs: number, clock: () => Date = () => new Date()): () => void {
    const timer = setInterval(() => {
      this.evictIdle(clock());
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }
}
