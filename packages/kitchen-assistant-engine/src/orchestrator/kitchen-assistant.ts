import {
  PreferencesSchema,
  TurnRequestSchema,
  type ConversationStage,
  type ConversationState,
  type IssueKind,
  type PantryDelta,
  type PantryItem,
  type PantrySummary,
  type Preferences,
  type RankedRecommendation,
  type SearchHit,
  type StructuredPayload,
  type SuccessCriterion,
  type TurnIssue,
  type TurnRequest,
  type TurnResponse,
} from "@kitchen-assistant/contracts";
import { IntentClassifier } from "../classifier/intent-classifier.js";
import type { Intent } from "../classifier/intents.js";
import { InMemoryInventoryStore } from "../collaborators/in-memory-inventory-store.js";
import { InMemoryRecipeIndex } from "../collaborators/in-memory-recipe-index.js";
import { JsonSubstitutionCatalog } from "../collaborators/json-substitution-catalog.js";
import {
  OpenAiCompatibleTextGenerator,
  resolveTextGenerationConfigFromEnv,
} from "../collaborators/openai-compatible-text-generator.js";
import type { Collaborators } from "../collaborators/types.js";
import { DEFAULT_ENGINE_CONFIG, readEngineConfigFromEnv, type EngineConfig } from "../config/env.js";
import { RecipeAdapter } from "../adaptation/recipe-adapter.js";
import { DietaryRulebook } from "../domain/dietary-rules.js";
import { expiringSoon } from "../domain/expiry.js";
import { normalizePantryDelta } from "../domain/pantry.js";
import { isEmptyDelta, mergePreferences } from "../domain/preferences.js";
import { defaultLogger, type EngineLogger } from "../logger.js";
import { evaluateSuccessCriteria, planTurn, summarizePlan } from "../planner/complexity-planner.js";
import { QualityGate } from "../quality/quality-gate.js";
import { HybridRanker } from "../ranking/hybrid-ranker.js";
import { DelegationRouter, type DelegationFailure } from "../router/delegation-router.js";
import { createConversationState, InMemorySessionStore, validateConversationState } from "../session/session-store.js";
import { canTransition, SessionStateMachine } from "../session/state-machine.js";
import {
  GREETING_REPLY,
  ResponseSynthesizer,
  acknowledgePreferences,
  describePantry,
} from "../synthesis/response-synthesizer.js";

const SEARCH_FILLER_WORDS = new Set([
  "a",
  "an",
  "and",
  "any",
  "are",
  "can",
  "cook",
  "could",
  "do",
  "eat",
  "for",
  "give",
  "have",
  "i",
  "idea",
  "ideas",
  "is",
  "it",
  "make",
  "me",
  "my",
  "of",
  "please",
  "recipe",
  "recipes",
  "s",
  "should",
  "show",
  "some",
  "something",
  "suggest",
  "suggestion",
  "suggestions",
  "that",
  "the",
  "to",
  "tonight",
  "use",
  "using",
  "we",
  "what",
  "whats",
  "with",
]);

/** Words of a recipe request that say what to cook rather than asking for it. */
export function searchTerms(query: string): string[] {
  return query
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length > 0 && !SEARCH_FILLER_WORDS.has(word));
}

/**
 * Text sent to semantic search: the request's own terms, or the pantry when
 * the request names nothing ("what can I make?"), plus favored cuisines.
 */
export function buildSearchText(query: string, cuisines: string[], pantry: PantryItem[]): string {
  const terms = searchTerms(query);
  const subject = terms.length > 0 ? terms : pantry.map((item) => item.name);
  return [...subject, ...cuisines].join(" ");
}

export type KitchenAssistantOptions = {
  collaborators: Collaborators;
  config?: Partial<EngineConfig>;
  store?: InMemorySessionStore;
  rulebook?: DietaryRulebook;
  logger?: EngineLogger;
  clock?: () => Date;
};

type TurnPantry = { items: PantryItem[]; source: PantrySummary["source"] };

type Turn = {
  state: ConversationState;
  machine: SessionStateMachine;
  router: DelegationRouter;
  now: Date;
  payload: StructuredPayload;
  issues: TurnIssue[];
  degraded: string[];
  outcome: Partial<Record<SuccessCriterion, boolean>>;
  applied: PantryDelta[];
  pantry?: TurnPantry;
  preferencesChanged: boolean;
};

type InFlightTurn = { controller: AbortController };

/**
 * Entry point for one conversation turn. Sessions are independent; within a
 * session a newer message cancels the turn still in flight, and only the
 * latest turn commits its state.
 */
export class KitchenAssistant {
  readonly store: InMemorySessionStore;
  private readonly collaborators: Collaborators;
  private readonly config: EngineConfig;
  private readonly logger: EngineLogger;
  private readonly clock: () => Date;
  private readonly rulebook: DietaryRulebook;
  private readonly classifier: IntentClassifier;
  private readonly ranker: HybridRanker;
  private readonly adapter: RecipeAdapter;
  private readonly gate: QualityGate;
  private readonly synthesizer: ResponseSynthesizer;
  private readonly inFlight = new Map<string, InFlightTurn>();

  constructor(options: KitchenAssistantOptions) {
    this.collaborators = options.collaborators;
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...options.config };
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? (() => new Date());
    this.store = options.store ?? new InMemorySessionStore({ idleMs: this.config.sessionIdleMs, logger: this.logger });
    this.rulebook = options.rulebook ?? new DietaryRulebook();
    this.classifier = new IntentClassifier({
      rulebook: this.rulebook,
      useModel: this.config.useModelClassifier,
      logger: this.logger,
    });
    this.ranker = new HybridRanker(this.rulebook, {
      allowMissing: this.config.allowMissing,
      relaxBy: this.config.allowMissingRelaxation,
      expiryWindowDays: this.config.expiryWindowDays,
    });
    this.adapter = new RecipeAdapter(this.rulebook);
    this.gate = new QualityGate(this.rulebook);
    this.synthesizer = new ResponseSynthesizer({ logger: this.logger });
  }

  async handleTurn(request: TurnRequest): Promise<TurnResponse> {
    const { sessionId, message, knownPreferences } = TurnRequestSchema.parse(request);
    const now = this.clock();

    this.inFlight.get(sessionId)?.controller.abort();
    const current: InFlightTurn = { controller: new AbortController() };
    this.inFlight.set(sessionId, current);

    this.store.evictIdle(now);
    const stored = this.store.get(sessionId);
    const issues: TurnIssue[] = [];
    const state = this.loadState(sessionId, stored, now, issues);
    const router = new DelegationRouter({
      collaborators: this.collaborators,
      timeoutMs: this.config.collaboratorTimeoutMs,
      signal: current.controller.signal,
      logger: this.logger,
    });

    try {
      const response = await this.runTurn(state, message, knownPreferences, router, now, issues);
      if (!this.isLatest(sessionId, current)) {
        return this.superseded(sessionId, stored);
      }

      this.store.commit(state);
      this.logger.info(`session ${sessionId} committed turn ${state.turnCount} at ${state.stage}`);
      return response;
    } catch (error) {
      const messageText = error instanceof Error ? error.message : String(error);
      this.logger.error(`turn failed for session ${sessionId}: ${messageText}`);
      if (!this.isLatest(sessionId, current)) {
        return this.superseded(sessionId, stored);
      }

      const reset: ConversationState = { ...createConversationState(sessionId, now), preferences: state.preferences };
      this.store.commit(reset);
      return {
        sessionId,
        stage: "ERROR",
        payload: {},
        explanationText: "Something went wrong with this conversation, so I started it over. Your preferences are kept.",
        updatedPreferences: reset.preferences,
        issues: [...issues, { kind: "SessionStateCorrupt", message: messageText }],
      };
    } finally {
      if (this.inFlight.get(sessionId) === current) {
        this.inFlight.delete(sessionId);
      }
    }
  }

  private isLatest(sessionId: string, turn: InFlightTurn): boolean {
    return !turn.controller.signal.aborted && this.inFlight.get(sessionId) === turn;
  }

  private superseded(sessionId: string, stored: ConversationState | undefined): TurnResponse {
    this.logger.info(`session ${sessionId} discarded a turn replaced by a newer message`);
    const fallback = stored ?? createConversationState(sessionId, this.clock());
    return {
      sessionId,
      stage: fallback.stage,
      payload: {},
      explanationText: "",
      updatedPreferences: fallback.preferences,
      issues: [{ kind: "TurnSuperseded", message: "a newer message replaced this one" }],
    };
  }

  private loadState(
    sessionId: string,
    stored: ConversationState | undefined,
    now: Date,
    issues: TurnIssue[],
  ): ConversationState {
    if (!stored) {
      return createConversationState(sessionId, now);
    }

    const validation = validateConversationState(stored);
    if (validation.ok) {
      return validation.state;
    }

    this.logger.warn(`session ${sessionId} state is corrupt, resetting: ${validation.problems.join("; ")}`);
    issues.push({
      kind: "SessionStateCorrupt",
      message: `session state was reset: ${validation.problems.join("; ")}`,
    });
    const preferences = PreferencesSchema.safeParse(stored.preferences);
    const fresh = createConversationState(sessionId, now);
    return preferences.success ? { ...fresh, preferences: preferences.data } : fresh;
  }

  private async runTurn(
    state: ConversationState,
    message: string,
    knownPreferences: TurnRequest["knownPreferences"],
    router: DelegationRouter,
    now: Date,
    issues: TurnIssue[],
  ): Promise<TurnResponse> {
    const machine = new SessionStateMachine(state.stage);
    if (machine.stage === "INITIAL") {
      machine.transition("COLLECTING_PREFS");
    }

    state.preferences = mergePreferences(state.preferences, knownPreferences);
    const withdrawn = this.withdrawUnfit(state);
    const classification = await this.classifier.classify(
      {
        stage: machine.stage,
        message,
        preferences: state.preferences,
        pendingCount: state.pendingCandidates.length,
        now,
      },
      router,
    );
    state.preferences = mergePreferences(state.preferences, classification.preferenceDelta);
    withdrawn.push(...this.withdrawUnfit(state));

    const turn: Turn = {
      state,
      machine,
      router,
      now,
      payload: {},
      issues,
      degraded: [],
      outcome: {},
      applied: [],
      preferencesChanged:
        !isEmptyDelta(classification.preferenceDelta) ||
        (knownPreferences !== undefined && !isEmptyDelta(knownPreferences)),
    };
    if (classification.degraded) {
      this.reportUnavailable(turn, classification.degraded, "understood the message with built-in rules");
    }

    const plan = planTurn({
      intents: classification.intents,
      preferences: state.preferences,
      hasPendingSelection: state.pendingCandidates.length > 0,
      now,
    });
    state.lastPlan = plan;
    this.logger.info(`session ${state.sessionId} ${summarizePlan(plan)}; fallbacks: ${plan.fallbackStrategy}`);

    for (const intent of classification.intents) {
      await this.execute(turn, intent);
    }
    if (withdrawn.length > 0) {
      turn.payload.withdrawnOptions = withdrawn.map((entry) => entry.recipe.title);
      if (!turn.payload.recommendations && state.pendingCandidates.length > 0) {
        turn.payload.recommendations = state.pendingCandidates;
      }
    }

    if (turn.degraded.length > 0) {
      turn.payload.degraded = turn.degraded;
    }
    const explanation = await this.synthesizer.synthesize(turn.payload, router);
    if (explanation.failure && explanation.failure.reason !== "cancelled") {
      issues.push(issueFor("CollaboratorUnavailable", explanation.failure));
    }

    const delegations = router.log.map((entry) => `${entry.action}:${entry.ok ? "ok" : entry.reason}`);
    this.logger.info(`session ${state.sessionId} delegations: [${delegations.join(", ")}]`);
    const criteria = evaluateSuccessCriteria(plan, turn.outcome);
    this.logger.info(
      `session ${state.sessionId} criteria met: [${criteria.met.join(", ")}] unmet: [${criteria.unmet.join(", ")}]`,
    );

    const reported: ConversationStage = machine.stage;
    state.stage = machine.settle(state.pendingCandidates.length > 0);
    state.turnCount += 1;
    state.lastActiveAt = now.toISOString();

    return {
      sessionId: state.sessionId,
      stage: reported === "DONE" || reported === "ERROR" ? reported : state.stage,
      payload: turn.payload,
      explanationText: explanation.text,
      updatedPreferences: state.preferences,
      issues,
      plan,
    };
  }

  private async execute(turn: Turn, intent: Intent): Promise<void> {
    switch (intent.type) {
      case "mutate_pantry":
        return this.mutatePantry(turn, intent.deltas);
      case "search_recipes":
        return this.searchRecipes(turn, intent.query);
      case "select_recommendation":
        return this.selectRecommendation(turn, intent.index);
      case "general_query":
        return this.answerQuestion(turn, intent);
      case "ambiguous":
        turn.payload.clarification = intent.clarification;
        turn.issues.push({
          kind: intent.reason === "invalid_selection" ? "InvalidSelection" : "ClassificationAmbiguous",
          message: intent.clarification,
        });
        turn.outcome.clarification_requested = true;
        return;
    }
  }

  private advance(turn: Turn, to: ConversationStage): void {
    if (turn.machine.stage === to) {
      return;
    }
    if (!canTransition(turn.machine.stage, to)) {
      turn.machine.settle(turn.state.pendingCandidates.length > 0);
    }
    turn.machine.ensure(to);
  }

  private async mutatePantry(turn: Turn, deltas: PantryDelta[]): Promise<void> {
    this.advance(turn, "PANTRY_OP");
    const normalized = deltas.map(normalizePantryDelta);
    const result = await turn.router.dispatch("inventory.apply_delta", {
      sessionId: turn.state.sessionId,
      deltas: normalized,
    });

    if (result.ok) {
      turn.applied.push(...normalized);
      this.refreshPantry(turn, result.value);
      turn.outcome.mutation_applied = true;
      turn.payload.pantrySummary = this.pantrySummary(turn);
      return;
    }

    turn.outcome.mutation_applied = false;
    if (result.failure.reason === "rejected") {
      turn.issues.push({ kind: "InventoryDeltaRejected", message: result.failure.message, collaborator: "inventory" });
      turn.payload.textAnswer = `I couldn't update your pantry: ${result.failure.message}. Nothing was changed.`;
    } else {
      this.reportUnavailable(turn, result.failure, "your pantry was not updated");
    }
  }

  private async searchRecipes(turn: Turn, query: string): Promise<void> {
    this.advance(turn, "SEARCHING");
    const { preferences } = turn.state;
    const terms = searchTerms(query);

    let semantic: SearchHit[] | DelegationFailure;
    let pantry: TurnPantry;
    if (turn.pantry) {
      pantry = turn.pantry;
      semantic = await this.semanticSearch(turn, buildSearchText(query, preferences.cuisinePreferences, pantry.items));
    } else if (terms.length > 0) {
      [pantry, semantic] = await Promise.all([
        this.loadPantry(turn),
        this.semanticSearch(turn, buildSearchText(query, preferences.cuisinePreferences, [])),
      ]);
    } else {
      pantry = await this.loadPantry(turn);
      semantic = await this.semanticSearch(turn, buildSearchText(query, preferences.cuisinePreferences, pantry.items));
    }

    const hits = Array.isArray(semantic)
      ? semantic
      : await this.keywordSearch(turn, semantic, [...terms, ...pantry.items.map((item) => item.name)]);
    turn.payload.pantrySummary = this.pantrySummary(turn);
    if (hits === undefined) {
      turn.state.pendingCandidates = [];
      turn.payload.textAnswer = "Recipe search is unavailable right now. Please try again in a moment.";
      turn.machine.transition("COLLECTING_PREFS");
      return;
    }

    const ranking = this.ranker.rank({ hits, pantry: pantry.items, preferences, now: turn.now });
    if (ranking.status === "no_candidates") {
      this.logger.info(
        `no candidates within ${ranking.allowMissing} missing ingredients (excluded: ${JSON.stringify(ranking.excluded)})`,
      );
      turn.state.pendingCandidates = [];
      turn.payload.shoppingList = ranking.shoppingList;
      turn.issues.push({
        kind: "NoCandidatesFound",
        message: `no safe recipe needs ${ranking.allowMissing} or fewer extra ingredients`,
      });
      turn.outcome.candidate_passes_hard_filters = false;
      turn.machine.transition("COLLECTING_PREFS");
      return;
    }

    if (ranking.relaxed) {
      this.logger.info(`relaxed the missing-ingredient allowance to ${ranking.allowMissing}`);
    }
    turn.state.pendingCandidates = ranking.recommendations;
    turn.payload.recommendations = ranking.recommendations;
    turn.outcome.candidate_passes_hard_filters = ranking.recommendations.every((entry) =>
      this.passesHardFilters(entry, turn),
    );
    const ids = ranking.recommendations.map((entry) => entry.recipe.id);
    turn.outcome.top_three_distinct = ids.length > 0 && ids.length <= 3 && new Set(ids).size === ids.length;
    turn.machine.transition("PRESENTING_OPTIONS");
  }

  /** Drops pending options that a newly stated allergy or diet rules out; returns the dropped ones. */
  private withdrawUnfit(state: ConversationState): RankedRecommendation[] {
    const withdrawn = state.pendingCandidates.filter((entry) => !this.fits(entry, state.preferences));
    if (withdrawn.length === 0) {
      return [];
    }
    state.pendingCandidates = state.pendingCandidates.filter((entry) => !withdrawn.includes(entry));
    const ids = withdrawn.map((entry) => entry.recipe.id).join(", ");
    this.logger.info(`session ${state.sessionId} withdrew [${ids}] after a preference change`);
    return withdrawn;
  }

  private fits(entry: RankedRecommendation, preferences: Preferences): boolean {
    const { recipe } = entry;
    if (recipe.ingredients.some((ingredient) => this.rulebook.findAllergen(ingredient.name, preferences.allergies))) {
      return false;
    }
    return preferences.dietaryRestrictions.every(
      (restriction) => this.rulebook.evaluateDiet(recipe, restriction).status !== "violated",
    );
  }

  private passesHardFilters(entry: RankedRecommendation, turn: Turn): boolean {
    return entry.recipe.ingredients.every((ingredient) =>
      this.rulebook.isIngredientSafe(ingredient.name, turn.state.preferences),
    );
  }

  private async semanticSearch(turn: Turn, text: string): Promise<SearchHit[] | DelegationFailure> {
    const embedded = await turn.router.dispatch("search.embed", { text });
    if (!embedded.ok) {
      return embedded.failure;
    }
    const queried = await turn.router.dispatch("search.query", {
      vector: embedded.value,
      topK: this.config.searchTopK,
      filter: { excludeIngredients: turn.state.preferences.allergies },
    });
    return queried.ok ? queried.value : queried.failure;
  }

  private async keywordSearch(
    turn: Turn,
    failure: DelegationFailure,
    terms: string[],
  ): Promise<SearchHit[] | undefined> {
    if (failure.reason === "cancelled") {
      return undefined;
    }
    if (!turn.router.isAvailable("search.keyword")) {
      this.reportUnavailable(turn, failure, "recipe search failed");
      return undefined;
    }

    const keyword = await turn.router.dispatch("search.keyword", { terms, topK: this.config.searchTopK });
    if (!keyword.ok) {
      this.reportUnavailable(turn, failure, "recipe search failed");
      return undefined;
    }
    this.reportUnavailable(turn, failure, "matched recipes by ingredient keywords");
    return keyword.value;
  }

  private async selectRecommendation(turn: Turn, index: number): Promise<void> {
    const candidate = turn.state.pendingCandidates[index - 1];
    turn.outcome.selection_in_range = candidate !== undefined;
    if (!candidate) {
      turn.issues.push({ kind: "InvalidSelection", message: `option ${index} is not available` });
      return;
    }

    this.advance(turn, "ADAPTING");
    const pantry = turn.pantry ?? (await this.loadPantry(turn));
    const adaptation = await this.adapter.adapt(
      {
        recipe: candidate.recipe,
        pantry: pantry.items,
        preferences: turn.state.preferences,
        defaultServings: this.config.defaultServings,
        dietUnverified: candidate.dietUnverified,
      },
      turn.router,
    );
    for (const failure of adaptation.failures) {
      this.reportUnavailable(turn, failure, "some substitutes could not be looked up");
    }

    const report = this.gate.check(adaptation.recipe, turn.state.preferences);
    turn.outcome.adapted_recipe_passes_gate = report.passed;
    if (!report.passed) {
      turn.payload.violations = report.violations;
      turn.issues.push({
        kind: "ConstraintViolation",
        message: report.violations.map((violation) => violation.message).join("; "),
        collaborator: "quality_gate",
      });
      turn.machine.transition("AWAITING_SELECTION");
      return;
    }

    turn.payload.adaptedRecipe = adaptation.recipe;
    turn.state.pendingCandidates = [];
    turn.machine.transition("DONE");
  }

  private async answerQuestion(
    turn: Turn,
    intent: Extract<Intent, { type: "general_query" }>,
  ): Promise<void> {
    this.advance(turn, "GENERAL");
    if (intent.acknowledgeOnly) {
      turn.payload.textAnswer = turn.preferencesChanged ? acknowledgePreferences(turn.state.preferences) : GREETING_REPLY;
      turn.outcome.answer_generated = true;
      return;
    }

    if (intent.aboutPantry) {
      if (!turn.pantry) {
        await this.loadPantry(turn);
      }
      const summary = this.pantrySummary(turn);
      turn.payload.pantrySummary = summary;
      turn.payload.textAnswer = describePantry(summary);
      turn.outcome.answer_generated = true;
      return;
    }

    const answer = await this.synthesizer.answer(intent.question, turn.state.preferences, turn.router);
    if (answer.failure) {
      this.reportUnavailable(turn, answer.failure, "answered with a canned reply");
    }
    turn.payload.textAnswer = answer.text;
    turn.outcome.answer_generated = answer.source === "model";
  }

  private async loadPantry(turn: Turn): Promise<TurnPantry> {
    const result = await turn.router.dispatch("inventory.get", { sessionId: turn.state.sessionId });
    if (result.ok) {
      return this.refreshPantry(turn, result.value);
    }

    const refreshed = turn.state.pantryRefreshedAt ?? "an earlier turn";
    this.reportUnavailable(turn, result.failure, `using the pantry as of ${refreshed}`);
    turn.pantry = { items: turn.state.pantrySnapshot, source: "cached" };
    return turn.pantry;
  }

  private refreshPantry(turn: Turn, items: PantryItem[]): TurnPantry {
    turn.state.pantrySnapshot = items;
    turn.state.pantryRefreshedAt = turn.now.toISOString();
    turn.pantry = { items, source: "live" };
    return turn.pantry;
  }

  private pantrySummary(turn: Turn): PantrySummary {
    const pantry = turn.pantry ?? { items: turn.state.pantrySnapshot, source: "cached" };
    return {
      items: pantry.items,
      expiringSoon: expiringSoon(pantry.items, this.config.expiryWindowDays, turn.now),
      applied: turn.applied,
      source: pantry.source,
    };
  }

  private reportUnavailable(turn: Turn, failure: DelegationFailure, consequence: string): void {
    if (failure.reason === "cancelled") {
      return;
    }
    turn.issues.push(issueFor("CollaboratorUnavailable", failure));
    turn.degraded.push(`${failure.action} ${failure.reason}: ${consequence}`);
  }
}

function issueFor(kind: IssueKind, failure: DelegationFailure): TurnIssue {
  return { kind, message: failure.message, collaborator: failure.collaborator };
}

export type KitchenAssistantOverrides = Partial<Omit<KitchenAssistantOptions, "collaborators">> & {
  collaborators?: Partial<Collaborators>;
};

/** Wires the assistant from environment variables with the in-process collaborators. */
export function createKitchenAssistantFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: KitchenAssistantOverrides = {},
): KitchenAssistant {
  const config = { ...readEngineConfigFromEnv(env), ...overrides.config };
  const textConfig = resolveTextGenerationConfigFromEnv(env);
  const collaborators: Collaborators = {
    inventory: new InMemoryInventoryStore(),
    search: new InMemoryRecipeIndex(),
    substitutions: new JsonSubstitutionCatalog(),
    textGenerator: textConfig ? new OpenAiCompatibleTextGenerator(textConfig) : undefined,
    ...overrides.collaborators,
  };

  return new KitchenAssistant({ ...overrides, config, collaborators });
}
