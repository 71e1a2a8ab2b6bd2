import type {
  Complexity,
  FallbackStep,
  PlanStep,
  Preferences,
  SuccessCriterion,
  TaskPlan,
} from "@kitchen-assistant/contracts";
import type { Intent } from "../classifier/intents.js";
import { countActiveConstraints } from "../domain/preferences.js";

export type PlanningInput = {
  intents: Intent[];
  preferences: Preferences;
  hasPendingSelection: boolean;
  now: Date;
};

type IntentBlueprint = {
  steps: PlanStep[];
  criteria: SuccessCriterion[];
  fallbacks: FallbackStep[];
};

const FALLBACK_DESCRIPTIONS: Record<FallbackStep, string> = {
  relax_allow_missing: "relax the missing-ingredient allowance once",
  keyword_only_search: "search by ingredient keywords when semantic search fails",
  cached_inventory: "use the cached pantry snapshot when the inventory is unreachable",
  templated_text: "use templated text when generation fails",
  mark_missing_without_substitute: "list missing ingredients to buy when no safe substitute exists",
};

const SINGLE_COLLABORATOR_INTENTS = new Set<Intent["type"]>(["mutate_pantry", "general_query", "ambiguous"]);

function blueprintFor(intent: Intent): IntentBlueprint {
  switch (intent.type) {
    case "mutate_pantry":
      return {
        steps: [{ collaborator: "inventory", action: "apply_delta" }],
        criteria: ["mutation_applied"],
        fallbacks: [],
      };
    case "search_recipes":
      return {
        steps: [
          { collaborator: "inventory", action: "get" },
          { collaborator: "search", action: "embed" },
          { collaborator: "search", action: "query" },
          { collaborator: "ranker", action: "rank" },
          { collaborator: "synthesizer", action: "explain" },
        ],
        criteria: ["candidate_passes_hard_filters", "top_three_distinct"],
        fallbacks: ["relax_allow_missing", "keyword_only_search", "cached_inventory", "templated_text"],
      };
    case "select_recommendation":
      return {
        steps: [
          { collaborator: "inventory", action: "get" },
          { collaborator: "substitution", action: "lookup" },
          { collaborator: "adapter", action: "adapt" },
          { collaborator: "quality_gate", action: "check" },
        ],
        criteria: ["selection_in_range", "adapted_recipe_passes_gate"],
        fallbacks: ["cached_inventory", "mark_missing_without_substitute"],
      };
    case "general_query":
      if (intent.acknowledgeOnly) {
        return {
          steps: [{ collaborator: "synthesizer", action: "acknowledge" }],
          criteria: ["answer_generated"],
          fallbacks: [],
        };
      }
      return intent.aboutPantry
        ? {
            steps: [{ collaborator: "inventory", action: "get" }],
            criteria: ["answer_generated"],
            fallbacks: ["cached_inventory"],
          }
        : {
            steps: [{ collaborator: "text_generation", action: "answer" }],
            criteria: ["answer_generated"],
            fallbacks: ["templated_text"],
          };
    case "ambiguous":
      return {
        steps: [{ collaborator: "synthesizer", action: "clarify" }],
        criteria: ["clarification_requested"],
        fallbacks: [],
      };
  }
}

/**
 * Complexity tier for a turn. A lone intent served by one collaborator is
 * simple whatever the preferences; otherwise three or more active
 * constraints, a compound message, or a pending selection under any
 * constraint make it complex.
 */
export function assessComplexity(input: Omit<PlanningInput, "now">): Complexity {
  const [only, ...others] = input.intents;
  if (only && others.length === 0 && SINGLE_COLLABORATOR_INTENTS.has(only.type)) {
    return "simple";
  }

  const constraints = countActiveConstraints(input.preferences);
  if (constraints >= 3 || others.length > 0 || (input.hasPendingSelection && constraints >= 1)) {
    return "complex";
  }
  return "medium";
}

export function describeFallbacks(fallbacks: FallbackStep[]): string {
  if (fallbacks.length === 0) {
    return "none: report the failure to the user";
  }
  return fallbacks.map((step) => FALLBACK_DESCRIPTIONS[step]).join(", then ");
}

/** Builds the plan for a turn. Plans only describe work; the orchestrator runs it. */
export function planTurn(input: PlanningInput): TaskPlan {
  const blueprints = input.intents.map(blueprintFor);
  const fallbacks = unique(blueprints.flatMap((blueprint) => blueprint.fallbacks));

  return {
    complexity: assessComplexity(input),
    intents: input.intents.map((intent) => intent.type),
    orderedSteps: blueprints.flatMap((blueprint) => blueprint.steps),
    successCriteria: unique(blueprints.flatMap((blueprint) => blueprint.criteria)),
    fallbackStrategy: describeFallbacks(fallbacks),
    fallbacks,
    createdAt: input.now.toISOString(),
  };
}

export function summarizePlan(plan: TaskPlan): string {
  const steps = plan.orderedSteps.map((step) => `${step.collaborator}.${step.action}`).join(" -> ");
  return `${plan.complexity} plan [${plan.intents.join(", ")}]: ${steps}`;
}

export type CriteriaEvaluation = {
  met: SuccessCriterion[];
  unmet: SuccessCriterion[];
};

export function evaluateSuccessCriteria(
  plan: TaskPlan,
  outcome: Partial<Record<SuccessCriterion, boolean>>,
): CriteriaEvaluation {
  const met = plan.successCriteria.filter((criterion) => outcome[criterion] === true);
  const unmet = plan.successCriteria.filter((criterion) => outcome[criterion] !== true);
  return { met, unmet };
}

function unique<T>(values: T[]): T[] {
  return [...new Set(values)];
}
