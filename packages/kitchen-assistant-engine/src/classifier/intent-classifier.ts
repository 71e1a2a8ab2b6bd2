import {
  ModelClassificationSchema,
  type ModelClassification,
  type ModelIntent,
  type PantryDelta,
  type PreferenceDelta,
} from "@kitchen-assistant/contracts";
import { z } from "zod";
import { DietaryRulebook } from "../domain/dietary-rules.js";
import { normalizeIngredientName, normalizeUnit } from "../domain/ingredients.js";
import { defaultLogger, type EngineLogger } from "../logger.js";
import type { DelegationRouter } from "../router/delegation-router.js";
import {
  UNCLEAR_CLARIFICATION,
  orderIntents,
  resolveSelection,
  type Classification,
  type ClassifierContext,
  type Intent,
} from "./intents.js";
import { MessageParser, type ParsedMessage } from "./message-parser.js";

const CLASSIFICATION_JSON_SCHEMA = z.toJSONSchema(ModelClassificationSchema);

const CLASSIFIER_SYSTEM_PROMPT = [
  "You classify messages sent to a kitchen assistant.",
  "Intents: mutate_pantry (the user bought, used or ran out of ingredients; list items with signed changes),",
  "search_recipes (the user wants recipe ideas; give a short query),",
  "select_recommendation (the user picks a numbered option; give index),",
  "general_query (a cooking or pantry question), ambiguous (anything else).",
  "A message may carry several intents. List pantry changes before searches.",
  "Report dietary restrictions, allergies, cuisines and skill level the user states about themselves.",
  "Return only JSON matching the schema.",
].join(" ");

export type IntentClassifierOptions = {
  rulebook?: DietaryRulebook;
  useModel?: boolean;
  logger?: EngineLogger;
};

/**
 * Classifies a message with the text-generation collaborator when one is
 * configured and falls back to the rule-based parser otherwise. Either way
 * the intents come back in execution order.
 */
export class IntentClassifier {
  private readonly parser: MessageParser;
  private readonly useModel: boolean;
  private readonly logger: EngineLogger;

  constructor(options: IntentClassifierOptions = {}) {
    this.parser = new MessageParser(options.rulebook ?? new DietaryRulebook());
    this.useModel = options.useModel ?? true;
    this.logger = options.logger ?? defaultLogger;
  }

  async classify(context: ClassifierContext, router: DelegationRouter): Promise<Classification> {
    const heuristic = this.parser.parse(context);
    if (!this.useModel || !router.isAvailable("text.complete") || isSelectionOnly(heuristic)) {
      return { ...heuristic, source: "heuristic" };
    }

    const result = await router.generate(ModelClassificationSchema, {
      system: CLASSIFIER_SYSTEM_PROMPT,
      prompt: buildClassifierPrompt(context),
      schemaName: "message_classification",
      jsonSchema: CLASSIFICATION_JSON_SCHEMA,
    });
    if (!result.ok) {
      this.logger.warn(`model classification unavailable, using rules: ${result.failure.message}`);
      return { ...heuristic, source: "heuristic", degraded: result.failure };
    }

    const intents = orderIntents(
      result.value.intents
        .map((intent) => toIntent(intent, context, heuristic))
        .filter((intent): intent is Intent => intent !== undefined),
    );
    return {
      intents: intents.length > 0 ? intents : heuristic.intents,
      preferenceDelta: mergeModelPreferences(result.value.preferences, heuristic.preferenceDelta),
      source: "model",
    };
  }
}

function isSelectionOnly(parsed: ParsedMessage): boolean {
  const [only, ...rest] = parsed.intents;
  if (!only || rest.length > 0) {
    return false;
  }
  return only.type === "select_recommendation" || (only.type === "ambiguous" && only.reason === "invalid_selection");
}

function buildClassifierPrompt(context: ClassifierContext): string {
  return JSON.stringify(
    {
      today: context.now.toISOString().slice(0, 10),
      stage: context.stage,
      pendingOptions: context.pendingCount,
      preferences: context.preferences,
      message: context.message,
    },
    null,
    2,
  );
}

function toIntent(intent: ModelIntent, context: ClassifierContext, heuristic: ParsedMessage): Intent | undefined {
  switch (intent.type) {
    case "mutate_pantry": {
      const deltas = (intent.items ?? [])
        .filter((item) => item.change !== 0)
        .map((item) => withHeuristicExpiry(toDelta(item), heuristic))
        .filter((delta) => delta.name.length > 0);
      return deltas.length > 0 ? { type: "mutate_pantry", deltas } : undefined;
    }
    case "search_recipes":
      return { type: "search_recipes", query: intent.query?.trim() || context.message.trim() };
    case "select_recommendation":
      return intent.index === undefined
        ? { type: "ambiguous", reason: "unclear", clarification: UNCLEAR_CLARIFICATION }
        : resolveSelection(intent.index, context.stage, context.pendingCount);
    case "general_query": {
      const parsedGeneral = heuristic.intents.find((candidate) => candidate.type === "general_query");
      return {
        type: "general_query",
        question: context.message.trim(),
        acknowledgeOnly: false,
        aboutPantry: parsedGeneral?.type === "general_query" ? parsedGeneral.aboutPantry : false,
      };
    }
    case "ambiguous":
      return { type: "ambiguous", reason: "unclear", clarification: UNCLEAR_CLARIFICATION };
  }
}

function toDelta(item: { name: string; change: number; unit?: string }): PantryDelta {
  const delta: PantryDelta = { name: normalizeIngredientName(item.name), change: item.change };
  const unit = normalizeUnit(item.unit);
  if (unit && unit !== "count") {
    delta.unit = unit;
  }
  return delta;
}

function withHeuristicExpiry(delta: PantryDelta, heuristic: ParsedMessage): PantryDelta {
  for (const intent of heuristic.intents) {
    if (intent.type !== "mutate_pantry") {
      continue;
    }
    const match = intent.deltas.find((candidate) => candidate.name === delta.name && candidate.expirationDate);
    if (match?.expirationDate && delta.change > 0) {
      return { ...delta, expirationDate: match.expirationDate };
    }
  }
  return delta;
}

// Model output can only add; the parser's findings, removals included, are kept.
function mergeModelPreferences(
  model: ModelClassification["preferences"],
  heuristic: PreferenceDelta,
): PreferenceDelta {
  const merged: PreferenceDelta = { ...heuristic };
  const union = (left: string[] | undefined, right: string[]): string[] | undefined => {
    const values = [...new Set([...(left ?? []), ...right])];
    return values.length > 0 ? values : undefined;
  };

  const allergies = union(heuristic.allergies, model.allergies);
  const dietaryRestrictions = union(heuristic.dietaryRestrictions, model.dietaryRestrictions);
  const cuisinePreferences = union(heuristic.cuisinePreferences, model.cuisinePreferences);
  if (allergies) {
    merged.allergies = allergies;
  }
  if (dietaryRestrictions) {
    merged.dietaryRestrictions = dietaryRestrictions;
  }
  if (cuisinePreferences) {
    merged.cuisinePreferences = cuisinePreferences;
  }
  const skillLevel = model.skillLevel ?? heuristic.skillLevel;
  if (skillLevel) {
    merged.skillLevel = skillLevel;
  }
  return merged;
}
