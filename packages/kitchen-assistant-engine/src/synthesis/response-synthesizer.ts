import {
  ModelAnswerSchema,
  ModelExplanationSchema,
  type AdaptedRecipe,
  type ConstraintViolation,
  type PantryDelta,
  type PantryItem,
  type PantrySummary,
  type Preferences,
  type RankedRecommendation,
  type StructuredPayload,
} from "@kitchen-assistant/contracts";
import { z } from "zod";
import { isPieceWord } from "../domain/ingredients.js";
import { defaultLogger, type EngineLogger } from "../logger.js";
import type { DelegationFailure, DelegationRouter } from "../router/delegation-router.js";

const EXPLANATION_JSON_SCHEMA = z.toJSONSchema(ModelExplanationSchema);
const ANSWER_JSON_SCHEMA = z.toJSONSchema(ModelAnswerSchema);

const EXPLANATION_SYSTEM_PROMPT =
  "You explain recipe suggestions to a home cook in a friendly, brief way. Only restate facts from the payload; never add ingredients or recipes. Return JSON matching the schema.";

const ANSWER_SYSTEM_PROMPT =
  "You answer short cooking and food storage questions for a home cook in at most a few sentences. Respect the listed allergies and diets. Return JSON matching the schema.";

export const TEMPLATED_ANSWER =
  "I can't answer general cooking questions right now. I can still update your pantry or suggest recipes from what you have.";

export const GREETING_REPLY =
  "Hi! Tell me what you bought or used up, ask what you can cook, or ask a cooking question.";

export type TextOutcome = {
  text: string;
  source: "model" | "template";
  failure?: DelegationFailure;
};

export type ResponseSynthesizerOptions = {
  logger?: EngineLogger;
};

function formatAmount(quantity: number | undefined, unit: string | undefined): string {
  if (quantity === undefined) {
    return "";
  }
  return unit ? `${quantity} ${unit}` : `${quantity}`;
}

function formatDays(days: number): string {
  if (days <= 0) {
    return "today";
  }
  return days === 1 ? "1 day" : `${days} days`;
}

function pluralPiece(unit: string, quantity: number): string {
  if (quantity === 1) {
    return unit;
  }
  if (unit === "loaf") {
    return "loaves";
  }
  return /(?:s|x|ch|sh)$/.test(unit) ? `${unit}es` : `${unit}s`;
}

export function describeDelta(delta: PantryDelta): string {
  if (delta.removeAll) {
    return `removed ${delta.name}`;
  }
  const quantity = Math.abs(delta.change);
  // "2 chicken breasts" rather than "2 breast chicken".
  const described =
    delta.unit && isPieceWord(delta.unit)
      ? `${quantity} ${delta.name} ${pluralPiece(delta.unit, quantity)}`
      : `${formatAmount(quantity, delta.unit)} ${delta.name}`;
  return delta.change >= 0 ? `added ${described}` : `used ${described}`;
}

export function describeItem(item: PantryItem): string {
  return `${item.name} (${formatAmount(item.quantity, item.unit)})`;
}

export function describePantry(summary: PantrySummary): string {
  if (summary.items.length === 0) {
    return "Your pantry is empty.";
  }
  const lines = [`You have ${summary.items.length} item(s): ${summary.items.map(describeItem).join(", ")}.`];
  if (summary.expiringSoon.length > 0) {
    lines.push(`Use soon: ${describeExpiring(summary)}.`);
  }
  return lines.join(" ");
}

function describeExpiring(summary: PantrySummary): string {
  return summary.expiringSoon.map((entry) => `${entry.name} (${formatDays(entry.daysRemaining)})`).join(", ");
}

/** Short confirmation of the preferences the assistant now works with. */
export function acknowledgePreferences(preferences: Preferences): string {
  const parts: string[] = [];
  if (preferences.allergies.length > 0) {
    parts.push(`avoiding ${preferences.allergies.join(", ")}`);
  }
  if (preferences.dietaryRestrictions.length > 0) {
    parts.push(`keeping it ${preferences.dietaryRestrictions.join(", ")}`);
  }
  if (preferences.cuisinePreferences.length > 0) {
    parts.push(`favoring ${preferences.cuisinePreferences.join(", ")} food`);
  }
  if (preferences.skillLevel !== "beginner") {
    parts.push(`${preferences.skillLevel} recipes welcome`);
  }
  if (preferences.servings !== undefined) {
    parts.push(`cooking for ${preferences.servings}`);
  }
  return parts.length === 0 ? "Got it." : `Got it. I'll keep that in mind: ${parts.join("; ")}.`;
}

function describeRecommendations(recommendations: RankedRecommendation[]): string[] {
  const lines = [`Here ${recommendations.length === 1 ? "is 1 recipe" : `are ${recommendations.length} recipes`} for you:`];
  recommendations.forEach((entry, position) => {
    lines.push(`${position + 1}. ${entry.recipe.title} (score ${entry.compositeScore}): ${entry.reasons.join("; ")}`);
  });
  lines.push("Reply with a number to get the full recipe.");
  return lines;
}

function describeAdaptedRecipe(recipe: AdaptedRecipe): string[] {
  const lines = [`${recipe.title} for ${recipe.servings} serving${recipe.servings === 1 ? "" : "s"}.`];
  if (recipe.adaptationsMade.length > 0) {
    lines.push(`Changes: ${recipe.adaptationsMade.join("; ")}.`);
  }
  if (recipe.dietUnverified.length > 0) {
    lines.push(`Could not confirm this is ${recipe.dietUnverified.join(" or ")}; check the labels.`);
  }
  lines.push(
    recipe.toBuy.length === 0 ? "Everything comes from your pantry." : `You still need to buy: ${recipe.toBuy.join(", ")}.`,
  );
  for (const entry of recipe.unresolved) {
    lines.push(`No safe substitute for ${entry.ingredient} in your pantry; you could buy ${entry.alternatives.join(" or ")}.`);
  }
  recipe.instructions.forEach((step, position) => {
    lines.push(`Step ${position + 1}: ${step}`);
  });
  return lines;
}

function describeWithdrawn(titles: string[]): string {
  return titles.length === 1
    ? `${titles[0]} no longer fits your preferences, so I took it off the list.`
    : `${titles.join(", ")} no longer fit your preferences, so I took them off the list.`;
}

function describeViolations(violations: ConstraintViolation[]): string {
  return `I can't show that recipe safely: ${violations.map((violation) => violation.message).join("; ")}. Pick another option or ask for new ideas.`;
}

/**
 * Turns a structured payload into the text shown to the user. The templated
 * explanation always exists; a model explanation may replace it.
 */
export class ResponseSynthesizer {
  private readonly logger: EngineLogger;

  constructor(options: ResponseSynthesizerOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
  }

  explain(payload: StructuredPayload): string {
    const lines: string[] = [];
    const summary = payload.pantrySummary;
    if (summary && summary.applied.length > 0) {
      lines.push(`Pantry updated: ${summary.applied.map(describeDelta).join(", ")}.`);
    }
    if (payload.textAnswer) {
      lines.push(payload.textAnswer);
    }
    if (payload.withdrawnOptions && payload.withdrawnOptions.length > 0) {
      lines.push(describeWithdrawn(payload.withdrawnOptions));
    }
    if (payload.recommendations && payload.recommendations.length > 0) {
      if (summary && summary.expiringSoon.length > 0) {
        lines.push(`Use soon: ${describeExpiring(summary)}.`);
      }
      lines.push(...describeRecommendations(payload.recommendations));
    }
    if (payload.shoppingList) {
      lines.push(
        payload.shoppingList.length > 0
          ? `No safe recipe fits what you have. Buying these would open up options: ${payload.shoppingList.join(", ")}.`
          : "No safe recipe matches your request. Try a different dish or relax a preference.",
      );
    }
    if (payload.adaptedRecipe) {
      lines.push(...describeAdaptedRecipe(payload.adaptedRecipe));
    }
    if (payload.violations && payload.violations.length > 0) {
      lines.push(describeViolations(payload.violations));
    }
    if (payload.clarification) {
      lines.push(payload.clarification);
    }
    if (payload.degraded && payload.degraded.length > 0) {
      lines.push("Some services were unavailable, so this answer may be limited.");
    }
    return lines.join("\n");
  }

  /** Templated explanation, replaced by a model explanation for recipe results when one is valid. */
  async synthesize(payload: StructuredPayload, router: DelegationRouter): Promise<TextOutcome> {
    const templated = this.explain(payload);
    const explainable =
      (payload.recommendations?.length ?? 0) > 0 || (payload.adaptedRecipe !== undefined && !payload.violations);
    if (!explainable || !router.isAvailable("text.complete")) {
      return { text: templated, source: "template" };
    }

    const result = await router.generate(ModelExplanationSchema, {
      system: EXPLANATION_SYSTEM_PROMPT,
      prompt: JSON.stringify({
        recommendations: payload.recommendations?.map((entry) => ({
          title: entry.recipe.title,
          score: entry.compositeScore,
          reasons: entry.reasons,
        })),
        adaptedRecipe: payload.adaptedRecipe,
        templated,
      }),
      schemaName: "recipe_explanation",
      jsonSchema: EXPLANATION_JSON_SCHEMA,
    });
    if (!result.ok) {
      this.logger.warn(`using templated explanation: ${result.failure.message}`);
      return { text: templated, source: "template", failure: result.failure };
    }
    return { text: result.value.explanation, source: "model" };
  }

  async answer(question: string, preferences: Preferences, router: DelegationRouter): Promise<TextOutcome> {
    if (!router.isAvailable("text.complete")) {
      return { text: TEMPLATED_ANSWER, source: "template" };
    }

    const result = await router.generate(ModelAnswerSchema, {
      system: ANSWER_SYSTEM_PROMPT,
      prompt: JSON.stringify({
        question,
        allergies: preferences.allergies,
        dietaryRestrictions: preferences.dietaryRestrictions,
      }),
      schemaName: "cooking_answer",
      jsonSchema: ANSWER_JSON_SCHEMA,
    });
    if (!result.ok) {
      this.logger.warn(`using templated answer: ${result.failure.message}`);
      return { text: TEMPLATED_ANSWER, source: "template", failure: result.failure };
    }
    return { text: result.value.answer, source: "model" };
  }
}
