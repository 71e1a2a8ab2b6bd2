import {
  ModelSubstitutionSchema,
  type AdaptedIngredient,
  type AdaptedRecipe,
  type CandidateRecipe,
  type PantryItem,
  type Preferences,
  type Substitution,
  type UnresolvedIngredient,
} from "@kitchen-assistant/contracts";
import { z } from "zod";
import { DietaryRulebook } from "../domain/dietary-rules.js";
import { normalizeIngredientName, pantryNameCovers } from "../domain/ingredients.js";
import { inStock } from "../domain/pantry.js";
import type { DelegationFailure, DelegationRouter } from "../router/delegation-router.js";

const SUBSTITUTION_JSON_SCHEMA = z.toJSONSchema(ModelSubstitutionSchema);

const SUBSTITUTION_SYSTEM_PROMPT =
  "You suggest ingredient substitutes for home cooking. Return up to five common substitutes, best first, as JSON matching the schema.";

export type AdaptationInput = {
  recipe: CandidateRecipe | AdaptedRecipe;
  pantry: PantryItem[];
  preferences: Preferences;
  defaultServings: number;
  /** Restrictions ranking could not confirm; an adapted recipe keeps its own when omitted. */
  dietUnverified?: string[];
};

export type AdaptationResult = {
  recipe: AdaptedRecipe;
  failures: DelegationFailure[];
};

type WorkingIngredient = {
  name: string;
  quantity?: number;
  unit?: string;
  substitutedFor?: string;
  origin?: Substitution["origin"];
};

type Alternatives = {
  names: string[];
  origin: Substitution["origin"];
};

function isAdapted(recipe: CandidateRecipe | AdaptedRecipe): recipe is AdaptedRecipe {
  return "recipeId" in recipe;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Replaces whole-word mentions of an ingredient, plural forms included. */
export function rewriteInstruction(step: string, original: string, replacement: string): string {
  const words = original.split(" ").map(escapeRegExp).join("\\s+");
  return step.replace(new RegExp(`\\b${words}(?:e?s)?\\b`, "gi"), replacement);
}

/**
 * Fits a recipe to the household: scales it to the wanted servings, marks
 * what the pantry covers, and swaps missing or unsafe ingredients for safe
 * alternatives the pantry holds. Adapting the result again against the same
 * pantry and preferences returns it unchanged.
 */
export class RecipeAdapter {
  private readonly rulebook: DietaryRulebook;

  constructor(rulebook: DietaryRulebook) {
    this.rulebook = rulebook;
  }

  async adapt(input: AdaptationInput, router: DelegationRouter): Promise<AdaptationResult> {
    const pantry = inStock(input.pantry);
    const failures: DelegationFailure[] = [];
    const { recipe, preferences } = input;

    const currentServings = recipe.servings ?? preferences.servings ?? input.defaultServings;
    const originalServings = isAdapted(recipe) ? Math.round(recipe.servings / recipe.scaleFactor) : currentServings;
    const targetServings = preferences.servings ?? currentServings;
    const relativeFactor = targetServings / currentServings;
    const scaleFactor = round2(targetServings / originalServings);

    const ingredients: AdaptedIngredient[] = [];
    const substitutions: Substitution[] = [];
    const unresolved: UnresolvedIngredient[] = [];
    const newSubstitutions: Substitution[] = [];

    for (const working of this.workingIngredients(recipe)) {
      const scaled = working.quantity === undefined ? undefined : round2(working.quantity * relativeFactor);
      if (working.substitutedFor && working.origin && this.usable(working.name, pantry, preferences)) {
        ingredients.push({
          ...withAmount(working.name, scaled, working.unit),
          source: "substituted",
          substitutedFor: working.substitutedFor,
        });
        substitutions.push({ original: working.substitutedFor, replacement: working.name, origin: working.origin });
        continue;
      }

      const name = working.substitutedFor ?? working.name;
      const safe = this.rulebook.isIngredientSafe(name, preferences);
      if (safe && covers(pantry, name)) {
        ingredients.push({ ...withAmount(name, scaled, working.unit), source: "pantry" });
        continue;
      }

      const alternatives = await this.alternativesFor(name, router, failures);
      const safeAlternatives = alternatives.names.filter(
        (alternative) => alternative !== name && this.rulebook.isIngredientSafe(alternative, preferences),
      );
      const replacement = safeAlternatives.find((alternative) => covers(pantry, alternative));

      if (replacement) {
        const substitution: Substitution = { original: name, replacement, origin: alternatives.origin };
        ingredients.push({
          ...withAmount(replacement, scaled, working.unit),
          source: "substituted",
          substitutedFor: name,
        });
        substitutions.push(substitution);
        newSubstitutions.push(substitution);
        continue;
      }

      // Unsafe ingredients the pantry already holds stay visible so the quality gate can reject them.
      ingredients.push({
        ...withAmount(name, scaled, working.unit),
        source: covers(pantry, name) ? "pantry" : "buy",
      });
      if (safeAlternatives.length > 0) {
        unresolved.push({ ingredient: name, alternatives: safeAlternatives });
      }
    }

    const instructions = recipe.instructions.map((step) =>
      newSubstitutions.reduce((text, entry) => rewriteInstruction(text, entry.original, entry.replacement), step),
    );

    const adaptationsMade: string[] = [];
    if (targetServings !== originalServings) {
      adaptationsMade.push(`scaled from ${originalServings} to ${targetServings} servings`);
    }
    for (const substitution of substitutions) {
      adaptationsMade.push(`replaced ${substitution.original} with ${substitution.replacement}`);
    }

    return {
      recipe: {
        recipeId: isAdapted(recipe) ? recipe.recipeId : recipe.id,
        title: recipe.title,
        servings: targetServings,
        scaleFactor,
        ingredients,
        instructions,
        fromPantry: ingredients.filter((entry) => entry.source !== "buy").map((entry) => entry.name),
        toBuy: ingredients.filter((entry) => entry.source === "buy").map((entry) => entry.name),
        substitutions,
        unresolved,
        adaptationsMade,
        tags: [...recipe.tags],
        dietUnverified: [...(input.dietUnverified ?? (isAdapted(recipe) ? recipe.dietUnverified : []))],
      },
      failures,
    };
  }

  private workingIngredients(recipe: CandidateRecipe | AdaptedRecipe): WorkingIngredient[] {
    if (!isAdapted(recipe)) {
      return recipe.ingredients.map((ingredient) =>
        withAmount(normalizeIngredientName(ingredient.name), ingredient.quantity, ingredient.unit),
      );
    }

    return recipe.ingredients.map((ingredient) => {
      const working: WorkingIngredient = withAmount(ingredient.name, ingredient.quantity, ingredient.unit);
      const origin = recipe.substitutions.find(
        (entry) => entry.replacement === ingredient.name && entry.original === ingredient.substitutedFor,
      )?.origin;
      if (ingredient.source === "substituted" && ingredient.substitutedFor && origin) {
        working.substitutedFor = ingredient.substitutedFor;
        working.origin = origin;
      }
      return working;
    });
  }

  private usable(name: string, pantry: PantryItem[], preferences: Preferences): boolean {
    return covers(pantry, name) && this.rulebook.isIngredientSafe(name, preferences);
  }

  private async alternativesFor(
    ingredient: string,
    router: DelegationRouter,
    failures: DelegationFailure[],
  ): Promise<Alternatives> {
    const catalog = await router.dispatch("substitution.lookup", { ingredient });
    if (catalog.ok && catalog.value.length > 0) {
      return { names: normalizeAll(catalog.value), origin: "catalog" };
    }
    if (!catalog.ok && catalog.failure.reason !== "unavailable") {
      failures.push(catalog.failure);
    }

    if (!router.isAvailable("text.complete")) {
      return { names: [], origin: "catalog" };
    }
    const generated = await router.generate(ModelSubstitutionSchema, {
      system: SUBSTITUTION_SYSTEM_PROMPT,
      prompt: `Ingredient: ${ingredient}`,
      schemaName: "ingredient_substitutes",
      jsonSchema: SUBSTITUTION_JSON_SCHEMA,
    });
    if (!generated.ok) {
      failures.push(generated.failure);
      return { names: [], origin: "generated" };
    }
    return { names: normalizeAll(generated.value.alternatives), origin: "generated" };
  }
}

function covers(pantry: PantryItem[], ingredientName: string): boolean {
  return pantry.some((item) => pantryNameCovers(item.name, ingredientName));
}

function normalizeAll(names: string[]): string[] {
  return [...new Set(names.map(normalizeIngredientName).filter((name) => name.length > 0))];
}

type Amount = { name: string; quantity?: number; unit?: string };

function withAmount(name: string, quantity: number | undefined, unit: string | undefined): Amount {
  const result: Amount = { name };
  if (quantity !== undefined) {
    result.quantity = quantity;
  }
  if (unit !== undefined) {
    result.unit = unit;
  }
  return result;
}
