import type {
  CandidateRecipe,
  PantryItem,
  Preferences,
  RankedRecommendation,
  SearchHit,
  SkillLevel,
} from "@kitchen-assistant/contracts";
import { DietaryRulebook } from "../domain/dietary-rules.js";
import { expirationBonusForItem, isExpiringWithin } from "../domain/expiry.js";
import { ingredientTokens, normalizeIngredientName, pantryNameCovers } from "../domain/ingredients.js";
import { inStock } from "../domain/pantry.js";

export type RankingWeights = {
  semantic: number;
  coverage: number;
};

export const DEFAULT_RANKING_WEIGHTS: RankingWeights = { semantic: 0.35, coverage: 0.65 };

export type RankingOptions = {
  allowMissing: number;
  relaxBy: number;
  expiryWindowDays: number;
  weights?: RankingWeights;
};

export type RankingInput = {
  hits: SearchHit[];
  pantry: PantryItem[];
  preferences: Preferences;
  now: Date;
};

export type ExclusionCounts = {
  allergen: number;
  diet: number;
  missing: number;
};

export type RankingResult =
  | {
      status: "ranked";
      recommendations: RankedRecommendation[];
      relaxed: boolean;
      allowMissing: number;
      excluded: ExclusionCounts;
    }
  | {
      status: "no_candidates";
      shoppingList: string[];
      closest: RankedRecommendation[];
      allowMissing: number;
      excluded: ExclusionCounts;
    };

const TOP_N = 3;
const SKILL_MATCH_BONUS = 5;
const SKILL_STEP_PENALTY = 5;
const CUISINE_BONUS = 5;

const SKILL_ORDER: Record<SkillLevel, number> = { beginner: 0, intermediate: 1, advanced: 2 };
const SHOPPING_LIST_RECIPES = 3;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** One entry per recipe id; a duplicate keeps the copy with the higher source score. */
export function dedupeHits(hits: SearchHit[]): SearchHit[] {
  const byId = new Map<string, SearchHit>();
  for (const hit of hits) {
    const existing = byId.get(hit.recipe.id);
    if (
      !existing ||
      hit.recipe.sourceScore > existing.recipe.sourceScore ||
      (hit.recipe.sourceScore === existing.recipe.sourceScore && hit.similarity > existing.similarity)
    ) {
      byId.set(hit.recipe.id, hit);
    }
  }
  return [...byId.values()];
}

export function compareRecommendations(left: RankedRecommendation, right: RankedRecommendation): number {
  return (
    right.compositeScore - left.compositeScore ||
    left.missingIngredients.length - right.missingIngredients.length ||
    right.expiringIngredientsUsed.length - left.expiringIngredientsUsed.length ||
    (left.recipe.id < right.recipe.id ? -1 : left.recipe.id > right.recipe.id ? 1 : 0)
  );
}

/**
 * Points for fitting the cook: a recipe at the cook's skill level gains, each
 * level above it costs, easier recipes are neutral. A favored cuisine gains.
 */
export function preferenceBonus(recipe: CandidateRecipe, preferences: Preferences): number {
  let bonus = 0;
  if (recipe.difficulty) {
    const gap = SKILL_ORDER[recipe.difficulty] - SKILL_ORDER[preferences.skillLevel];
    if (gap === 0) {
      bonus += SKILL_MATCH_BONUS;
    } else if (gap > 0) {
      bonus -= SKILL_STEP_PENALTY * gap;
    }
  }
  const cuisine = recipe.cuisine?.toLowerCase();
  if (cuisine && preferences.cuisinePreferences.includes(cuisine)) {
    bonus += CUISINE_BONUS;
  }
  return bonus;
}

type Screened =
  | { outcome: "kept"; recommendation: RankedRecommendation }
  | { outcome: "allergen" | "diet" };

/**
 * Scores search hits against the pantry: hard allergy and diet filters,
 * ingredient coverage, an urgency bonus for expiring items and a weighted
 * composite. Output order is a pure function of the inputs.
 */
export class HybridRanker {
  private readonly rulebook: DietaryRulebook;
  private readonly options: Required<RankingOptions>;

  constructor(rulebook: DietaryRulebook, options: RankingOptions) {
    this.rulebook = rulebook;
    this.options = { ...options, weights: options.weights ?? DEFAULT_RANKING_WEIGHTS };
  }

  rank(input: RankingInput): RankingResult {
    const pantry = inStock(input.pantry).toSorted((left, right) => left.name.localeCompare(right.name));
    const excluded: ExclusionCounts = { allergen: 0, diet: 0, missing: 0 };

    const screened: RankedRecommendation[] = [];
    for (const hit of dedupeHits(input.hits)) {
      const result = this.screen(hit, pantry, input.preferences, input.now);
      if (result.outcome === "kept") {
        screened.push(result.recommendation);
      } else {
        excluded[result.outcome] += 1;
      }
    }

    const sorted = screened.toSorted(compareRecommendations);
    const within = (limit: number) => sorted.filter((entry) => entry.missingIngredients.length <= limit);

    const strict = within(this.options.allowMissing);
    if (strict.length >= TOP_N) {
      excluded.missing = sorted.length - strict.length;
      return {
        status: "ranked",
        recommendations: strict.slice(0, TOP_N),
        relaxed: false,
        allowMissing: this.options.allowMissing,
        excluded,
      };
    }

    const relaxedLimit = this.options.allowMissing + this.options.relaxBy;
    const relaxed = within(relaxedLimit);
    excluded.missing = sorted.length - relaxed.length;
    if (relaxed.length > 0) {
      return {
        status: "ranked",
        recommendations: relaxed.slice(0, TOP_N),
        relaxed: relaxed.length > strict.length,
        allowMissing: relaxedLimit,
        excluded,
      };
    }

    const closest = sorted
      .toSorted(
        (left, right) =>
          left.missingIngredients.length - right.missingIngredients.length || compareRecommendations(left, right),
      )
      .slice(0, SHOPPING_LIST_RECIPES);
    return {
      status: "no_candidates",
      shoppingList: [...new Set(closest.flatMap((entry) => entry.missingIngredients))],
      closest,
      allowMissing: relaxedLimit,
      excluded,
    };
  }

  private allergenIn(recipe: CandidateRecipe, preferences: Preferences): string | undefined {
    for (const ingredient of recipe.ingredients) {
      const allergy = this.rulebook.findAllergen(ingredient.name, preferences.allergies);
      if (allergy) {
        return allergy;
      }
    }
    return undefined;
  }

  private screen(hit: SearchHit, pantry: PantryItem[], preferences: Preferences, now: Date): Screened {
    const { recipe } = hit;
    if (this.allergenIn(recipe, preferences) !== undefined) {
      return { outcome: "allergen" };
    }

    const dietUnverified: string[] = [];
    const dietCompliant: string[] = [];
    for (const restriction of preferences.dietaryRestrictions) {
      const verdict = this.rulebook.evaluateDiet(recipe, restriction);
      if (verdict.status === "violated") {
        return { outcome: "diet" };
      }
      (verdict.status === "compliant" ? dietCompliant : dietUnverified).push(restriction);
    }

    const ingredientNames = [...new Set(recipe.ingredients.map((ingredient) => normalizeIngredientName(ingredient.name)))]
      .filter((name) => name.length > 0);
    const used = new Map<string, PantryItem>();
    const pantryIngredientsUsed: string[] = [];
    const missingIngredients: string[] = [];
    for (const name of ingredientNames) {
      const item = coveringItem(pantry, name);
      if (item) {
        pantryIngredientsUsed.push(name);
        used.set(item.name, item);
      } else {
        missingIngredients.push(name);
      }
    }

    const usedItems = [...used.values()];
    const expiringIngredientsUsed = usedItems
      .filter((item) => isExpiringWithin(item, this.options.expiryWindowDays, now))
      .map((item) => item.name);
    const expirationBonus = round2(
      usedItems.reduce((sum, item) => sum + expirationBonusForItem(item, this.options.expiryWindowDays, now), 0),
    );

    const coverageFraction = ingredientNames.length === 0 ? 0 : pantryIngredientsUsed.length / ingredientNames.length;
    const { weights } = this.options;
    const fit = preferenceBonus(recipe, preferences);
    const compositeScore = round2(
      clamp(
        weights.semantic * hit.similarity * 100 + weights.coverage * coverageFraction * 100 + expirationBonus + fit,
        0,
        100,
      ),
    );

    const recommendation: RankedRecommendation = {
      recipe,
      compositeScore,
      coverageFraction: round2(coverageFraction),
      missingIngredients,
      pantryIngredientsUsed,
      usesExpiring: expiringIngredientsUsed.length > 0,
      expiringIngredientsUsed,
      semanticScore: round2(hit.similarity * 100),
      expirationBonus,
      preferenceBonus: fit,
      dietUnverified,
      reasons: [],
    };
    recommendation.reasons = explainRanking(recommendation, ingredientNames.length, preferences, dietCompliant);
    return { outcome: "kept", recommendation };
  }
}

function coveringItem(pantry: PantryItem[], ingredientName: string): PantryItem | undefined {
  let best: PantryItem | undefined;
  for (const item of pantry) {
    if (!pantryNameCovers(item.name, ingredientName)) {
      continue;
    }
    if (!best || ingredientTokens(item.name).length > ingredientTokens(best.name).length) {
      best = item;
    }
  }
  return best;
}

function explainRanking(
  recommendation: RankedRecommendation,
  ingredientCount: number,
  preferences: Preferences,
  dietCompliant: string[],
): string[] {
  const reasons = [
    `uses ${recommendation.pantryIngredientsUsed.length} of ${ingredientCount} ingredients from your pantry`,
  ];
  if (recommendation.expiringIngredientsUsed.length > 0) {
    reasons.push(`uses expiring ${recommendation.expiringIngredientsUsed.join(", ")}`);
  }
  reasons.push(
    recommendation.missingIngredients.length === 0
      ? "needs nothing extra"
      : `needs ${recommendation.missingIngredients.length} more: ${recommendation.missingIngredients.join(", ")}`,
  );
  for (const restriction of dietCompliant) {
    reasons.push(`fits ${restriction}`);
  }
  for (const restriction of recommendation.dietUnverified) {
    reasons.push(`${restriction} not verified`);
  }
  if (preferences.allergies.length > 0) {
    reasons.push(`free of ${preferences.allergies.join(", ")}`);
  }
  const cuisine = recommendation.recipe.cuisine?.toLowerCase();
  if (cuisine && preferences.cuisinePreferences.includes(cuisine)) {
    reasons.push(`matches your ${cuisine} preference`);
  }
  const difficulty = recommendation.recipe.difficulty;
  if (difficulty === preferences.skillLevel) {
    reasons.push(`suits ${difficulty} cooks`);
  } else if (difficulty && SKILL_ORDER[difficulty] > SKILL_ORDER[preferences.skillLevel]) {
    reasons.push(`rated ${difficulty}, above your ${preferences.skillLevel} level`);
  }
  return reasons;
}
