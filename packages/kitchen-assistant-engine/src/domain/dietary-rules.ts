import { readFileSync } from "node:fs";
import type { ConstraintViolation, Preferences } from "@kitchen-assistant/contracts";
import { z } from "zod";
import { compactWhitespace, containsTokenSequence, ingredientTokens } from "./ingredients.js";

const DietRuleSchema = z.object({
  forbidden: z.array(z.string().min(1)),
  contradictingTags: z.array(z.string().min(1)),
  provenByTags: z.array(z.string().min(1)),
});

const DietaryRulesSchema = z.object({
  allergenFamilies: z.record(z.string(), z.array(z.string().min(1))),
  exceptions: z.record(z.string(), z.array(z.string().min(1))),
  diets: z.record(z.string(), DietRuleSchema),
  dietAliases: z.record(z.string(), z.string()),
});

export type DietRule = z.infer<typeof DietRuleSchema>;
export type DietaryRules = z.infer<typeof DietaryRulesSchema>;

export type DietVerdict =
  | { status: "compliant" }
  | { status: "unverified" }
  | { status: "violated"; ingredient?: string; tag?: string };

export type RecipeLike = {
  ingredients: Array<{ name: string }>;
  tags: string[];
};

const DEFAULT_RULES_URL = new URL("../../data/dietary-rules.json", import.meta.url);

export function loadDietaryRules(source: URL = DEFAULT_RULES_URL): DietaryRules {
  return DietaryRulesSchema.parse(JSON.parse(readFileSync(source, "utf8")));
}

export function normalizeTag(tag: string): string {
  return compactWhitespace(tag.toLowerCase()).replace(/\s+/g, "-");
}

/**
 * Allergy and diet matching over normalized ingredient names. Allergens match
 * as contiguous token sequences, expanded through allergen families, so an
 * allergy to "peanut" catches "crunchy peanut butter".
 */
export class DietaryRulebook {
  private readonly rules: DietaryRules;

  constructor(rules: DietaryRules = loadDietaryRules()) {
    this.rules = rules;
  }

  normalizeDiet(restriction: string): string {
    const cleaned = compactWhitespace(restriction.toLowerCase());
    const aliased = this.rules.dietAliases[cleaned] ?? cleaned;
    return aliased.replace(/\s+/g, "-");
  }

  isKnownDiet(restriction: string): boolean {
    return this.rules.diets[this.normalizeDiet(restriction)] !== undefined;
  }

  knownDiets(): string[] {
    return [...Object.keys(this.rules.diets), ...Object.keys(this.rules.dietAliases)];
  }

  allergenTerms(allergy: string): string[] {
    const key = ingredientTokens(allergy).join(" ");
    if (!key) {
      return [];
    }
    return [...new Set([key, ...(this.rules.allergenFamilies[key] ?? [])])];
  }

  /** Returns the allergy an ingredient triggers, if any. */
  findAllergen(ingredientName: string, allergies: string[]): string | undefined {
    for (const allergy of allergies) {
      if (this.allergenTerms(allergy).some((term) => this.matchesTerm(ingredientName, term))) {
        return allergy;
      }
    }
    return undefined;
  }

  ingredientViolatesDiet(ingredientName: string, restriction: string): boolean {
    const rule = this.rules.diets[this.normalizeDiet(restriction)];
    if (!rule) {
      return false;
    }
    return rule.forbidden.some((term) => this.matchesTerm(ingredientName, term));
  }

  evaluateDiet(recipe: RecipeLike, restriction: string): DietVerdict {
    const diet = this.normalizeDiet(restriction);
    const tags = new Set(recipe.tags.map(normalizeTag));
    const rule = this.rules.diets[diet];

    if (rule) {
      const offending = recipe.ingredients.find((ingredient) =>
        rule.forbidden.some((term) => this.matchesTerm(ingredient.name, term)),
      );
      if (offending) {
        return { status: "violated", ingredient: offending.name };
      }

      const contradicting = rule.contradictingTags.find((tag) => tags.has(normalizeTag(tag)));
      if (contradicting) {
        return { status: "violated", tag: contradicting };
      }

      if (rule.provenByTags.some((tag) => tags.has(normalizeTag(tag)))) {
        return { status: "compliant" };
      }
      return { status: "unverified" };
    }

    return tags.has(diet) ? { status: "compliant" } : { status: "unverified" };
  }

  /** Itemized allergen and forbidden-ingredient violations for one ingredient. */
  checkIngredient(ingredientName: string, preferences: Preferences): ConstraintViolation[] {
    const violations: ConstraintViolation[] = [];

    const allergen = this.findAllergen(ingredientName, preferences.allergies);
    if (allergen) {
      violations.push({
        kind: "allergen",
        ingredient: ingredientName,
        constraint: allergen,
        message: `${ingredientName} conflicts with the ${allergen} allergy`,
      });
    }

    for (const restriction of preferences.dietaryRestrictions) {
      if (this.ingredientViolatesDiet(ingredientName, restriction)) {
        violations.push({
          kind: "diet",
          ingredient: ingredientName,
          constraint: restriction,
          message: `${ingredientName} is not ${restriction}`,
        });
      }
    }

    return violations;
  }

  isIngredientSafe(ingredientName: string, preferences: Preferences): boolean {
    return this.checkIngredient(ingredientName, preferences).length === 0;
  }

  private matchesTerm(ingredientName: string, term: string): boolean {
    const tokens = ingredientTokens(ingredientName);
    const termTokens = ingredientTokens(term);
    if (!containsTokenSequence(tokens, termTokens)) {
      return false;
    }

    const exceptions = this.rules.exceptions[termTokens.join(" ")] ?? [];
    return !exceptions.some((exception) => containsTokenSequence(tokens, ingredientTokens(exception)));
  }
}
