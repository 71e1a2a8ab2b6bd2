import type { AdaptedRecipe, ConstraintViolation, Preferences, QualityReport } from "@kitchen-assistant/contracts";
import { DietaryRulebook } from "../domain/dietary-rules.js";

/**
 * Final allergy and diet check on an adapted recipe. Nothing reaches the
 * user as a recipe unless this reports `passed`.
 */
export class QualityGate {
  private readonly rulebook: DietaryRulebook;

  constructor(rulebook: DietaryRulebook) {
    this.rulebook = rulebook;
  }

  check(recipe: AdaptedRecipe, preferences: Preferences): QualityReport {
    const names = [
      ...recipe.ingredients.map((ingredient) => ingredient.name),
      ...recipe.substitutions.map((substitution) => substitution.replacement),
    ];

    const seen = new Set<string>();
    const violations: ConstraintViolation[] = [];
    for (const name of names) {
      for (const violation of this.rulebook.checkIngredient(name, preferences)) {
        const key = `${violation.kind}:${violation.ingredient}:${violation.constraint}`;
        if (!seen.has(key)) {
          seen.add(key);
          violations.push(violation);
        }
      }
    }

    return { passed: violations.length === 0, violations };
  }
}
