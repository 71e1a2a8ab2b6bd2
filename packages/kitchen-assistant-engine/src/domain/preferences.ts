import type { PreferenceDelta, Preferences } from "@kitchen-assistant/contracts";
import { compactWhitespace, normalizeIngredientName, uniqueSorted } from "./ingredients.js";

export function emptyPreferences(): Preferences {
  return {
    dietaryRestrictions: [],
    allergies: [],
    cuisinePreferences: [],
    skillLevel: "beginner",
  };
}

export function normalizeAllergy(value: string): string {
  return normalizeIngredientName(value);
}

export function normalizeDietaryRestriction(value: string): string {
  return compactWhitespace(value.toLowerCase().replace(/[^a-z0-9\s-]/g, "")).replace(/\s+/g, "-");
}

export function normalizeCuisine(value: string): string {
  return compactWhitespace(value.toLowerCase().replace(/[^a-z0-9\s-]/g, ""));
}

function mergeSet(
  current: string[],
  added: string[] | undefined,
  removed: string[] | undefined,
  normalize: (value: string) => string,
): string[] {
  const removals = new Set((removed ?? []).map(normalize));
  const merged = [...current, ...(added ?? [])]
    .map(normalize)
    .filter((value) => value.length > 0 && !removals.has(value));
  return uniqueSorted(merged);
}

/**
 * Applies a delta: scalar fields present in the delta override, set fields are
 * added. Entries only leave a set through its explicit remove list, so a delta
 * can never silently drop an allergy.
 */
export function mergePreferences(current: Preferences, delta: PreferenceDelta | undefined): Preferences {
  if (!delta) {
    return normalizePreferences(current);
  }

  const merged: Preferences = {
    dietaryRestrictions: mergeSet(
      current.dietaryRestrictions,
      delta.dietaryRestrictions,
      delta.removeDietaryRestrictions,
      normalizeDietaryRestriction,
    ),
    allergies: mergeSet(current.allergies, delta.allergies, delta.removeAllergies, normalizeAllergy),
    cuisinePreferences: mergeSet(
      current.cuisinePreferences,
      delta.cuisinePreferences,
      delta.removeCuisinePreferences,
      normalizeCuisine,
    ),
    skillLevel: delta.skillLevel ?? current.skillLevel,
  };

  const servings = delta.servings ?? current.servings;
  if (servings !== undefined) {
    merged.servings = servings;
  }
  return merged;
}

export function normalizePreferences(preferences: Preferences): Preferences {
  return mergePreferences(preferences, {});
}

export function isEmptyDelta(delta: PreferenceDelta): boolean {
  return Object.values(delta).every(
    (value) => value === undefined || (Array.isArray(value) && value.length === 0),
  );
}

export function countActiveConstraints(preferences: Preferences): number {
  return (
    preferences.dietaryRestrictions.length +
    preferences.allergies.length +
    preferences.cuisinePreferences.length
  );
}
