import { describe, expect, it } from "vitest";
import { countActiveConstraints, emptyPreferences, isEmptyDelta, mergePreferences } from "./preferences.js";

describe("mergePreferences", () => {
  it("adds set entries, normalized and sorted", () => {
    const merged = mergePreferences(
      { ...emptyPreferences(), allergies: ["shellfish"] },
      { allergies: ["Peanuts", "shellfish"], dietaryRestrictions: ["Gluten Free"], cuisinePreferences: ["Thai"] },
    );

    expect(merged.allergies).toEqual(["peanut", "shellfish"]);
    expect(merged.dietaryRestrictions).toEqual(["gluten-free"]);
    expect(merged.cuisinePreferences).toEqual(["thai"]);
    expect(merged.skillLevel).toBe("beginner");
  });

  it("never drops an allergy unless it is explicitly removed", () => {
    const current = { ...emptyPreferences(), allergies: ["peanut", "shellfish"] };

    expect(mergePreferences(current, { allergies: [] }).allergies).toEqual(["peanut", "shellfish"]);
    expect(mergePreferences(current, { removeAllergies: ["Shellfish"] }).allergies).toEqual(["peanut"]);
  });

  it("overrides scalar fields only when present", () => {
    const current = { ...emptyPreferences(), skillLevel: "advanced" as const, servings: 4 };

    expect(mergePreferences(current, { cuisinePreferences: ["italian"] })).toMatchObject({
      skillLevel: "advanced",
      servings: 4,
    });
    expect(mergePreferences(current, { skillLevel: "beginner", servings: 2 })).toMatchObject({
      skillLevel: "beginner",
      servings: 2,
    });
  });

  it("does not mutate its inputs", () => {
    const current = emptyPreferences();
    mergePreferences(current, { allergies: ["egg"] });
    expect(current.allergies).toEqual([]);
  });

  it("detects empty deltas and counts constraints", () => {
    expect(isEmptyDelta({ allergies: [] })).toBe(true);
    expect(isEmptyDelta({ skillLevel: "advanced" })).toBe(false);
    expect(
      countActiveConstraints({
        ...emptyPreferences(),
        allergies: ["egg"],
        dietaryRestrictions: ["vegan"],
        cuisinePreferences: ["thai"],
      }),
    ).toBe(3);
  });
});
