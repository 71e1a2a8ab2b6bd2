import { describe, expect, it } from "vitest";
import {
  CandidateRecipeSchema,
  ConversationStateSchema,
  ModelClassificationSchema,
  PantryDeltaSchema,
  PantryItemSchema,
  PreferenceDeltaSchema,
  TurnRequestSchema,
  TurnResponseSchema,
} from "./schemas.js";

describe("kitchen assistant contract schemas", () => {
  it("validates a turn request with partial known preferences", () => {
    const parsed = TurnRequestSchema.parse({
      sessionId: "session_1",
      message: "what can I make tonight?",
      knownPreferences: { allergies: ["peanut"] },
    });

    expect(parsed.knownPreferences?.allergies).toEqual(["peanut"]);
    expect(parsed.knownPreferences?.skillLevel).toBeUndefined();
  });

  it("rejects an empty session id", () => {
    const result = TurnRequestSchema.safeParse({ sessionId: "", message: "hi" });
    expect(result.success).toBe(false);
  });

  it("rejects negative pantry quantities but accepts signed deltas", () => {
    expect(PantryItemSchema.safeParse({ name: "milk", quantity: -1 }).success).toBe(false);

    const delta = PantryDeltaSchema.parse({ name: "milk", change: -1, unit: "l" });
    expect(delta.change).toBe(-1);
  });

  it("requires ISO dates for pantry expiration", () => {
    expect(
      PantryItemSchema.safeParse({ name: "spinach", quantity: 1, expirationDate: "2026-10-19" })
        .success,
    ).toBe(true);
    expect(
      PantryItemSchema.safeParse({ name: "spinach", quantity: 1, expirationDate: "tomorrow" })
        .success,
    ).toBe(false);
  });

  it("keeps source scores inside the unit interval", () => {
    const base = {
      id: "r1",
      title: "Tomato pasta",
      ingredients: [{ name: "pasta" }],
      instructions: ["Boil pasta."],
      tags: ["vegetarian"],
    };

    expect(CandidateRecipeSchema.safeParse({ ...base, sourceScore: 0.4 }).success).toBe(true);
    expect(CandidateRecipeSchema.safeParse({ ...base, sourceScore: 1.4 }).success).toBe(false);
  });

  it("caps pending candidates at three", () => {
    const recommendation = {
      recipe: {
        id: "r1",
        title: "Tomato pasta",
        ingredients: [{ name: "pasta" }],
        instructions: [],
        tags: [],
        sourceScore: 0.5,
      },
      compositeScore: 80,
      coverageFraction: 1,
      missingIngredients: [],
      pantryIngredientsUsed: ["pasta"],
      usesExpiring: false,
      expiringIngredientsUsed: [],
      semanticScore: 50,
      expirationBonus: 0,
      preferenceBonus: 0,
      dietUnverified: [],
      reasons: [],
    };

    const result = ConversationStateSchema.safeParse({
      sessionId: "session_1",
      stage: "AWAITING_SELECTION",
      preferences: {
        dietaryRestrictions: [],
        allergies: [],
        cuisinePreferences: [],
        skillLevel: "beginner",
      },
      pantrySnapshot: [],
      pendingCandidates: [recommendation, recommendation, recommendation, recommendation],
      createdAt: "2026-10-18T12:00:00.000Z",
      lastActiveAt: "2026-10-18T12:00:00.000Z",
      turnCount: 1,
    });

    expect(result.success).toBe(false);
  });

  it("accepts explicit allergy removal in a preference delta", () => {
    const parsed = PreferenceDeltaSchema.parse({ removeAllergies: ["shellfish"] });
    expect(parsed.removeAllergies).toEqual(["shellfish"]);
  });

  it("accepts model classifications with a null skill level", () => {
    const parsed = ModelClassificationSchema.parse({
      intents: [{ type: "search_recipes", query: "pasta dinner" }],
      preferences: {
        dietaryRestrictions: [],
        allergies: [],
        cuisinePreferences: ["italian"],
        skillLevel: null,
      },
    });

    expect(parsed.intents[0]?.type).toBe("search_recipes");
    expect(parsed.preferences.skillLevel).toBeNull();
  });

  it("rejects unknown stages in turn responses", () => {
    const result = TurnResponseSchema.safeParse({
      sessionId: "session_1",
      stage: "SHOPPING",
      payload: {},
      explanationText: "",
      updatedPreferences: {
        dietaryRestrictions: [],
        allergies: [],
        cuisinePreferences: [],
        skillLevel: "beginner",
      },
      issues: [],
    });

    expect(result.success).toBe(false);
  });
});
