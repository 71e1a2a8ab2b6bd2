import { describe, expect, it } from "vitest";
import { PantryDeltaError, applyPantryDeltas } from "./pantry.js";

describe("applyPantryDeltas", () => {
  it("adds new items and increments existing ones", () => {
    const next = applyPantryDeltas(
      [{ name: "tomato", quantity: 2 }],
      [
        { name: "Tomatoes", change: 3 },
        { name: "chicken", change: 2, unit: "breasts" },
      ],
    );

    expect(next).toEqual([
      { name: "chicken", quantity: 2, unit: "breast" },
      { name: "tomato", quantity: 5 },
    ]);
  });

  it("removes items that reach exactly zero", () => {
    expect(applyPantryDeltas([{ name: "egg", quantity: 2 }], [{ name: "eggs", change: -2 }])).toEqual([]);
  });

  it("rejects the whole batch when one delta would go negative", () => {
    const items = [
      { name: "egg", quantity: 2 },
      { name: "milk", quantity: 1, unit: "l" },
    ];

    expect(() =>
      applyPantryDeltas(items, [
        { name: "milk", change: -1 },
        { name: "egg", change: -3 },
      ]),
    ).toThrow(PantryDeltaError);
    expect(items).toEqual([
      { name: "egg", quantity: 2 },
      { name: "milk", quantity: 1, unit: "l" },
    ]);
  });

  it("reports the shortfall", () => {
    expect(() => applyPantryDeltas([], [{ name: "butter", change: -1 }])).toThrow(
      "cannot remove 1 butter: only 0 in pantry",
    );
  });

  it("drops items outright on removeAll and keeps the latest expiration", () => {
    const next = applyPantryDeltas(
      [
        { name: "spinach", quantity: 1, expirationDate: "2026-10-19" },
        { name: "rice", quantity: 1, unit: "kg" },
      ],
      [
        { name: "rice", change: 0, removeAll: true },
        { name: "spinach", change: 1, expirationDate: "2026-10-25" },
      ],
    );

    expect(next).toEqual([{ name: "spinach", quantity: 2, expirationDate: "2026-10-25" }]);
  });

  it("converts measures into the stored unit", () => {
    expect(applyPantryDeltas([{ name: "pasta", quantity: 1, unit: "kg" }], [{ name: "pasta", change: 500, unit: "g" }])).toEqual([
      { name: "pasta", quantity: 1.5, unit: "kg" },
    ]);
    expect(
      applyPantryDeltas([{ name: "milk", quantity: 1, unit: "l" }], [{ name: "milk", change: -250, unit: "ml" }]),
    ).toEqual([{ name: "milk", quantity: 0.75, unit: "l" }]);
    expect(
      applyPantryDeltas([{ name: "flour", quantity: 1, unit: "lb" }], [{ name: "flour", change: 8, unit: "ounces" }]),
    ).toEqual([{ name: "flour", quantity: 1.5, unit: "lb" }]);
  });

  it("rejects units that cannot be converted", () => {
    expect(() =>
      applyPantryDeltas([{ name: "pasta", quantity: 1, unit: "kg" }], [{ name: "pasta", change: 2, unit: "cups" }]),
    ).toThrow("cannot combine cup with kg of pasta in pantry");
    expect(() =>
      applyPantryDeltas([{ name: "tomato", quantity: 2 }], [{ name: "tomato", change: 500, unit: "g" }]),
    ).toThrow(PantryDeltaError);
  });
});
