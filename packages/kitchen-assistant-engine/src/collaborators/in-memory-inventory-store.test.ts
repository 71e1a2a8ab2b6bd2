import { describe, expect, it } from "vitest";
import { PantryDeltaError } from "../domain/pantry.js";
import { InMemoryInventoryStore } from "./in-memory-inventory-store.js";

describe("InMemoryInventoryStore", () => {
  it("keeps inventories per session", async () => {
    const store = new InMemoryInventoryStore();
    store.seed("a", [{ name: "Tomatoes", quantity: 5 }]);

    expect(await store.getInventory("a")).toEqual([{ name: "tomato", quantity: 5 }]);
    expect(await store.getInventory("b")).toEqual([]);
  });

  it("hands out copies", async () => {
    const store = new InMemoryInventoryStore();
    store.seed("a", [{ name: "rice", quantity: 1, unit: "kg" }]);

    const items = await store.getInventory("a");
    for (const item of items) {
      item.quantity = 99;
    }

    expect(await store.getInventory("a")).toEqual([{ name: "rice", quantity: 1, unit: "kg" }]);
  });

  it("leaves the inventory untouched when a delta is rejected", async () => {
    const store = new InMemoryInventoryStore();
    store.seed("a", [{ name: "egg", quantity: 2 }]);

    await expect(
      store.applyDelta("a", [
        { name: "flour", change: 1, unit: "kg" },
        { name: "egg", change: -6 },
      ]),
    ).rejects.toBeInstanceOf(PantryDeltaError);
    expect(await store.getInventory("a")).toEqual([{ name: "egg", quantity: 2 }]);
  });

  it("returns the updated inventory after applying deltas", async () => {
    const store = new InMemoryInventoryStore();

    const next = await store.applyDelta("a", [{ name: "chicken", change: 2, unit: "breast" }]);

    expect(next).toEqual([{ name: "chicken", quantity: 2, unit: "breast" }]);
  });
});
