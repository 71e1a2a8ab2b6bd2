import { PantryItemSchema, type PantryDelta, type PantryItem } from "@kitchen-assistant/contracts";
import { applyPantryDeltas } from "../domain/pantry.js";
import type { InventoryStore } from "./types.js";

/**
 * Per-session inventory held in process. `applyDelta` is all-or-nothing: the
 * next inventory is computed first and swapped in only when every delta
 * applies.
 */
export class InMemoryInventoryStore implements InventoryStore {
  private readonly inventories = new Map<string, PantryItem[]>();

  seed(sessionId: string, items: PantryItem[]): void {
    const parsed = items.map((item) => PantryItemSchema.parse(item));
    this.inventories.set(sessionId, applyPantryDeltas([], parsed.map(toDelta)));
  }

  async getInventory(sessionId: string): Promise<PantryItem[]> {
    return structuredClone(this.inventories.get(sessionId) ?? []);
  }

  async applyDelta(sessionId: string, deltas: PantryDelta[]): Promise<PantryItem[]> {
    const next = applyPantryDeltas(this.inventories.get(sessionId) ?? [], deltas);
    this.inventories.set(sessionId, next);
    return structuredClone(next);
  }
}

function toDelta(item: PantryItem): PantryDelta {
  const delta: PantryDelta = { name: item.name, change: item.quantity };
  if (item.unit) {
    delta.unit = item.unit;
  }
  if (item.expirationDate) {
    delta.expirationDate = item.expirationDate;
  }
  return delta;
}
