import { ModelAnswerSchema } from "@kitchen-assistant/contracts";
import { describe, expect, it, vi } from "vitest";
import type { Collaborators } from "../collaborators/types.js";
import { PantryDeltaError } from "../domain/pantry.js";
import { silentLogger } from "../logger.js";
import { DelegationRouter } from "./delegation-router.js";

function createCollaborators(overrides: Partial<Collaborators> = {}): Collaborators {
  return {
    inventory: {
      getInventory: vi.fn(async () => [{ name: "tomato", quantity: 5 }]),
      applyDelta: vi.fn(async () => []),
    },
    search: {
      embed: vi.fn(async () => [1, 0]),
      query: vi.fn(async () => []),
    },
    ...overrides,
  };
}

describe("DelegationRouter", () => {
  it("returns validated values and records the call", async () => {
    const router = new DelegationRouter({
      collaborators: createCollaborators(),
      timeoutMs: 100,
      logger: silentLogger,
    });

    const result = await router.dispatch("inventory.get", { sessionId: "s1" });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toEqual([{ name: "tomato", quantity: 5 }]);
    }
    expect(router.log).toHaveLength(1);
    expect(router.log[0]).toMatchObject({ action: "inventory.get", ok: true });
  });

  it("reports missing collaborators as unavailable without throwing", async () => {
    const router = new DelegationRouter({
      collaborators: createCollaborators(),
      timeoutMs: 100,
      logger: silentLogger,
    });

    const keyword = await router.dispatch("search.keyword", { terms: ["pasta"], topK: 5 });
    const text = await router.generate(ModelAnswerSchema, {
      system: "s",
      prompt: "p",
      schemaName: "answer",
      jsonSchema: {},
    });

    expect(router.isAvailable("substitution.lookup")).toBe(false);
    expect(keyword.ok ? null : keyword.failure.reason).toBe("unavailable");
    expect(text.ok ? null : text.failure).toEqual({
      collaborator: "text_generation",
      action: "text.complete",
      reason: "unavailable",
      message: "text_generation is not configured",
    });
  });

  it("times out slow collaborators", async () => {
    const router = new DelegationRouter({
      collaborators: createCollaborators({
        search: {
          embed: vi.fn(() => new Promise<number[]>(() => {})),
          query: vi.fn(async () => []),
        },
      }),
      timeoutMs: 10,
      logger: silentLogger,
    });

    const result = await router.dispatch("search.embed", { text: "pasta" });

    expect(result.ok ? null : result.failure.reason).toBe("timeout");
    expect(router.log[0]).toMatchObject({ action: "search.embed", ok: false, reason: "timeout" });
  });

  it("flags responses that do not match the expected shape", async () => {
    const router = new DelegationRouter({
      collaborators: createCollaborators({
        textGenerator: { complete: vi.fn(async () => ({ reply: "hello" })) },
      }),
      timeoutMs: 100,
      logger: silentLogger,
    });

    const result = await router.generate(ModelAnswerSchema, {
      system: "s",
      prompt: "p",
      schemaName: "answer",
      jsonSchema: {},
    });

    expect(result.ok ? null : result.failure.reason).toBe("invalid_response");
  });

  it("maps inventory rejections and thrown errors", async () => {
    const router = new DelegationRouter({
      collaborators: createCollaborators({
        inventory: {
          getInventory: vi.fn(async () => {
            throw new Error("disk on fire");
          }),
          applyDelta: vi.fn(async () => {
            throw new PantryDeltaError("egg", 1, -3);
          }),
        },
      }),
      timeoutMs: 100,
      logger: silentLogger,
    });

    const applied = await router.dispatch("inventory.apply_delta", {
      sessionId: "s1",
      deltas: [{ name: "egg", change: -3 }],
    });
    const fetched = await router.dispatch("inventory.get", { sessionId: "s1" });

    expect(applied.ok ? null : applied.failure).toMatchObject({
      reason: "rejected",
      message: "cannot remove 3 egg: only 1 in pantry",
    });
    expect(fetched.ok ? null : fetched.failure).toMatchObject({ reason: "error", message: "disk on fire" });
  });

  it("calls nothing once the turn is cancelled", async () => {
    const collaborators = createCollaborators();
    const controller = new AbortController();
    controller.abort();
    const router = new DelegationRouter({
      collaborators,
      timeoutMs: 100,
      signal: controller.signal,
      logger: silentLogger,
    });

    const result = await router.dispatch("inventory.get", { sessionId: "s1" });

    expect(result.ok ? null : result.failure.reason).toBe("cancelled");
    expect(collaborators.inventory.getInventory).not.toHaveBeenCalled();
  });

  it("abandons in-flight calls when the turn is cancelled", async () => {
    const controller = new AbortController();
    const router = new DelegationRouter({
      collaborators: createCollaborators({
        search: {
          embed: vi.fn(async () => [1]),
          query: vi.fn(() => new Promise<never>(() => {})),
        },
      }),
      timeoutMs: 1_000,
      signal: controller.signal,
      logger: silentLogger,
    });

    const pending = router.dispatch("search.query", { vector: [1], topK: 3 });
    controller.abort();

    const result = await pending;
    expect(result.ok ? null : result.failure.reason).toBe("cancelled");
  });
});
