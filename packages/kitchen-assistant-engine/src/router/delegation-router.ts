import {
  PantryItemSchema,
  SearchHitSchema,
  type Collaborator,
  type PantryDelta,
  type PantryItem,
  type SearchHit,
} from "@kitchen-assistant/contracts";
import { z } from "zod";
import type { Collaborators, SearchFilter, TextGenerationRequest } from "../collaborators/types.js";
import { PantryDeltaError } from "../domain/pantry.js";
import { defaultLogger, type EngineLogger } from "../logger.js";

type ActionMap = {
  "inventory.get": { input: { sessionId: string }; output: PantryItem[] };
  "inventory.apply_delta": { input: { sessionId: string; deltas: PantryDelta[] }; output: PantryItem[] };
  "search.embed": { input: { text: string }; output: number[] };
  "search.query": {
    input: { vector: number[]; topK: number; filter?: SearchFilter };
    output: SearchHit[];
  };
  "search.keyword": { input: { terms: string[]; topK: number }; output: SearchHit[] };
  "text.complete": { input: TextGenerationRequest; output: unknown };
  "substitution.lookup": { input: { ingredient: string }; output: string[] };
};

export type DelegationAction = keyof ActionMap;
export type DelegationInput<A extends DelegationAction> = ActionMap[A]["input"];
export type DelegationOutput<A extends DelegationAction> = ActionMap[A]["output"];

export type FailureReason =
  | "timeout"
  | "error"
  | "invalid_response"
  | "unavailable"
  | "rejected"
  | "cancelled";

export type DelegationFailure = {
  collaborator: Collaborator;
  action: DelegationAction;
  reason: FailureReason;
  message: string;
};

export type DelegationResult<T> =
  | { ok: true; value: T; durationMs: number }
  | { ok: false; failure: DelegationFailure; durationMs: number };

export type DelegationLogEntry = {
  action: DelegationAction;
  ok: boolean;
  durationMs: number;
  reason?: FailureReason;
};

type Handler<A extends DelegationAction> = {
  collaborator: Collaborator;
  schema: z.ZodType<DelegationOutput<A>>;
  invoke?: (input: DelegationInput<A>, signal: AbortSignal) => Promise<unknown>;
};

type HandlerTable = { [A in DelegationAction]: Handler<A> };

export type DelegationRouterOptions = {
  collaborators: Collaborators;
  timeoutMs: number;
  signal?: AbortSignal;
  logger?: EngineLogger;
};

function buildHandlers(collaborators: Collaborators): HandlerTable {
  const { inventory, search, textGenerator, substitutions } = collaborators;
  const keywordQuery = search.keywordQuery?.bind(search);

  return {
    "inventory.get": {
      collaborator: "inventory",
      schema: z.array(PantryItemSchema),
      invoke: (input, signal) => inventory.getInventory(input.sessionId, signal),
    },
    "inventory.apply_delta": {
      collaborator: "inventory",
      schema: z.array(PantryItemSchema),
      invoke: (input, signal) => inventory.applyDelta(input.sessionId, input.deltas, signal),
    },
    "search.embed": {
      collaborator: "search",
      schema: z.array(z.number()),
      invoke: (input, signal) => search.embed(input.text, signal),
    },
    "search.query": {
      collaborator: "search",
      schema: z.array(SearchHitSchema),
      invoke: (input, signal) => search.query(input.vector, input.topK, input.filter, signal),
    },
    "search.keyword": {
      collaborator: "search",
      schema: z.array(SearchHitSchema),
      invoke: keywordQuery ? (input, signal) => keywordQuery(input.terms, input.topK, signal) : undefined,
    },
    "text.complete": {
      collaborator: "text_generation",
      schema: z.unknown(),
      invoke: textGenerator ? (input, signal) => textGenerator.complete(input, signal) : undefined,
    },
    "substitution.lookup": {
      collaborator: "substitution",
      schema: z.array(z.string()),
      invoke: substitutions ? (input, signal) => substitutions.lookup(input.ingredient, signal) : undefined,
    },
  };
}

/**
 * Dispatches typed requests to collaborators for one turn. Every call is
 * bounded by the timeout, skipped once the turn is cancelled and validated
 * against the expected schema; failures come back as values.
 */
export class DelegationRouter {
  private readonly handlers: HandlerTable;
  private readonly timeoutMs: number;
  private readonly signal: AbortSignal | undefined;
  private readonly logger: EngineLogger;
  private readonly entries: DelegationLogEntry[] = [];

  constructor(options: DelegationRouterOptions) {
    this.handlers = buildHandlers(options.collaborators);
    this.timeoutMs = options.timeoutMs;
    this.signal = options.signal;
    this.logger = options.logger ?? defaultLogger;
  }

  get log(): DelegationLogEntry[] {
    return [...this.entries];
  }

  isAvailable(action: DelegationAction): boolean {
    return this.handlers[action].invoke !== undefined;
  }

  dispatch<A extends DelegationAction>(
    action: A,
    input: DelegationInput<A>,
  ): Promise<DelegationResult<DelegationOutput<A>>> {
    const handler: Handler<A> = this.handlers[action];
    const invoke = handler.invoke;
    return this.run(
      handler.collaborator,
      action,
      invoke ? (signal) => invoke(input, signal) : undefined,
      handler.schema,
    );
  }

  /** Asks text generation for JSON and validates it against `schema`. */
  generate<T>(schema: z.ZodType<T>, request: TextGenerationRequest): Promise<DelegationResult<T>> {
    const invoke = this.handlers["text.complete"].invoke;
    return this.run(
      "text_generation",
      "text.complete",
      invoke ? (signal) => invoke(request, signal) : undefined,
      schema,
    );
  }

  private async run<T>(
    collaborator: Collaborator,
    action: DelegationAction,
    invoke: ((signal: AbortSignal) => Promise<unknown>) | undefined,
    schema: z.ZodType<T>,
  ): Promise<DelegationResult<T>> {
    const startedAt = Date.now();
    const fail = (reason: FailureReason, message: string): DelegationResult<T> =>
      this.record(action, {
        ok: false,
        failure: { collaborator, action, reason, message },
        durationMs: Date.now() - startedAt,
      });

    if (!invoke) {
      return fail("unavailable", `${collaborator} is not configured`);
    }
    if (this.signal?.aborted) {
      return fail("cancelled", "turn was cancelled before dispatch");
    }

    const controller = new AbortController();
    let interruption: "timeout" | "cancelled" | undefined;
    const onTurnAbort = () => {
      interruption = "cancelled";
      controller.abort();
    };
    this.signal?.addEventListener("abort", onTurnAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const interrupted = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        interruption = "timeout";
        controller.abort();
      }, this.timeoutMs);
      controller.signal.addEventListener("abort", () => reject(new Error(`${action} interrupted`)), {
        once: true,
      });
    });

    const pending = Promise.resolve().then(() => invoke(controller.signal));

    try {
      const raw = await Promise.race([pending, interrupted]);
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        return fail("invalid_response", `${action} returned an unexpected shape: ${parsed.error.message}`);
      }
      return this.record(action, { ok: true, value: parsed.data, durationMs: Date.now() - startedAt });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (interruption === "timeout") {
        this.watchLateSettlement(action, pending);
        return fail("timeout", `${action} timed out after ${this.timeoutMs}ms`);
      }
      if (interruption === "cancelled") {
        this.watchLateSettlement(action, pending);
        return fail("cancelled", `${action} cancelled with its turn`);
      }
      if (error instanceof PantryDeltaError) {
        return fail("rejected", message);
      }
      return fail("error", message);
    } finally {
      clearTimeout(timer);
      this.signal?.removeEventListener("abort", onTurnAbort);
    }
  }

  private watchLateSettlement(action: DelegationAction, pending: Promise<unknown>): void {
    pending.catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${action} failed after it was abandoned: ${message}`);
    });
  }

  private record<T>(action: DelegationAction, result: DelegationResult<T>): DelegationResult<T> {
    if (result.ok) {
      this.entries.push({ action, ok: true, durationMs: result.durationMs });
    } else {
      this.entries.push({
        action,
        ok: false,
        durationMs: result.durationMs,
        reason: result.failure.reason,
      });
      this.logger.warn(`${result.failure.collaborator} ${action} failed (${result.failure.reason}): ${result.failure.message}`);
    }
    return result;
  }
}
