export * from "./adaptation/recipe-adapter.js";
export * from "./classifier/intent-classifier.js";
export * from "./classifier/intents.js";
export * from "./classifier/message-parser.js";
export * from "./collaborators/in-memory-inventory-store.js";
export * from "./collaborators/in-memory-recipe-index.js";
export * from "./collaborators/json-substitution-catalog.js";
export * from "./collaborators/openai-compatible-text-generator.js";
export * from "./collaborators/types.js";
export * from "./config/env.js";
export * from "./domain/dietary-rules.js";
export * from "./domain/expiry.js";
export * from "./domain/ingredients.js";
export * from "./domain/pantry.js";
export * from "./domain/preferences.js";
export * from "./logger.js";
export * from "./orchestrator/kitchen-assistant.js";
export * from "./planner/complexity-planner.js";
export * from "./quality/quality-gate.js";
export * from "./ranking/hybrid-ranker.js";
export * from "./router/delegation-router.js";
export * from "./session/session-store.js";
export * from "./session/state-machine.js";
export * from "./synthesis/response-synthesizer.js";
