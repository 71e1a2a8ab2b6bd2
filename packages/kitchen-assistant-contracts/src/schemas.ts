import { z } from "zod";

export const SkillLevelSchema = z.enum(["beginner", "intermediate", "advanced"]);

export const ConversationStageSchema = z.enum([
  "INITIAL",
  "COLLECTING_PREFS",
  "PANTRY_OP",
  "SEARCHING",
  "GENERAL",
  "PRESENTING_OPTIONS",
  "AWAITING_SELECTION",
  "ADAPTING",
  "DONE",
  "ERROR",
]);

export const PersistedStageSchema = z.enum(["COLLECTING_PREFS", "AWAITING_SELECTION"]);

export const ComplexitySchema = z.enum(["simple", "medium", "complex"]);

export const CollaboratorSchema = z.enum([
  "inventory",
  "search",
  "text_generation",
  "substitution",
  "ranker",
  "adapter",
  "quality_gate",
  "synthesizer",
]);

export const SuccessCriterionSchema = z.enum([
  "mutation_applied",
  "candidate_passes_hard_filters",
  "top_three_distinct",
  "selection_in_range",
  "adapted_recipe_passes_gate",
  "answer_generated",
  "clarification_requested",
]);

export const FallbackStepSchema = z.enum([
  "relax_allow_missing",
  "keyword_only_search",
  "cached_inventory",
  "templated_text",
  "mark_missing_without_substitute",
]);

export const IssueKindSchema = z.enum([
  "ClassificationAmbiguous",
  "CollaboratorUnavailable",
  "ConstraintViolation",
  "NoCandidatesFound",
  "InvalidSelection",
  "SessionStateCorrupt",
  "InventoryDeltaRejected",
  "TurnSuperseded",
]);

export const IdSchema = z.string().min(1).max(128);
export const IsoDateSchema = z.iso.date();

const NameSetSchema = z.array(z.string().min(1).max(80)).max(50);

export const PreferencesSchema = z.object({
  dietaryRestrictions: NameSetSchema,
  allergies: NameSetSchema,
  cuisinePreferences: NameSetSchema,
  skillLevel: SkillLevelSchema,
  servings: z.number().int().min(1).max(24).optional(),
});

export const PreferenceDeltaSchema = z.object({
  dietaryRestrictions: NameSetSchema.optional(),
  allergies: NameSetSchema.optional(),
  cuisinePreferences: NameSetSchema.optional(),
  skillLevel: SkillLevelSchema.optional(),
  servings: z.number().int().min(1).max(24).optional(),
  removeAllergies: NameSetSchema.optional(),
  removeDietaryRestrictions: NameSetSchema.optional(),
  removeCuisinePreferences: NameSetSchema.optional(),
});

export const PantryItemSchema = z.object({
  name: z.string().min(1).max(120),
  quantity: z.number().nonnegative(),
  unit: z.string().min(1).max(40).optional(),
  expirationDate: IsoDateSchema.optional(),
});

export const PantryDeltaSchema = z.object({
  name: z.string().min(1).max(120),
  change: z.number(),
  unit: z.string().min(1).max(40).optional(),
  expirationDate: IsoDateSchema.optional(),
  removeAll: z.boolean().optional(),
});

export const RecipeIngredientSchema = z.object({
  name: z.string().min(1).max(120),
  quantity: z.number().positive().optional(),
  unit: z.string().min(1).max(40).optional(),
});

export const CandidateRecipeSchema = z.object({
  id: IdSchema,
  title: z.string().min(1).max(240),
  ingredients: z.array(RecipeIngredientSchema).min(1),
  instructions: z.array(z.string().min(1)),
  tags: z.array(z.string().min(1).max(60)),
  sourceScore: z.number().min(0).max(1),
  servings: z.number().int().positive().optional(),
  cuisine: z.string().min(1).max(60).optional(),
  difficulty: SkillLevelSchema.optional(),
});

export const SearchHitSchema = z.object({
  recipe: CandidateRecipeSchema,
  similarity: z.number().min(0).max(1),
});

export const RankedRecommendationSchema = z.object({
  recipe: CandidateRecipeSchema,
  compositeScore: z.number().min(0).max(100),
  coverageFraction: z.number().min(0).max(1),
  missingIngredients: z.array(z.string()),
  pantryIngredientsUsed: z.array(z.string()),
  usesExpiring: z.boolean(),
  expiringIngredientsUsed: z.array(z.string()),
  semanticScore: z.number().min(0).max(100),
  expirationBonus: z.number().nonnegative(),
  preferenceBonus: z.number(),
  dietUnverified: z.array(z.string()),
  reasons: z.array(z.string()),
});

export const PlanStepSchema = z.object({
  collaborator: CollaboratorSchema,
  action: z.string().min(1).max(80),
});

export const IntentTypeSchema = z.enum([
  "mutate_pantry",
  "search_recipes",
  "select_recommendation",
  "general_query",
  "ambiguous",
]);

export const TaskPlanSchema = z.object({
  complexity: ComplexitySchema,
  intents: z.array(IntentTypeSchema),
  orderedSteps: z.array(PlanStepSchema).min(1),
  successCriteria: z.array(SuccessCriterionSchema).min(1),
  fallbackStrategy: z.string().min(1),
  fallbacks: z.array(FallbackStepSchema),
  createdAt: z.iso.datetime(),
});

export const ConversationStateSchema = z.object({
  sessionId: IdSchema,
  stage: ConversationStageSchema,
  preferences: PreferencesSchema,
  pantrySnapshot: z.array(PantryItemSchema),
  pantryRefreshedAt: z.iso.datetime().optional(),
  pendingCandidates: z.array(RankedRecommendationSchema).max(3),
  lastPlan: TaskPlanSchema.optional(),
  createdAt: z.iso.datetime(),
  lastActiveAt: z.iso.datetime(),
  turnCount: z.number().int().min(0),
});

export const IngredientSourceSchema = z.enum(["pantry", "buy", "substituted"]);

export const AdaptedIngredientSchema = z.object({
  name: z.string().min(1),
  quantity: z.number().positive().optional(),
  unit: z.string().min(1).optional(),
  source: IngredientSourceSchema,
  substitutedFor: z.string().min(1).optional(),
});

export const SubstitutionSchema = z.object({
  original: z.string().min(1),
  replacement: z.string().min(1),
  origin: z.enum(["catalog", "generated"]),
});

export const UnresolvedIngredientSchema = z.object({
  ingredient: z.string().min(1),
  alternatives: z.array(z.string().min(1)),
});

export const AdaptedRecipeSchema = z.object({
  recipeId: IdSchema,
  title: z.string().min(1),
  servings: z.number().int().positive(),
  scaleFactor: z.number().positive(),
  ingredients: z.array(AdaptedIngredientSchema).min(1),
  instructions: z.array(z.string()),
  fromPantry: z.array(z.string()),
  toBuy: z.array(z.string()),
  substitutions: z.array(SubstitutionSchema),
  unresolved: z.array(UnresolvedIngredientSchema),
  adaptationsMade: z.array(z.string()),
  tags: z.array(z.string()),
  dietUnverified: z.array(z.string()),
});

export const ConstraintViolationSchema = z.object({
  kind: z.enum(["allergen", "diet"]),
  ingredient: z.string().min(1),
  constraint: z.string().min(1),
  message: z.string().min(1),
});

export const QualityReportSchema = z.object({
  passed: z.boolean(),
  violations: z.array(ConstraintViolationSchema),
});

export const TurnIssueSchema = z.object({
  kind: IssueKindSchema,
  message: z.string().min(1),
  collaborator: CollaboratorSchema.optional(),
});

export const PantrySummarySchema = z.object({
  items: z.array(PantryItemSchema),
  expiringSoon: z.array(
    z.object({
      name: z.string().min(1),
      daysRemaining: z.number().int(),
    }),
  ),
  applied: z.array(PantryDeltaSchema),
  source: z.enum(["live", "cached"]),
});

export const StructuredPayloadSchema = z.object({
  pantrySummary: PantrySummarySchema.optional(),
  recommendations: z.array(RankedRecommendationSchema).max(3).optional(),
  adaptedRecipe: AdaptedRecipeSchema.optional(),
  textAnswer: z.string().optional(),
  // Titles of pending options dropped because they no longer fit the preferences.
  withdrawnOptions: z.array(z.string()).optional(),
  shoppingList: z.array(z.string()).optional(),
  violations: z.array(ConstraintViolationSchema).optional(),
  clarification: z.string().optional(),
  degraded: z.array(z.string()).optional(),
});

export const TurnRequestSchema = z.object({
  sessionId: IdSchema,
  message: z.string().max(4000),
  knownPreferences: PreferenceDeltaSchema.optional(),
});

export const TurnResponseSchema = z.object({
  sessionId: IdSchema,
  stage: ConversationStageSchema,
  payload: StructuredPayloadSchema,
  explanationText: z.string(),
  updatedPreferences: PreferencesSchema,
  issues: z.array(TurnIssueSchema),
  plan: TaskPlanSchema.optional(),
});

// Shapes the text-generation capability is asked to return.

export const ModelIntentSchema = z.object({
  type: IntentTypeSchema,
  index: z.number().int().optional(),
  query: z.string().optional(),
  items: z
    .array(
      z.object({
        name: z.string().min(1),
        change: z.number(),
        unit: z.string().optional(),
      }),
    )
    .optional(),
});

export const ModelClassificationSchema = z.object({
  intents: z.array(ModelIntentSchema).min(1),
  preferences: z.object({
    dietaryRestrictions: z.array(z.string()),
    allergies: z.array(z.string()),
    cuisinePreferences: z.array(z.string()),
    skillLevel: SkillLevelSchema.nullable(),
  }),
});

export const ModelExplanationSchema = z.object({
  explanation: z.string().min(1).max(2000),
});

export const ModelSubstitutionSchema = z.object({
  alternatives: z.array(z.string().min(1)).max(5),
});

export const ModelAnswerSchema = z.object({
  answer: z.string().min(1).max(4000),
});

export type SkillLevel = z.infer<typeof SkillLevelSchema>;
export type ConversationStage = z.infer<typeof ConversationStageSchema>;
export type PersistedStage = z.infer<typeof PersistedStageSchema>;
export type Complexity = z.infer<typeof ComplexitySchema>;
export type Collaborator = z.infer<typeof CollaboratorSchema>;
export type SuccessCriterion = z.infer<typeof SuccessCriterionSchema>;
export type FallbackStep = z.infer<typeof FallbackStepSchema>;
export type IssueKind = z.infer<typeof IssueKindSchema>;
export type Preferences = z.infer<typeof PreferencesSchema>;
export type PreferenceDelta = z.infer<typeof PreferenceDeltaSchema>;
export type PantryItem = z.infer<typeof PantryItemSchema>;
export type PantryDelta = z.infer<typeof PantryDeltaSchema>;
export type RecipeIngredient = z.infer<typeof RecipeIngredientSchema>;
export type CandidateRecipe = z.infer<typeof CandidateRecipeSchema>;
export type SearchHit = z.infer<typeof SearchHitSchema>;
export type RankedRecommendation = z.infer<typeof RankedRecommendationSchema>;
export type PlanStep = z.infer<typeof PlanStepSchema>;
export type IntentType = z.infer<typeof IntentTypeSchema>;
export type TaskPlan = z.infer<typeof TaskPlanSchema>;
export type ConversationState = z.infer<typeof ConversationStateSchema>;
export type IngredientSource = z.infer<typeof IngredientSourceSchema>;
export type AdaptedIngredient = z.infer<typeof AdaptedIngredientSchema>;
export type Substitution = z.infer<typeof SubstitutionSchema>;
export type UnresolvedIngredient = z.infer<typeof UnresolvedIngredientSchema>;
export type AdaptedRecipe = z.infer<typeof AdaptedRecipeSchema>;
export type ConstraintViolation = z.infer<typeof ConstraintViolationSchema>;
export type QualityReport = z.infer<typeof QualityReportSchema>;
export type TurnIssue = z.infer<typeof TurnIssueSchema>;
export type PantrySummary = z.infer<typeof PantrySummarySchema>;
export type StructuredPayload = z.infer<typeof StructuredPayloadSchema>;
export type TurnRequest = z.infer<typeof TurnRequestSchema>;
export type TurnResponse = z.infer<typeof TurnResponseSchema>;
export type ModelIntent = z.infer<typeof ModelIntentSchema>;
export type ModelClassification = z.infer<typeof ModelClassificationSchema>;
export type ModelExplanation = z.infer<typeof ModelExplanationSchema>;
export type ModelSubstitution = z.infer<typeof ModelSubstitutionSchema>;
export type ModelAnswer = z.infer<typeof ModelAnswerSchema>;
