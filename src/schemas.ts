import { z } from "zod";

// Structured-output schemas. Every field is required; "absent" is expressed
// with `.nullable()` so the JSON schema stays valid in strict mode.

export const ForesightCandidateSchema = z.object({
  content: z
    .string()
    .describe("A forward-looking statement about the user: a plan, intention, temporary state or expected change"),
  confidence: z.number().nullable().describe("How confident the statement holds (0-1), or null if unsure"),
  startOffsetDays: z
    .number()
    .nullable()
    .describe("Days after the conversation when this starts to apply, or null if it applies immediately"),
  expiryDate: z
    .string()
    .nullable()
    .describe("Explicit end date as YYYY-MM-DD, or null if the conversation gives none"),
  durationType: z
    .enum(["fixed", "ongoing", "indefinite"])
    .describe("fixed = a known length; ongoing = open-ended but expected to end; indefinite = no expected end"),
  durationDays: z.number().nullable().describe("Length in days when durationType is fixed"),
  durationHint: z
    .string()
    .nullable()
    .describe("The duration phrase as spoken (e.g. 'for two weeks', '10 days'), or null"),
});

export const MemoryUnitDraftSchema = z.object({
  narrative: z
    .string()
    .describe("Third-person, self-contained account of one episode of the conversation"),
  atomicFacts: z
    .array(z.string())
    .describe("Short standalone facts stated in the episode, one claim each"),
  foresightCandidates: z.array(ForesightCandidateSchema),
});

export const ExtractionResultSchema = z.object({
  units: z
    .array(MemoryUnitDraftSchema)
    .describe("One entry per distinct episode. Skip small talk and transient task state."),
});

export const ProfileAnalysisSchema = z.object({
  explicitFacts: z
    .array(
      z.object({
        attributeName: z
          .string()
          .describe("snake_case attribute name (e.g. dietary_preference, home_city, employer)"),
        value: z.string().describe("Current value as stated by the user"),
        confidence: z.number().describe("0-1"),
      }),
    )
    .describe("Attributes the user states about themselves"),
  implicitTraits: z
    .array(
      z.object({
        traitType: z.enum(["preference", "habit", "personality"]),
        description: z.string(),
        strength: z.number().describe("0-1"),
      }),
    )
    .describe("Traits inferred from behaviour rather than stated outright"),
});

export const SufficiencySchema = z.object({
  sufficient: z.boolean().describe("Whether the context holds enough to answer the question"),
  rationale: z.string(),
  missingInfo: z.array(z.string()).describe("What would still be needed, empty when sufficient"),
});

export const ReformulationSchema = z.object({
  queries: z
    .array(z.string())
    .describe("2-3 alternative search queries targeting the missing information"),
});

export const ThemeSchema = z.object({
  themeLabel: z.string().describe("2-5 word label for the shared theme"),
});

export const SummarySchema = z.object({
  summary: z.string().describe("Updated cluster summary, at most a few sentences"),
});

export type ExtractionResult = z.infer<typeof ExtractionResultSchema>;
