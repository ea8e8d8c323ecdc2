/**
 * Analysis options
 *
 * One immutable value passed into the façade. Every phase reads from it;
 * nothing is kept in module state between runs.
 */

import { z } from "zod";
import { ValidationError, ErrorCode } from "../errors.js";

// ============================================================================
// Schemas
// ============================================================================

/**
 * Recency cascade setting.
 * "unset" means the caller did not choose, which behaves like "on".
 */
export const RecencyCascadeSchema = z.enum(["unset", "on", "off"]);

export type RecencyCascade = z.infer<typeof RecencyCascadeSchema>;

export const HitsOptionsSchema = z.object({
  /** Iteration cap */
  maxIterations: z.number().int().positive().default(100),
  /** Stop when no score moves more than this between iterations */
  tolerance: z.number().positive().default(1e-8),
});

export const LabelPropagationOptionsSchema = z.object({
  /** Round cap */
  maxRounds: z.number().int().positive().default(20),
});

export const RecencyOptionsSchema = z.object({
  /** Window for a community's recentCount */
  windowDays: z.number().int().positive().default(30),
  /** Hops freshness may travel when the cascade is on */
  hops: z.number().int().positive().default(2),
  /** Days subtracted from a neighbor's time at every hop */
  stalenessDays: z.number().nonnegative().default(7),
  /** Neighbors older than this never contribute */
  freshWindowDays: z.number().positive().default(180),
  /** Freshest neighbors considered per node */
  neighborSampleLimit: z.number().int().positive().default(5),
});

export const GraphAnalysisOptionsSchema = z.object({
  skipAnchors: z.boolean().default(false),
  skipEmbeds: z.boolean().default(false),
  includeTags: z.boolean().default(true),
  minDegree: z.number().int().nonnegative().default(2),
  mutualOnly: z.boolean().default(false),
  recencyCascade: RecencyCascadeSchema.default("unset"),
  excludePatterns: z.array(z.string()).default([]),
  includePatterns: z.array(z.string()).default([]),
  includeSingletonCommunities: z.boolean().default(true),
  topTagsLimit: z.number().int().nonnegative().default(5),
  topAuthorityLimit: z.number().int().nonnegative().default(5),
  bridgeLimit: z.number().int().nonnegative().default(5),
  hits: HitsOptionsSchema.default({}),
  labelPropagation: LabelPropagationOptionsSchema.default({}),
  recency: RecencyOptionsSchema.default({}),
});

export type GraphAnalysisOptions = Readonly<z.infer<typeof GraphAnalysisOptionsSchema>>;
export type GraphAnalysisOptionsInput = z.input<typeof GraphAnalysisOptionsSchema>;
export type HitsOptions = z.infer<typeof HitsOptionsSchema>;
export type LabelPropagationOptions = z.infer<typeof LabelPropagationOptionsSchema>;
export type RecencyOptions = z.infer<typeof RecencyOptionsSchema>;

// ============================================================================
// Resolution
// ============================================================================

/**
 * Freeze an object graph (plain objects and arrays; Maps are left as is)
 */
export function deepFreeze<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Validate caller input and fill in defaults.
 *
 * @throws {ValidationError} when a value is out of range
 *
 * @example
 * const options = resolveAnalysisOptions({ minDegree: 0, mutualOnly: true });
 * options.hits.maxIterations; // 100
 */
export function resolveAnalysisOptions(
  input: GraphAnalysisOptionsInput = {}
): GraphAnalysisOptions {
  const parsed = GraphAnalysisOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new ValidationError(
      ErrorCode.VALIDATION_INVALID_OPTIONS,
      `Invalid analysis options: ${issues}`,
      { field: parsed.error.issues[0]?.path.join("."), value: input }
    );
  }
  return deepFreeze(parsed.data);
}

/**
 * Collapse the three-state cascade flag
 */
export function isRecencyCascadeEnabled(mode: RecencyCascade): boolean {
  return mode !== "off";
}
