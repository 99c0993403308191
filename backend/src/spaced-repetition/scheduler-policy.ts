/**
 * Scheduler Policy
 *
 * Constants of the SM-2-derived scheduling policy. The defaults are the
 * canonical values; a deck directory may override any of them through
 * its config file (see ../config.ts).
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

/**
 * Schema for scheduler policy constants.
 */
export const SchedulerPolicySchema = z
  .object({
    /** Ease factor given to new cards */
    defaultEase: z.number().positive().default(2.5),
    /** Floor for the ease factor after every review */
    minEase: z.number().positive().default(1.3),
    /** Ease change on "Again" */
    easeAgain: z.number().max(0).default(-0.2),
    /** Ease change on "Hard" */
    easeHard: z.number().max(0).default(-0.15),
    /** Ease change on "Easy" */
    easeEasy: z.number().min(0).default(0.15),
    /** Interval multiplier for "Hard" on graduated cards */
    hardIntervalModifier: z.number().min(1).default(1.2),
    /** Extra multiplier for "Easy" on graduated cards */
    easyBonusModifier: z.number().min(1).default(1.3),
    /** Smallest interval after any non-lapse review */
    minIntervalDays: z.number().positive().default(1.0),
    /** Interval for "Good" while learning */
    initialIntervalDays: z.number().positive().default(1.0),
    /** Interval for "Easy" while learning */
    easyGraduationDays: z.number().positive().default(4),
    /** Fixed interval after a lapse, used when lapseIntervalFactor is 0 */
    lapseNewIntervalDays: z.number().positive().default(1.0),
    /** Fraction of the old interval kept after a lapse; 0 disables */
    lapseIntervalFactor: z.number().min(0).max(1).default(0),
  })
  .refine((policy) => policy.defaultEase >= policy.minEase, {
    message: "defaultEase must not be below minEase",
    path: ["defaultEase"],
  });

export type SchedulerPolicy = z.infer<typeof SchedulerPolicySchema>;
export type SchedulerPolicyInput = z.input<typeof SchedulerPolicySchema>;

/** Canonical policy */
export const DEFAULT_POLICY: SchedulerPolicy = Object.freeze(SchedulerPolicySchema.parse({}));

/**
 * Build a policy from partial overrides.
 * @throws ZodError if an override is out of range
 */
export function resolvePolicy(overrides: SchedulerPolicyInput = {}): SchedulerPolicy {
  return SchedulerPolicySchema.parse(overrides);
}
