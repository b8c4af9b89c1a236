/**
 * Preference Schemas — The caller's budget, time and taste.
 */
import { z } from "zod/v4";

export const UserPreferences = z.object({
    /** Launch budget ceiling, in the same currency as the generated ideas. */
    budget: z.number().nonnegative(),
    available_hours_per_day: z.number().min(0).max(24),
    skills: z.array(z.string()).default([]),
    interests: z.array(z.string()).default([]),
});
export type UserPreferences = z.infer<typeof UserPreferences>;
