import { z } from "zod";

/** Common patterns that mean "no injuries" */
const NONE_PATTERNS = [
  /^none$/i,
  /^n\/a$/i,
  /^na$/i,
  /^no$/i,
  /^nothing$/i,
  /^none specified$/i,
  /^-$/,
];

export const ACTIVITY_LEVELS = [
  "Sedentary",
  "Lightly Active",
  "Moderately Active",
  "Very Active",
  "Extremely Active",
] as const;

export const EXPERIENCE_LEVELS = ["Beginner", "Intermediate", "Advanced"] as const;

const text = (max: number) => z.string().max(max).nullable().optional();

/**
 * Profile fields a user can set at registration or change later.
 * Every field is optional: an absent key means "leave as is", an explicit
 * null clears the column. Unknown keys are rejected.
 */
export const profileSchema = z
  .object({
    first_name: text(100),
    last_name: text(100),
    age: z.number().int().min(13).max(120).nullable().optional(),
    gender: text(50),
    height_cm: z.number().positive().max(300).nullable().optional(),
    weight_kg: z.number().positive().max(500).nullable().optional(),
    activity_level: z.enum(ACTIVITY_LEVELS).nullable().optional(),
    fitness_goals: text(1000),
    injuries: text(1000),
    experience_level: z.enum(EXPERIENCE_LEVELS).nullable().optional(),
  })
  .strict();

export type ProfileUpdate = z.infer<typeof profileSchema>;

export type ProfileField = keyof ProfileUpdate;

/** Column names, in the order UPDATE statements list them. */
export const PROFILE_FIELDS: readonly ProfileField[] = profileSchema.keyof().options;

/**
 * Trims strings and turns "none"-style injury answers into null.
 * Keys are kept as given so validation still sees unknown ones.
 */
export function normalizeProfileData(
  data: Record<string, unknown>
): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    if (typeof value !== "string") {
      normalized[key] = value;
      continue;
    }
    const trimmed = value.trim();
    if (key === "injuries" && (trimmed === "" || NONE_PATTERNS.some((p) => p.test(trimmed)))) {
      normalized[key] = null;
    } else {
      normalized[key] = trimmed;
    }
  }

  return normalized;
}
