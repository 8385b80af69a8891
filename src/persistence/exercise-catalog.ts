import type { PoolClient } from "pg";
import type { PlannedExerciseInput } from "../helpers/plan-schemas.js";

type CatalogFields = Pick<
  PlannedExerciseInput,
  "name" | "category" | "muscle_groups" | "equipment" | "difficulty_level" | "instructions"
>;

/**
 * Inserts an exercise into the shared catalog or returns the existing row's id,
 * in one statement keyed on the unique name. Metadata missing on an existing
 * row is filled from the caller's values; present values are never overwritten.
 */
export async function upsertExercise(
  client: PoolClient,
  exercise: Pick<CatalogFields, "name"> & Partial<CatalogFields>
): Promise<number> {
  const { rows } = await client.query<{ id: number }>(
    `INSERT INTO exercises (name, category, muscle_groups, equipment, difficulty_level, instructions)
     VALUES ($1, $2, $3, $4, $5, $6)
     ON CONFLICT (name) DO UPDATE SET
       category = COALESCE(exercises.category, EXCLUDED.category),
       muscle_groups = COALESCE(exercises.muscle_groups, EXCLUDED.muscle_groups),
       equipment = COALESCE(exercises.equipment, EXCLUDED.equipment),
       difficulty_level = COALESCE(exercises.difficulty_level, EXCLUDED.difficulty_level),
       instructions = COALESCE(exercises.instructions, EXCLUDED.instructions)
     RETURNING id`,
    [
      exercise.name.trim(),
      exercise.category ?? null,
      exercise.muscle_groups ?? null,
      exercise.equipment ?? null,
      exercise.difficulty_level ?? null,
      exercise.instructions ?? null,
    ]
  );
  return rows[0].id;
}
