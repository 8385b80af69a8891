import pool from "../db/connection.js";
import { withTransaction } from "../db/transaction.js";
import type { DietPlanDetails, DietPlanRow, MealPlanRow, ShoppingListRow } from "../db/types.js";
import type { DietPlanInput } from "../helpers/plan-schemas.js";
import { NotFoundError } from "../helpers/errors.js";

/** Stores a diet plan with its meals and shopping list as one transaction. */
export async function saveDietPlan(userId: number, plan: DietPlanInput): Promise<number> {
  const planId = await withTransaction(async (client) => {
    const { rows: [created] } = await client.query<{ id: number }>(
      `INSERT INTO diet_plans (user_id, name, calorie_target, protein_target_g, carb_target_g,
                               fat_target_g, dietary_restrictions, ai_generated, generation_prompt)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING id`,
      [
        userId,
        plan.name,
        plan.calorie_target ?? null,
        plan.protein_target_g ?? null,
        plan.carb_target_g ?? null,
        plan.fat_target_g ?? null,
        plan.dietary_restrictions ?? null,
        plan.ai_generated,
        plan.generation_prompt ?? null,
      ]
    );

    for (const meal of plan.meals) {
      await client.query(
        `INSERT INTO meal_plans (diet_plan_id, day_number, meal_type, recipe_name, ingredients,
                                 instructions, calories_per_serving, protein_g, carbs_g, fat_g, servings)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
        [
          created.id,
          meal.day_number,
          meal.meal_type,
          meal.recipe_name ?? null,
          meal.ingredients ?? null,
          meal.instructions ?? null,
          meal.calories_per_serving ?? null,
          meal.protein_g ?? null,
          meal.carbs_g ?? null,
          meal.fat_g ?? null,
          meal.servings,
        ]
      );
    }

    for (const item of plan.shopping_list) {
      await client.query(
        `INSERT INTO shopping_lists (user_id, diet_plan_id, item_name, quantity, unit, category)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [userId, created.id, item.item_name, item.quantity ?? null, item.unit ?? null, item.category ?? null]
      );
    }

    return created.id;
  });

  console.log(`[persistence] Diet plan saved: ${plan.name} (ID: ${planId})`);
  return planId;
}

/** All of a user's diet plans, newest first. */
export async function getUserDietPlans(userId: number): Promise<DietPlanRow[]> {
  const { rows } = await pool.query<DietPlanRow>(
    `SELECT * FROM diet_plans
     WHERE user_id = $1
     ORDER BY created_at DESC, id DESC`,
    [userId]
  );
  return rows;
}

export async function getDietPlanDetails(userId: number, planId: number): Promise<DietPlanDetails> {
  const { rows: [plan] } = await pool.query<DietPlanRow>(
    "SELECT * FROM diet_plans WHERE id = $1 AND user_id = $2",
    [planId, userId]
  );
  if (!plan) {
    throw new NotFoundError(`Diet plan ${planId} not found`);
  }

  const { rows: meals } = await pool.query<MealPlanRow>(
    `SELECT * FROM meal_plans
     WHERE diet_plan_id = $1
     ORDER BY day_number, id`,
    [planId]
  );
  const { rows: shoppingList } = await pool.query<ShoppingListRow>(
    `SELECT * FROM shopping_lists
     WHERE diet_plan_id = $1
     ORDER BY category NULLS LAST, item_name`,
    [planId]
  );

  return { ...plan, meals, shopping_list: shoppingList };
}

export interface DietPlanDeletion {
  meal_logs_detached: number;
  shopping_items: number;
  meals: number;
}

/**
 * Deletes a diet plan with its meals and shopping list in one transaction.
 * Meal logs that pointed at one of its meals keep their nutrition numbers and
 * lose only the reference.
 */
export async function deleteDietPlan(userId: number, planId: number): Promise<DietPlanDeletion> {
  const removed = await withTransaction(async (client) => {
    const { rows } = await client.query(
      "SELECT id FROM diet_plans WHERE id = $1 AND user_id = $2 FOR UPDATE",
      [planId, userId]
    );
    if (rows.length === 0) {
      throw new NotFoundError(`Diet plan ${planId} not found`);
    }

    const detached = await client.query(
      `UPDATE meal_logs SET meal_plan_id = NULL
       WHERE meal_plan_id IN (SELECT id FROM meal_plans WHERE diet_plan_id = $1)`,
      [planId]
    );
    const shopping = await client.query("DELETE FROM shopping_lists WHERE diet_plan_id = $1", [planId]);
    const meals = await client.query("DELETE FROM meal_plans WHERE diet_plan_id = $1", [planId]);
    await client.query("DELETE FROM diet_plans WHERE id = $1", [planId]);

    return {
      meal_logs_detached: detached.rowCount ?? 0,
      shopping_items: shopping.rowCount ?? 0,
      meals: meals.rowCount ?? 0,
    };
  });

  console.log(`[persistence] Diet plan ${planId} deleted for user ${userId}`);
  return removed;
}

export async function setShoppingItemPurchased(
  userId: number,
  itemId: number,
  purchased: boolean
): Promise<ShoppingListRow> {
  const { rows } = await pool.query<ShoppingListRow>(
    `UPDATE shopping_lists SET purchased = $1
     WHERE id = $2 AND user_id = $3
     RETURNING *`,
    [purchased, itemId, userId]
  );
  if (rows.length === 0) {
    throw new NotFoundError(`Shopping list item ${itemId} not found`);
  }
  return rows[0];
}
