import pool from "../db/connection.js";

export async function getUserFoods(userId: number): Promise<string[]> {
  const { rows } = await pool.query<{ food_name: string }>(
    "SELECT food_name FROM food_inventory WHERE user_id = $1 ORDER BY food_name",
    [userId]
  );
  return rows.map((r) => r.food_name);
}

/** Returns false when the user already had the food. */
export async function addFoodToInventory(userId: number, foodName: string): Promise<boolean> {
  const { rowCount } = await pool.query(
    `INSERT INTO food_inventory (user_id, food_name)
     VALUES ($1, $2)
     ON CONFLICT (user_id, food_name) DO NOTHING`,
    [userId, foodName.trim()]
  );
  return rowCount === 1;
}

export async function removeFoodFromInventory(userId: number, foodName: string): Promise<boolean> {
  const { rowCount } = await pool.query(
    "DELETE FROM food_inventory WHERE user_id = $1 AND food_name = $2",
    [userId, foodName.trim()]
  );
  return (rowCount ?? 0) > 0;
}
