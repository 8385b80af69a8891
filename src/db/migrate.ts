import { runMigrations } from "./run-migrations.js";
import pool from "./connection.js";

runMigrations()
  .then(() => pool.end())
  .catch(async (err) => {
    console.error("Migration failed:", err);
    await pool.end();
    process.exit(1);
  });
