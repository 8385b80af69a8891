import pg from "pg";
import config from "../config.js";

if (!config.databaseUrl) {
  throw new Error("DATABASE_URL environment variable is required");
}

const isLocal = /localhost|127\.0\.0\.1/.test(config.databaseUrl);

const pool = new pg.Pool({
  connectionString: config.databaseUrl,
  ssl: isLocal ? false : { rejectUnauthorized: true },
  max: 10,
});

export default pool;
