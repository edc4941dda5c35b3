import { createApp } from "../src/app.js";
import { createContainer } from "../src/container.js";
import { initDb } from "../src/db.js";
import { logger } from "../src/logger.js";

// Serverless entry: no background reconciliation here, the long-running server owns that
const container = createContainer();

initDb(container.supabase).catch((err: unknown) => {
  logger.error({ err }, "Database initialization failed");
});

const app = createApp(container.appDeps);

// For Vercel with @vercel/node, exporting the Express app directly works
export default app;
