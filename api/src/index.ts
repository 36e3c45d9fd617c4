import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, "../../.env") });

import { buildApp } from "./app.js";
import { loadConfig, type AppConfig } from "./config.js";
import { createPool } from "./db.js";
import { PgUserStore } from "./services/user-store.js";

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error("Invalid configuration", err);
    process.exit(1);
  }
}

const config = readConfig();

const pool = createPool(config);
const app = await buildApp({ config, store: new PgUserStore(pool) });

pool.on("error", (err) => app.log.error({ step: "db/pool", err }, "idle client error"));
app.addHook("onClose", async () => {
  await pool.end();
});

if (!config.databaseUrl) app.log.warn({ step: "config" }, "DATABASE_URL не задан — используются PG* переменные окружения");
if (!config.botToken) app.log.warn({ step: "config" }, "BOT_TOKEN не задан — любой initData отклоняется");

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "close failed");
        process.exit(1);
      }
    );
  });
}

try {
  await app.listen({ host: config.host, port: config.port });
} catch (err) {
  app.log.error({ err }, "listen failed");
  process.exit(1);
}
