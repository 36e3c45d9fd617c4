import path from "node:path";
import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import fastifyStatic from "@fastify/static";
import type { AppConfig } from "./config.js";
import { INIT_DATA_HEADER, createInitDataGuard } from "./lib/auth.js";
import { registerErrorHandlers } from "./lib/errors.js";
import { createTelegramGateway, type TelegramGateway } from "./lib/telegram-api.js";
import { actionRoutes } from "./routes/action.js";
import { invoiceRoutes } from "./routes/invoice.js";
import { userRoutes } from "./routes/user.js";
import type { UserStore } from "./services/user-store.js";

export type AppDeps = {
  config: AppConfig;
  store: UserStore;
  /** По умолчанию — grammy Api по BOT_TOKEN. */
  telegram?: TelegramGateway;
  /** false — без логов (тесты). */
  logger?: boolean;
  now?: () => Date;
};

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const { config } = deps;
  const app = Fastify({ logger: deps.logger === false ? false : { level: config.logLevel } });

  registerErrorHandlers(app);
  app.decorateRequest("telegramUser", null);

  await app.register(cors, {
    origin: (origin, cb) => {
      // Нет Origin (запрос из бота/curl) — разрешаем
      if (!origin) return cb(null, true);
      // Список не задан — любой origin (Mini App открывается с домена Telegram)
      if (config.webappOrigins.length === 0) return cb(null, true);
      cb(null, config.webappOrigins.includes(origin));
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", INIT_DATA_HEADER],
  });

  await app.register(fastifyStatic, { root: path.resolve(config.webappDir), serve: false });

  const telegram = deps.telegram ?? createTelegramGateway(config.botToken, app.log);
  const guard = createInitDataGuard({
    botToken: config.botToken,
    requireInitData: config.requireInitData,
    maxAgeSec: config.initDataMaxAgeSec,
    now: deps.now,
  });

  app.get("/", async (_req, reply) => reply.sendFile("index.html"));
  app.get("/health", async () => ({ status: "healthy" }));

  await app.register(userRoutes, {
    prefix: "/api",
    store: deps.store,
    guard,
    zodiacFallback: config.zodiacFallback,
    now: deps.now,
  });
  await app.register(actionRoutes, { prefix: "/api", store: deps.store, telegram, guard });
  await app.register(invoiceRoutes, {
    prefix: "/api",
    telegram,
    guard,
    settings: { starsPrice: config.starsPrice, subscriptionDays: config.subscriptionDays },
  });

  return app;
}
