import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { ZodiacKey } from "../lib/zodiac.js";
import { assertSameUser, type InitDataGuard } from "../lib/auth.js";
import { sendBadRequest } from "../lib/errors.js";
import { resolveProfile } from "../services/profile.js";
import type { UserStore } from "../services/user-store.js";

const ParamsSchema = z.object({
  userId: z
    .string()
    .regex(/^-?\d+$/, "Expected a decimal integer")
    .transform(Number)
    .refine(Number.isSafeInteger, "Integer out of range"),
});

export type UserRoutesOptions = {
  store: UserStore;
  guard: InitDataGuard;
  zodiacFallback: ZodiacKey | "none";
  now?: () => Date;
};

export async function userRoutes(app: FastifyInstance, opts: UserRoutesOptions) {
  app.addHook("preHandler", opts.guard);

  /**
   * GET /api/user/:userId
   * Профиль для главного экрана. Нет пользователя или БД недоступна — нулевой профиль.
   */
  app.get("/user/:userId", async (req, reply) => {
    const params = ParamsSchema.safeParse(req.params);
    if (!params.success) return sendBadRequest(reply, params.error);
    const { userId } = params.data;
    if (!assertSameUser(req, reply, userId)) return reply;

    const resolution = await resolveProfile(opts.store, userId, {
      zodiacFallback: opts.zodiacFallback,
      now: opts.now?.(),
    });
    if (resolution.status === "unavailable") {
      req.log.error({ step: "user/profile", userId, err: resolution.error }, "storage unavailable, sending empty profile");
    } else {
      req.log.info({ step: "user/profile", userId, result: resolution.status });
    }
    return reply.send(resolution.profile);
  });
}
