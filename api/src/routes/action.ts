import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { assertSameUser, type InitDataGuard } from "../lib/auth.js";
import { sendBadRequest } from "../lib/errors.js";
import type { TelegramGateway } from "../lib/telegram-api.js";
import { dispatchAction, parseAction } from "../services/actions.js";
import type { UserStore } from "../services/user-store.js";

const BodySchema = z.object({
  user_id: z.number().int(),
  action: z.string().min(1),
  data: z.record(z.unknown()).default({}),
});

export type ActionRoutesOptions = {
  store: UserStore;
  telegram: TelegramGateway;
  guard: InitDataGuard;
};

export async function actionRoutes(app: FastifyInstance, opts: ActionRoutesOptions) {
  app.addHook("preHandler", opts.guard);

  /**
   * POST /api/action
   * { user_id, action, data } → { status: "ok", ... }
   */
  app.post("/action", async (req, reply) => {
    const body = BodySchema.safeParse(req.body);
    if (!body.success) return sendBadRequest(reply, body.error);
    const { user_id: userId, action: name, data } = body.data;
    if (!assertSameUser(req, reply, userId)) return reply;

    const parsed = parseAction(name, data);
    if (!parsed.ok) return sendBadRequest(reply, parsed.error);

    const result = await dispatchAction({ store: opts.store, telegram: opts.telegram, log: req.log }, userId, parsed.action);
    req.log.info({ step: "action", userId, action: parsed.action.kind });
    return reply.send(result);
  });
}
