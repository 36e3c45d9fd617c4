import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { assertSameUser, type InitDataGuard } from "../lib/auth.js";
import { sendBadRequest } from "../lib/errors.js";
import type { TelegramGateway } from "../lib/telegram-api.js";
import { createInvoice, type InvoiceSettings } from "../services/invoice.js";

const BodySchema = z.object({
  user_id: z.number().int(),
  product: z.string().min(1),
  method: z.string().min(1),
});

export type InvoiceRoutesOptions = {
  telegram: TelegramGateway;
  guard: InitDataGuard;
  settings: InvoiceSettings;
};

export async function invoiceRoutes(app: FastifyInstance, opts: InvoiceRoutesOptions) {
  app.addHook("preHandler", opts.guard);

  /**
   * POST /api/create-invoice
   * method=stars → invoice_link; иначе — оплата через бота (redirect: "bot").
   */
  app.post("/create-invoice", async (req, reply) => {
    const body = BodySchema.safeParse(req.body);
    if (!body.success) return sendBadRequest(reply, body.error);
    const { user_id: userId, product, method } = body.data;
    if (!assertSameUser(req, reply, userId)) return reply;

    const result = await createInvoice(opts.telegram, opts.settings, { userId, product, method });
    if (result.status === "error") {
      req.log.warn({ step: "create-invoice", userId, product, method, message: result.message });
    } else {
      req.log.info({ step: "create-invoice", userId, product, method, redirect: "redirect" in result });
    }
    return reply.send(result);
  });
}
