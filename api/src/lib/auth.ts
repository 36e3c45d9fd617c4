/**
 * Авторизация Mini App: x-telegram-init-data → requireInitData.
 * Пользователь из initData сверяется с user_id, который называет запрос.
 */

import type { FastifyReply, FastifyRequest } from "fastify";
import { verifyInitData, type TelegramUser } from "./telegram.js";

declare module "fastify" {
  interface FastifyRequest {
    /** Заполняется requireInitData; null — запрос без initData (REQUIRE_INIT_DATA=false). */
    telegramUser: TelegramUser | null;
  }
}

export const INIT_DATA_HEADER = "x-telegram-init-data";

export type InitDataGuardOptions = {
  botToken: string;
  requireInitData: boolean;
  maxAgeSec: number;
  now?: () => Date;
};

const UNAUTHORIZED = { status: "error", error: "Unauthorized" } as const;
const FORBIDDEN = { status: "error", error: "Forbidden" } as const;

function readInitData(req: FastifyRequest): string {
  const raw = req.headers[INIT_DATA_HEADER];
  return typeof raw === "string" ? raw.trim() : "";
}

export function createInitDataGuard(opts: InitDataGuardOptions) {
  /** PreHandler: проверяет initData, вешает telegramUser на req. */
  return async function requireInitData(req: FastifyRequest, reply: FastifyReply) {
    const initData = readInitData(req);
    if (!initData) {
      if (!opts.requireInitData) return;
      req.log.warn({ auth: "requireInitData", result: "missing" });
      return reply.status(401).send(UNAUTHORIZED);
    }
    const result = verifyInitData(initData, opts.botToken, {
      maxAgeSec: opts.maxAgeSec,
      now: opts.now?.(),
    });
    if (!result.ok) {
      // причину пишем только в лог — ответ одинаковый для любой ошибки
      req.log.warn({ auth: "requireInitData", result: "invalid", reason: result.reason });
      return reply.status(401).send(UNAUTHORIZED);
    }
    req.telegramUser = result.user;
  };
}

export type InitDataGuard = ReturnType<typeof createInitDataGuard>;

/** false — ответ 403 уже отправлен. */
export function assertSameUser(req: FastifyRequest, reply: FastifyReply, userId: number): boolean {
  const user = req.telegramUser;
  if (!user || user.id === userId) return true;
  req.log.warn({ auth: "assertSameUser", telegramUserId: user.id, requestedUserId: userId });
  reply.status(403).send(FORBIDDEN);
  return false;
}
