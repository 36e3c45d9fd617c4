/**
 * Действия из Mini App: POST /api/action { user_id, action, data }.
 * Набор закрыт; неизвестное действие → { status: "ok" } без побочных эффектов.
 */

import type { FastifyBaseLogger } from "fastify";
import { z } from "zod";
import type { TelegramGateway } from "../lib/telegram-api.js";
import type { UserStore } from "./user-store.js";

export const DEFAULT_COMPATIBILITY_SCORE = 75;

export const SUBSCRIPTION_HINT = "💳 Для оформления подписки нажми /start и выбери «⭐ Подписка»";

const CANNED_TEXTS = {
  horoscope:
    "✨ Сегодня звёзды на вашей стороне. Хороший день, чтобы начать новое и довериться интуиции.",
  money_forecast:
    "💰 Финансовый поток усиливается. Не спешите с крупными тратами — лучший момент наступит в конце недели.",
  karma_analysis:
    "🔮 Ваша карма очищается через заботу о близких. Отпустите старые обиды — это освободит место для нового.",
} as const;

export type Action =
  | { kind: "use_reading" }
  | { kind: "buy_subscription" }
  | { kind: "horoscope" }
  | { kind: "compatibility"; score: number }
  | { kind: "money_forecast" }
  | { kind: "karma_analysis" }
  | { kind: "share_referral" }
  | { kind: "unknown"; name: string };

export type ActionResult =
  | { status: "ok" }
  | { status: "ok"; redirect: "bot" }
  | { status: "ok"; text: string }
  | { status: "ok"; score: number };

const CompatibilityData = z.object({
  score: z.number().finite().optional(),
});

export type ParseActionResult = { ok: true; action: Action } | { ok: false; error: z.ZodError };

/** Имя действия + свободный data → вариант с нужными ему полями. */
export function parseAction(name: string, data: Record<string, unknown> = {}): ParseActionResult {
  switch (name) {
    case "use_reading":
    case "tarot_reading":
      return { ok: true, action: { kind: "use_reading" } };
    case "buy_subscription":
    case "buy_premium":
      return { ok: true, action: { kind: "buy_subscription" } };
    case "horoscope":
    case "money_forecast":
    case "karma_analysis":
    case "share_referral":
      return { ok: true, action: { kind: name } };
    case "compatibility": {
      const parsed = CompatibilityData.safeParse(data);
      if (!parsed.success) return { ok: false, error: parsed.error };
      return { ok: true, action: { kind: "compatibility", score: parsed.data.score ?? DEFAULT_COMPATIBILITY_SCORE } };
    }
    default:
      return { ok: true, action: { kind: "unknown", name } };
  }
}

export type ActionDeps = {
  store: UserStore;
  telegram: TelegramGateway;
  log: FastifyBaseLogger;
};

export async function dispatchAction(deps: ActionDeps, userId: number, action: Action): Promise<ActionResult> {
  switch (action.kind) {
    case "use_reading": {
      // счётчик best-effort: сбой БД не ломает ответ
      try {
        const updated = await deps.store.incrementReadings(userId);
        if (!updated) deps.log.info({ step: "action/use_reading", userId, result: "user_not_found" });
      } catch (err) {
        deps.log.error({ step: "action/use_reading", userId, err }, "increment readings failed");
      }
      return { status: "ok" };
    }
    case "buy_subscription":
      await deps.telegram.sendMessage(userId, SUBSCRIPTION_HINT);
      return { status: "ok", redirect: "bot" };
    case "horoscope":
    case "money_forecast":
    case "karma_analysis":
      return { status: "ok", text: CANNED_TEXTS[action.kind] };
    case "compatibility":
      return { status: "ok", score: action.score };
    case "share_referral":
      return { status: "ok" };
    case "unknown":
      deps.log.debug({ step: "action", action: action.name, result: "ignored" });
      return { status: "ok" };
  }
}
