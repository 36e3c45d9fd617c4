/**
 * Вызовы Telegram Bot API от имени бота: ссылка на оплату (Stars) и сообщения пользователю.
 * Без BOT_TOKEN шлюз «недоступен»: вызовы возвращают null/false, ничего не бросают.
 */

import type { FastifyBaseLogger } from "fastify";
import { Api, GrammyError, HttpError } from "grammy";

export type InvoiceRequest = {
  title: string;
  description: string;
  payload: string;
  /** XTR — Telegram Stars */
  currency: string;
  prices: { label: string; amount: number }[];
};

export interface TelegramGateway {
  readonly available: boolean;
  /** Ссылка на инвойс или null (нет токена / ошибка Bot API). */
  createInvoiceLink(invoice: InvoiceRequest): Promise<string | null>;
  sendMessage(chatId: number, text: string): Promise<boolean>;
}

function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof GrammyError) {
    return { kind: "bot_api", method: err.method, code: err.error_code, description: err.description };
  }
  if (err instanceof HttpError) {
    return { kind: "network", message: err.message };
  }
  return { kind: "unknown", message: err instanceof Error ? err.message : String(err) };
}

class BotApiGateway implements TelegramGateway {
  readonly available = true;

  constructor(
    private readonly api: Api,
    private readonly log: FastifyBaseLogger
  ) {}

  async createInvoiceLink(invoice: InvoiceRequest): Promise<string | null> {
    try {
      return await this.api.raw.createInvoiceLink({
        title: invoice.title,
        description: invoice.description,
        payload: invoice.payload,
        currency: invoice.currency,
        prices: invoice.prices,
      });
    } catch (err) {
      this.log.error({ step: "telegram/createInvoiceLink", payload: invoice.payload, ...describeError(err) });
      return null;
    }
  }

  async sendMessage(chatId: number, text: string): Promise<boolean> {
    try {
      await this.api.sendMessage(chatId, text, { parse_mode: "Markdown" });
      return true;
    } catch (err) {
      this.log.warn({ step: "telegram/sendMessage", chatId, ...describeError(err) });
      return false;
    }
  }
}

const unavailableGateway: TelegramGateway = {
  available: false,
  async createInvoiceLink() {
    return null;
  },
  async sendMessage() {
    return false;
  },
};

export function createTelegramGateway(botToken: string, log: FastifyBaseLogger): TelegramGateway {
  if (!botToken) {
    log.warn({ step: "telegram", result: "disabled" }, "BOT_TOKEN не задан — оплата и сообщения недоступны");
    return unavailableGateway;
  }
  return new BotApiGateway(new Api(botToken), log);
}
