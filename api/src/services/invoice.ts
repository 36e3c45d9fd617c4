import type { TelegramGateway } from "../lib/telegram-api.js";

export const STARS_CURRENCY = "XTR";
export const BOT_PAYMENT_HINT = "💳 Переходи к оплате в боте: /start → Подписка";

export type InvoiceResult =
  | { status: "ok"; invoice_link: string }
  | { status: "ok"; redirect: "bot" }
  | { status: "error"; message: string };

export type Product = {
  key: "subscription";
  title: string;
  description: string;
  priceLabel: string;
  amount: number;
};

export type InvoiceSettings = {
  starsPrice: number;
  subscriptionDays: number;
};

/** Продается одна подписка по фиксированной цене. */
export function subscriptionProduct(settings: InvoiceSettings): Product {
  return {
    key: "subscription",
    title: "⭐ Премиум подписка",
    description: `Безлимитный доступ на ${settings.subscriptionDays} дней`,
    priceLabel: "Подписка",
    amount: settings.starsPrice,
  };
}

/**
 * stars — ссылка на инвойс в Telegram Stars.
 * Любой другой способ (yookassa и т.п.) оплачивается через диалог с ботом.
 * product из Mini App только логируется, счет всегда на подписку.
 */
export async function createInvoice(
  telegram: TelegramGateway,
  settings: InvoiceSettings,
  req: { userId: number; product: string; method: string }
): Promise<InvoiceResult> {
  const product = subscriptionProduct(settings);

  if (req.method === "stars") {
    const link = await telegram.createInvoiceLink({
      title: product.title,
      description: product.description,
      payload: `${product.key}_${req.userId}`,
      currency: STARS_CURRENCY,
      prices: [{ label: product.priceLabel, amount: product.amount }],
    });
    if (!link) return { status: "error", message: "Failed to create invoice" };
    return { status: "ok", invoice_link: link };
  }

  await telegram.sendMessage(req.userId, BOT_PAYMENT_HINT);
  return { status: "ok", redirect: "bot" };
}
