import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { BOT_PAYMENT_HINT, createInvoice, subscriptionProduct } from "../src/services/invoice.js";
import { RecordingTelegram } from "./helpers.js";

const settings = { starsPrice: 250, subscriptionDays: 30 };

describe("createInvoice", () => {
  it("creates a Stars invoice link", async () => {
    const telegram = new RecordingTelegram();
    const res = await createInvoice(telegram, settings, { userId: 7, product: "subscription", method: "stars" });
    assert.deepEqual(res, { status: "ok", invoice_link: "https://t.me/$test-invoice" });
    assert.deepEqual(telegram.invoices, [
      {
        title: "⭐ Премиум подписка",
        description: "Безлимитный доступ на 30 дней",
        payload: "subscription_7",
        currency: "XTR",
        prices: [{ label: "Подписка", amount: 250 }],
      },
    ]);
  });

  it("reports a structured error when no link comes back", async () => {
    const telegram = new RecordingTelegram();
    telegram.invoiceLink = null;
    const res = await createInvoice(telegram, settings, { userId: 7, product: "premium", method: "stars" });
    assert.deepEqual(res, { status: "error", message: "Failed to create invoice" });
  });

  it("sends other methods to the bot", async () => {
    const telegram = new RecordingTelegram();
    const res = await createInvoice(telegram, settings, { userId: 7, product: "subscription", method: "yookassa" });
    assert.deepEqual(res, { status: "ok", redirect: "bot" });
    assert.deepEqual(telegram.messages, [{ chatId: 7, text: BOT_PAYMENT_HINT }]);
    assert.equal(telegram.invoices.length, 0);
  });

  it("bills the subscription whatever product name comes in", async () => {
    const telegram = new RecordingTelegram();
    const res = await createInvoice(telegram, settings, { userId: 7, product: "premium_month", method: "stars" });
    assert.deepEqual(res, { status: "ok", invoice_link: "https://t.me/$test-invoice" });
    assert.equal(telegram.invoices.length, 1);
    assert.equal(telegram.invoices[0]?.payload, "subscription_7");
    assert.deepEqual(telegram.invoices[0]?.prices, [{ label: "Подписка", amount: 250 }]);
  });
});

describe("subscriptionProduct", () => {
  it("uses configured price and length", () => {
    const product = subscriptionProduct({ starsPrice: 100, subscriptionDays: 7 });
    assert.equal(product.amount, 100);
    assert.equal(product.description, "Безлимитный доступ на 7 дней");
  });
});
