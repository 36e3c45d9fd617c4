import { createHmac } from "node:crypto";
import Fastify from "fastify";
import { loadConfig, type AppConfig } from "../src/config.js";
import type { InvoiceRequest, TelegramGateway } from "../src/lib/telegram-api.js";
import type { ProfileRecord, UserRecord, UserStore } from "../src/services/user-store.js";

export const TEST_BOT_TOKEN = "123456:test-token";
export const NOW = new Date("2026-01-15T12:00:00.000Z");
export const NOW_SEC = Math.floor(NOW.getTime() / 1000);

export const silentLog = Fastify({ logger: false }).log;

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({ BOT_TOKEN: TEST_BOT_TOKEN, LOG_LEVEL: "silent", ...env });
}

/** Подпись как у клиента Telegram: отдельная реализация, не из src. */
export function signInitData(fields: Record<string, string>, botToken = TEST_BOT_TOKEN): string {
  const check = Object.keys(fields)
    .sort()
    .map((k) => `${k}=${fields[k]}`)
    .join("\n");
  const secret = createHmac("sha256", "WebAppData").update(botToken).digest();
  const hash = createHmac("sha256", secret).update(check).digest("hex");
  return new URLSearchParams({ ...fields, hash }).toString();
}

export function initDataFor(userId: number, firstName = "Анна"): string {
  return signInitData({
    auth_date: String(NOW_SEC),
    query_id: "AAHdF6IQAAAAAN0XohDhrOrc",
    user: JSON.stringify({ id: userId, first_name: firstName, language_code: "ru" }),
  });
}

export class MemoryUserStore implements UserStore {
  readonly users = new Map<number, UserRecord>();
  readonly referrals: { referrerId: number; referredId: number }[] = [];
  fail = false;
  calls = 0;

  addUser(user: Partial<UserRecord> & { userId: number }): UserRecord {
    const record: UserRecord = {
      firstName: null,
      zodiacSign: null,
      subscriptionUntil: null,
      freeReadingsUsed: 0,
      referralBonusDays: 0,
      ...user,
    };
    this.users.set(record.userId, record);
    return record;
  }

  async findProfileRecord(userId: number): Promise<ProfileRecord> {
    this.calls++;
    if (this.fail) throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
    const user = this.users.get(userId) ?? null;
    const referrals = this.referrals.filter((r) => r.referrerId === userId).length;
    return { user, referrals: user ? referrals : 0 };
  }

  async incrementReadings(userId: number): Promise<boolean> {
    this.calls++;
    if (this.fail) throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
    const user = this.users.get(userId);
    if (!user) return false;
    user.freeReadingsUsed += 1;
    return true;
  }
}

export class RecordingTelegram implements TelegramGateway {
  readonly available = true;
  invoiceLink: string | null = "https://t.me/$test-invoice";
  readonly invoices: InvoiceRequest[] = [];
  readonly messages: { chatId: number; text: string }[] = [];

  async createInvoiceLink(invoice: InvoiceRequest): Promise<string | null> {
    this.invoices.push(invoice);
    return this.invoiceLink;
  }

  async sendMessage(chatId: number, text: string): Promise<boolean> {
    this.messages.push({ chatId, text });
    return true;
  }
}
