import crypto from "node:crypto";
import { z } from "zod";

/**
 * Проверка Telegram WebApp initData (HMAC-SHA256).
 * See: https://core.telegram.org/bots/webapps#validating-data-received-via-the-mini-app
 */

export const INIT_DATA_MAX_AGE_SEC = 86400; // 24 ч
const FUTURE_SKEW_SEC = 30;

const TelegramUserSchema = z.object({
  id: z.number().int(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  username: z.string().optional(),
  language_code: z.string().optional(),
  is_premium: z.boolean().optional(),
  photo_url: z.string().optional(),
});

export type TelegramUser = z.infer<typeof TelegramUserSchema>;

export type InitDataFailure =
  | "missing_token"
  | "malformed"
  | "missing_hash"
  | "bad_signature"
  | "expired"
  | "bad_user";

/** reason — только для логов, снаружи все отказы выглядят одинаково. */
export type InitDataResult =
  | { ok: true; user: TelegramUser; authDate: number | null }
  | { ok: false; reason: InitDataFailure };

export type VerifyOptions = {
  /** Если > 0, auth_date не должен быть старше (защита от replay). */
  maxAgeSec?: number;
  now?: Date;
};

function decodeComponent(s: string): string {
  return decodeURIComponent(s.replace(/\+/g, " "));
}

/**
 * Разбирает строку initData в пары ключ/значение.
 * Делим по первому "=", т.к. в значениях (JSON в user) бывает "=".
 * null — если хоть одна пара битая или ключ повторяется.
 */
export function parseInitDataPairs(raw: string): Map<string, string> | null {
  const pairs = new Map<string, string>();
  for (const chunk of raw.split("&")) {
    if (chunk === "") continue;
    const eq = chunk.indexOf("=");
    if (eq <= 0) return null;
    let key: string;
    let value: string;
    try {
      key = decodeComponent(chunk.slice(0, eq));
      value = decodeComponent(chunk.slice(eq + 1));
    } catch {
      return null;
    }
    if (pairs.has(key)) return null;
    pairs.set(key, value);
  }
  return pairs;
}

/** data-check-string: пары без hash, сортировка по байтам ключа в UTF-8, через \n. */
export function buildDataCheckString(pairs: Iterable<[string, string]>): string {
  return [...pairs]
    .filter(([k]) => k !== "hash")
    .sort(([a], [b]) => Buffer.compare(Buffer.from(a), Buffer.from(b)))
    .map(([k, v]) => `${k}=${v}`)
    .join("\n");
}

export function computeInitDataHash(dataCheckString: string, botToken: string): string {
  const secretKey = crypto.createHmac("sha256", "WebAppData").update(botToken).digest();
  return crypto.createHmac("sha256", secretKey).update(dataCheckString).digest("hex");
}

function safeHexEqual(expected: string, received: string): boolean {
  const a = Buffer.from(expected, "utf8");
  const b = Buffer.from(received, "utf8");
  if (a.length !== b.length) return false;
  return crypto.timingSafeEqual(a, b);
}

function parseUser(raw: string | undefined): TelegramUser | null {
  if (!raw) return null;
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = TelegramUserSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

/**
 * Проверяет подпись initData и возвращает пользователя.
 * Никогда не бросает: любой сбой → { ok: false }.
 */
export function verifyInitData(raw: string, botToken: string, opts: VerifyOptions = {}): InitDataResult {
  if (!botToken) return { ok: false, reason: "missing_token" };
  if (!raw) return { ok: false, reason: "malformed" };

  const pairs = parseInitDataPairs(raw);
  if (!pairs) return { ok: false, reason: "malformed" };

  const hash = pairs.get("hash");
  if (!hash) return { ok: false, reason: "missing_hash" };
  pairs.delete("hash");

  const computed = computeInitDataHash(buildDataCheckString(pairs), botToken);
  if (!safeHexEqual(computed, hash)) return { ok: false, reason: "bad_signature" };

  const authDateRaw = pairs.get("auth_date");
  let authDate: number | null = null;
  if (authDateRaw != null) {
    authDate = /^\d+$/.test(authDateRaw) ? Number(authDateRaw) : NaN;
  }

  const maxAgeSec = opts.maxAgeSec ?? 0;
  if (maxAgeSec > 0) {
    if (authDate == null || !Number.isSafeInteger(authDate) || authDate <= 0) {
      return { ok: false, reason: "expired" };
    }
    const nowSec = Math.floor((opts.now ?? new Date()).getTime() / 1000);
    if (nowSec - authDate > maxAgeSec || authDate - nowSec > FUTURE_SKEW_SEC) {
      return { ok: false, reason: "expired" };
    }
  }

  const user = parseUser(pairs.get("user"));
  if (!user) return { ok: false, reason: "bad_user" };

  return { ok: true, user, authDate: authDate != null && Number.isSafeInteger(authDate) ? authDate : null };
}
