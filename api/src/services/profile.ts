import { resolveZodiac, type ZodiacKey } from "../lib/zodiac.js";
import type { UserRecord, UserStore } from "./user-store.js";

export const DEFAULT_USER_NAME = "Путник";

export type UserProfile = {
  userId: number;
  userName: string;
  zodiac: string | null;
  zodiacEmoji: string | null;
  isPremium: boolean;
  subscriptionUntil: string | null;
  freeUsed: number;
  /** Совпадает с freeUsed — так исторически читает Mini App. */
  readings: number;
  referrals: number;
  bonusDays: number;
};

/**
 * Профиль есть всегда: нет пользователя или упала БД — отдаём нулевой.
 * status различает эти случаи для логов, клиенту он не уходит.
 */
export type ProfileResolution =
  | { status: "found"; profile: UserProfile }
  | { status: "not_found"; profile: UserProfile }
  | { status: "unavailable"; profile: UserProfile; error: unknown };

export type ProfileOptions = {
  zodiacFallback?: ZodiacKey | "none";
  now?: Date;
};

/** Премиум только если срок подписки строго позже now. */
export function isPremiumAt(subscriptionUntil: Date | null, now: Date): boolean {
  return subscriptionUntil != null && subscriptionUntil.getTime() > now.getTime();
}

export function emptyProfile(userId: number, opts: ProfileOptions = {}): UserProfile {
  const zodiac = resolveZodiac(null, opts.zodiacFallback);
  return {
    userId,
    userName: DEFAULT_USER_NAME,
    zodiac: zodiac?.label ?? null,
    zodiacEmoji: zodiac?.emoji ?? null,
    isPremium: false,
    subscriptionUntil: null,
    freeUsed: 0,
    readings: 0,
    referrals: 0,
    bonusDays: 0,
  };
}

export function toProfile(user: UserRecord, referrals: number, opts: ProfileOptions = {}): UserProfile {
  const zodiac = resolveZodiac(user.zodiacSign, opts.zodiacFallback);
  const name = user.firstName?.trim();
  return {
    userId: user.userId,
    userName: name ? name : DEFAULT_USER_NAME,
    zodiac: zodiac?.label ?? null,
    zodiacEmoji: zodiac?.emoji ?? null,
    isPremium: isPremiumAt(user.subscriptionUntil, opts.now ?? new Date()),
    subscriptionUntil: user.subscriptionUntil?.toISOString() ?? null,
    freeUsed: user.freeReadingsUsed,
    readings: user.freeReadingsUsed,
    referrals,
    bonusDays: user.referralBonusDays,
  };
}

export async function resolveProfile(
  store: UserStore,
  userId: number,
  opts: ProfileOptions = {}
): Promise<ProfileResolution> {
  try {
    const { user, referrals } = await store.findProfileRecord(userId);
    if (!user) return { status: "not_found", profile: emptyProfile(userId, opts) };
    return { status: "found", profile: toProfile(user, referrals, opts) };
  } catch (error) {
    return { status: "unavailable", profile: emptyProfile(userId, opts), error };
  }
}
