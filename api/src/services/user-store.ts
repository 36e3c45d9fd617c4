/**
 * Доступ к таблицам бота (users, referrals). Таблицы принадлежат боту,
 * API только читает профиль и увеличивает счётчик раскладов.
 */

import type { Pool } from "pg";

export type UserRecord = {
  userId: number;
  firstName: string | null;
  zodiacSign: string | null;
  subscriptionUntil: Date | null;
  freeReadingsUsed: number;
  referralBonusDays: number;
};

export type ProfileRecord = {
  user: UserRecord | null;
  referrals: number;
};

export interface UserStore {
  findProfileRecord(userId: number): Promise<ProfileRecord>;
  /** true — строка обновлена, false — пользователя нет. */
  incrementReadings(userId: number): Promise<boolean>;
}

type UserRow = {
  first_name: string | null;
  zodiac_sign: string | null;
  subscription_until: Date | string | null;
  free_readings_used: number | null;
  referral_bonus_days: number | null;
};

/** subscription_until бывает и timestamptz, и ISO-строкой (старые записи бота). */
export function toDate(value: Date | string | null | undefined): Date | null {
  if (value == null || value === "") return null;
  const d = value instanceof Date ? value : new Date(value);
  return Number.isNaN(d.getTime()) ? null : d;
}

export class PgUserStore implements UserStore {
  constructor(private readonly pool: Pool) {}

  async findProfileRecord(userId: number): Promise<ProfileRecord> {
    const client = await this.pool.connect();
    try {
      const users = await client.query<UserRow>(
        `SELECT first_name, zodiac_sign, subscription_until, free_readings_used, referral_bonus_days
           FROM users WHERE user_id = $1`,
        [userId]
      );
      const row = users.rows[0];
      if (!row) return { user: null, referrals: 0 };

      const refs = await client.query<{ count: number }>(
        "SELECT COUNT(*)::int AS count FROM referrals WHERE referrer_id = $1",
        [userId]
      );
      return {
        user: {
          userId,
          firstName: row.first_name,
          zodiacSign: row.zodiac_sign,
          subscriptionUntil: toDate(row.subscription_until),
          freeReadingsUsed: row.free_readings_used ?? 0,
          referralBonusDays: row.referral_bonus_days ?? 0,
        },
        referrals: refs.rows[0]?.count ?? 0,
      };
    } finally {
      client.release();
    }
  }

  async incrementReadings(userId: number): Promise<boolean> {
    const client = await this.pool.connect();
    try {
      const res = await client.query(
        "UPDATE users SET free_readings_used = free_readings_used + 1 WHERE user_id = $1",
        [userId]
      );
      return (res.rowCount ?? 0) > 0;
    } finally {
      client.release();
    }
  }
}
