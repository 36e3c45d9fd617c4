export const ZODIAC_KEYS = [
  "aries",
  "taurus",
  "gemini",
  "cancer",
  "leo",
  "virgo",
  "libra",
  "scorpio",
  "sagittarius",
  "capricorn",
  "aquarius",
  "pisces",
] as const;

export type ZodiacKey = (typeof ZODIAC_KEYS)[number];

export type ZodiacInfo = {
  key: ZodiacKey;
  label: string;
  emoji: string;
};

const ZODIAC: Record<ZodiacKey, { label: string; emoji: string }> = {
  aries: { label: "Овен", emoji: "♈" },
  taurus: { label: "Телец", emoji: "♉" },
  gemini: { label: "Близнецы", emoji: "♊" },
  cancer: { label: "Рак", emoji: "♋" },
  leo: { label: "Лев", emoji: "♌" },
  virgo: { label: "Дева", emoji: "♍" },
  libra: { label: "Весы", emoji: "♎" },
  scorpio: { label: "Скорпион", emoji: "♏" },
  sagittarius: { label: "Стрелец", emoji: "♐" },
  capricorn: { label: "Козерог", emoji: "♑" },
  aquarius: { label: "Водолей", emoji: "♒" },
  pisces: { label: "Рыбы", emoji: "♓" },
};

export function isZodiacKey(value: string): value is ZodiacKey {
  return ZODIAC_KEYS.some((k) => k === value);
}

/**
 * Знак по ключу из БД. Неизвестный или пустой ключ → fallback
 * (по умолчанию Овен, см. ZODIAC_FALLBACK; "none" → null).
 */
export function resolveZodiac(
  key: string | null | undefined,
  fallback: ZodiacKey | "none" = "aries"
): ZodiacInfo | null {
  const normalized = key?.trim().toLowerCase() ?? "";
  if (isZodiacKey(normalized)) return { key: normalized, ...ZODIAC[normalized] };
  if (fallback === "none") return null;
  return { key: fallback, ...ZODIAC[fallback] };
}
