// Chinese numeral tokens → numbers.

const NUMERALS: Readonly<Record<string, number>> = {
  零: 0,
  一: 1,
  二: 2,
  两: 2,
  三: 3,
  四: 4,
  五: 5,
  六: 6,
  七: 7,
  八: 8,
  九: 9,
  十: 10,
  十一: 11,
  十二: 12,
  半: 0.5,
};

/** Character class accepted wherever a numeral may appear in a pattern. */
export const NUMERAL = "(\\d+|[零一二两三四五六七八九十]+)";

function digit(ch: string | undefined): number {
  if (ch === undefined) return 0;
  return NUMERALS[ch] ?? 0;
}

/**
 * Resolve a numeral token. Always returns a number: a token outside the known
 * forms (such as "三三" or "一百") counts as 1.
 */
export function chineseToNumber(token: string): number {
  if (/^\d+$/.test(token)) {
    return Number.parseInt(token, 10);
  }

  const exact = NUMERALS[token];
  if (exact !== undefined) return exact;

  const chars = [...token];

  // 十五
  if (chars.length === 2 && chars[0] === "十") {
    return 10 + digit(chars[1]);
  }

  // 二十
  if (chars.length === 2 && chars[1] === "十") {
    return digit(chars[0]) * 10;
  }

  // 二十三
  if (chars.length === 3 && chars[1] === "十") {
    return digit(chars[0]) * 10 + digit(chars[2]);
  }

  return 1;
}
