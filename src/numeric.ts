export interface NumericExtractors {
  rooms(text: string): number | null;
  size(text: string): number | null;
  price(text: string): number | null;
}

const ROOMS_PATTERN = /(?<![\d.])(\d+(?:\.\d)?)\s*(?:rooms?\b|bedrooms?\b|חדר)/i;
const SIZE_PATTERN = /(?<!\d)(\d{2,4})\s*(?:sqm\b|m2\b|m²|square met|מ"ר|מ״ר|מטר)/i;
const PRICE_AFTER_PATTERN = /(?<!\d)(\d{3,6})\s*(?:₪|nis\b|ils\b|ש"ח|ש״ח)/i;
const PRICE_BEFORE_PATTERN = /(?:₪|\bnis|\bils)\s*(\d{3,6})(?!\d)/i;

function firstNumber(pattern: RegExp, text: string): number | null {
  const match = pattern.exec(text);
  if (!match) return null;
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : null;
}

// "5,500" and "5 500" are both common in listing cards.
function stripThousandsSeparators(text: string): string {
  return text.replace(/(\d)[,\s](?=\d{3}(?!\d))/g, '$1');
}

export const defaultExtractors: NumericExtractors = {
  rooms: (text) => firstNumber(ROOMS_PATTERN, text),
  size: (text) => firstNumber(SIZE_PATTERN, text),
  price: (text) => {
    const cleaned = stripThousandsSeparators(text);
    return firstNumber(PRICE_AFTER_PATTERN, cleaned) ?? firstNumber(PRICE_BEFORE_PATTERN, cleaned);
  },
};
