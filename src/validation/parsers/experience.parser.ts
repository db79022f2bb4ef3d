import { ValidationResult } from "../../shared/types/validation.types";

export const MAX_EXPERIENCE_YEARS = 60;

const WORD_NUMBERS: Record<string, number> = {
  zero: 0,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  sixteen: 16,
  seventeen: 17,
  eighteen: 18,
  nineteen: 19,
  twenty: 20,
  thirty: 30,
  forty: 40,
  fifty: 50,
};

// "i have", "about", "i've got nearly", ...
const LEADING_PHRASE_PATTERN =
  /^(?:(?:i have got|i have|i've got|i've|i got|about|around|approximately|roughly|almost|nearly|over|close to)\s+)+/;

// "3", "3 years", "5+ yrs", "2.5 years of experience", "three years"
const EXPERIENCE_PATTERN = /^(-?\d+(?:\.\d+)?|[a-z]+)\s*\+?\s*(?:years?|yrs?)?(?:\s+of\s+experience)?$/;

export function parseExperience(raw: string): ValidationResult<number> {
  const normalized = raw.trim().toLowerCase().replace(/\s+/g, " ");
  if (!normalized) {
    return { ok: false, code: "empty", reason: "Years of experience cannot be empty." };
  }

  const match = normalized.replace(LEADING_PHRASE_PATTERN, "").replace(/[.!]+$/, "").match(EXPERIENCE_PATTERN);
  const token = match?.[1];
  if (!token) {
    return {
      ok: false,
      code: "invalid_experience",
      reason: 'Please give your experience as a number of years, for example "3" or "3 years".',
    };
  }

  const years: number | undefined = /^-?\d/.test(token) ? Number(token) : WORD_NUMBERS[token];
  if (years === undefined || !Number.isFinite(years)) {
    return {
      ok: false,
      code: "invalid_experience",
      reason: 'Please give your experience as a number of years, for example "3" or "3 years".',
    };
  }
  if (years < 0) {
    return { ok: false, code: "negative_experience", reason: "Years of experience cannot be negative." };
  }
  if (years > MAX_EXPERIENCE_YEARS) {
    return {
      ok: false,
      code: "experience_out_of_range",
      reason: `Years of experience must be between 0 and ${MAX_EXPERIENCE_YEARS}.`,
    };
  }

  return { ok: true, value: years };
}
