import { ValidationResult } from "../../shared/types/validation.types";

export const MAX_TECHNOLOGIES = 20;
const MAX_TECHNOLOGY_LENGTH = 50;

const SEPARATOR_PATTERN = /\s*(?:,|;|\n|&|\band\b)\s*/i;

export function parseTechStack(raw: string): ValidationResult<string[]> {
  const normalized = raw.trim();
  if (!normalized) {
    return { ok: false, code: "empty", reason: "Tech stack cannot be empty." };
  }

  const seen = new Set<string>();
  const technologies: string[] = [];
  for (const part of normalized.split(SEPARATOR_PATTERN)) {
    const token = part.trim().replace(/\s+/g, " ").toLowerCase();
    if (!token || seen.has(token)) {
      continue;
    }
    if (token.length > MAX_TECHNOLOGY_LENGTH) {
      return {
        ok: false,
        code: "too_long",
        reason: `"${part.trim().slice(0, 20)}..." is too long for a technology name. Please separate technologies with commas.`,
      };
    }
    seen.add(token);
    technologies.push(token);
  }

  if (technologies.length === 0) {
    return {
      ok: false,
      code: "no_technologies",
      reason: 'Please list at least one technology, for example "Python, React, Docker".',
    };
  }
  if (technologies.length > MAX_TECHNOLOGIES) {
    return {
      ok: false,
      code: "too_many_technologies",
      reason: `Please list at most ${MAX_TECHNOLOGIES} technologies.`,
    };
  }

  return { ok: true, value: technologies };
}
