import {
  CandidateField,
  CandidateFieldValues,
  CollectionStage,
  STAGE_FIELDS,
} from "../shared/types/screening.types";
import { ValidationResult } from "../shared/types/validation.types";
import { parseExperience } from "./parsers/experience.parser";
import { parsePhone } from "./parsers/phone.parser";
import { parseTechStack } from "./parsers/tech-stack.parser";

const NAME_MAX_LENGTH = 80;
const FREE_TEXT_MAX_LENGTH = 100;

const NAME_PREFIX_PATTERN = /^(?:my name is|my name's|i am|i'm|this is|call me)\s+/i;
const NAME_PATTERN = /^\p{L}[\p{L}\p{M} .'\-]*$/u;
const EMAIL_PATTERN =
  /^([A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+(?:\.[A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+)*)@((?:[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?\.)+[A-Za-z]{2,63})$/;

type FieldValidators = {
  [K in CandidateField]: (raw: string) => ValidationResult<CandidateFieldValues[K]>;
};

const FIELD_VALIDATORS: FieldValidators = {
  name: validateName,
  email: validateEmail,
  phone: parsePhone,
  experience: parseExperience,
  position: (raw) => validateFreeText(raw, "Position"),
  location: (raw) => validateFreeText(raw, "Location"),
  techStack: parseTechStack,
};

export type FieldValue = CandidateFieldValues[CandidateField];

export function validate(stage: CollectionStage, rawText: string): ValidationResult<FieldValue> {
  return validateField(STAGE_FIELDS[stage], rawText);
}

export function validateField<K extends CandidateField>(
  field: K,
  rawText: string,
): ValidationResult<CandidateFieldValues[K]> {
  const validator: (raw: string) => ValidationResult<CandidateFieldValues[K]> = FIELD_VALIDATORS[field];
  return validator(typeof rawText === "string" ? rawText : "");
}

export function validateName(raw: string): ValidationResult<string> {
  const collapsed = raw.trim().replace(/\s+/g, " ").replace(NAME_PREFIX_PATTERN, "");
  if (!collapsed) {
    return { ok: false, code: "empty", reason: "Name cannot be empty." };
  }
  if (/^[\d\s]+$/.test(collapsed)) {
    return { ok: false, code: "numeric_only", reason: "A name cannot be made of numbers only." };
  }
  if (!NAME_PATTERN.test(collapsed)) {
    return {
      ok: false,
      code: "invalid_characters",
      reason: "Name can only contain letters, spaces, periods, hyphens, and apostrophes.",
    };
  }
  if (collapsed.replace(/[ .'\-]/g, "").length < 2) {
    return { ok: false, code: "too_short", reason: "Name must be at least 2 characters long." };
  }
  if (collapsed.length > NAME_MAX_LENGTH) {
    return { ok: false, code: "too_long", reason: `Name must be at most ${NAME_MAX_LENGTH} characters long.` };
  }

  return { ok: true, value: collapsed.split(" ").map(capitalizeLowerToken).join(" ") };
}

export function validateEmail(raw: string): ValidationResult<string> {
  const trimmed = raw.trim();
  if (!trimmed) {
    return { ok: false, code: "empty", reason: "Email address cannot be empty." };
  }

  const match = trimmed.length <= 254 ? trimmed.match(EMAIL_PATTERN) : null;
  const local = match?.[1];
  const domain = match?.[2];
  if (!local || !domain || local.length > 64) {
    return {
      ok: false,
      code: "invalid_email_format",
      reason: "That is not a valid email address format. Please use something like name@example.com.",
    };
  }

  return { ok: true, value: `${local}@${domain.toLowerCase()}` };
}

function validateFreeText(raw: string, label: string): ValidationResult<string> {
  const collapsed = raw.trim().replace(/\s+/g, " ");
  if (!collapsed) {
    return { ok: false, code: "empty", reason: `${label} cannot be empty.` };
  }
  if (collapsed.length < 2) {
    return { ok: false, code: "too_short", reason: `${label} must be at least 2 characters long.` };
  }
  if (collapsed.length > FREE_TEXT_MAX_LENGTH) {
    return {
      ok: false,
      code: "too_long",
      reason: `${label} must be at most ${FREE_TEXT_MAX_LENGTH} characters long.`,
    };
  }
  return { ok: true, value: collapsed };
}

function capitalizeLowerToken(token: string): string {
  if (token !== token.toLowerCase()) {
    return token;
  }
  return token.charAt(0).toUpperCase() + token.slice(1);
}
