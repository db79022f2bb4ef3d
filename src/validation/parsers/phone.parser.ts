import { parsePhoneNumberFromString } from "libphonenumber-js/max";
import { ValidationResult } from "../../shared/types/validation.types";

const FORMAT_HINT = "Please include the country code, for example +1 234 567 8900.";

export function parsePhone(raw: string): ValidationResult<string> {
  const normalized = raw.trim().replace(/\s+/g, " ");
  if (!normalized) {
    return { ok: false, code: "empty", reason: `Phone number cannot be empty. ${FORMAT_HINT}` };
  }
  if (!normalized.startsWith("+")) {
    return {
      ok: false,
      code: "missing_country_code",
      reason: `That phone number has no international country code. ${FORMAT_HINT}`,
    };
  }

  const parsed = parsePhoneNumberFromString(normalized);
  if (!parsed || !parsed.isValid()) {
    return {
      ok: false,
      code: "invalid_phone_number",
      reason: `That does not look like a valid phone number for its country. ${FORMAT_HINT}`,
    };
  }

  return { ok: true, value: parsed.formatInternational() };
}
