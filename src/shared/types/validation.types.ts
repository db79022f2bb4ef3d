export type ValidationErrorCode =
  | "empty"
  | "too_short"
  | "too_long"
  | "numeric_only"
  | "invalid_characters"
  | "invalid_email_format"
  | "missing_country_code"
  | "invalid_phone_number"
  | "invalid_experience"
  | "negative_experience"
  | "experience_out_of_range"
  | "no_technologies"
  | "too_many_technologies";

export type ValidationResult<T> =
  | {
      ok: true;
      value: T;
    }
  | {
      ok: false;
      code: ValidationErrorCode;
      reason: string;
    };
