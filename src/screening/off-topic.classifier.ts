import { CollectionStage } from "../shared/types/screening.types";
import { ValidationErrorCode } from "../shared/types/validation.types";
import { tokenizeWords } from "./exit-detector";

export interface OffTopicInput {
  stage: CollectionStage;
  text: string;
  validationCode: ValidationErrorCode;
}

export interface OffTopicClassifier {
  isOffTopic(input: OffTopicInput): boolean;
}

const MIN_OFF_TOPIC_WORDS = 3;

const STAGE_INDICATORS: Record<CollectionStage, RegExp> = {
  collect_name: /\b(name|i'm|i am|call me|called)\b/,
  collect_email: /@|e-?mail|\bmail\b|\baddress\b/,
  collect_phone: /\d|\bphone\b|\bnumber\b|\bmobile\b|\bcell\b|\bcontact\b/,
  collect_experience: /\d|\byears?\b|\byrs?\b|\bmonths?\b|\bexperience\b|\bfresher\b|\bjunior\b|\bsenior\b|\bnone\b/,
  collect_position: /\b(role|position|job|engineer|developer|dev|manager|analyst|designer|architect|lead|scientist|intern)\b/,
  collect_location: /\b(city|country|live|living|based|from|located|remote|in)\b/,
  collect_tech_stack: /\b(stack|tech|technolog(y|ies)|languages?|frameworks?|tools?|use|know|work)\b/,
};

export class IndicatorOffTopicClassifier implements OffTopicClassifier {
  isOffTopic(input: OffTopicInput): boolean {
    if (input.validationCode === "empty") {
      return true;
    }
    const normalized = input.text.trim().toLowerCase();
    if (tokenizeWords(normalized).length < MIN_OFF_TOPIC_WORDS) {
      return false;
    }
    return !STAGE_INDICATORS[input.stage].test(normalized);
  }
}
