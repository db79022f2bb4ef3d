import {
  CANDIDATE_FIELDS,
  CandidateField,
  CandidateFieldValues,
  CandidateRecord,
  FIELD_LABELS,
} from "../shared/types/screening.types";

export const FIELD_QUESTIONS: Record<CandidateField, string> = {
  name: "What is your full name?",
  email: "What is your email address?",
  phone: "What is your phone number? Please include the country code, for example +1 234 567 8900.",
  experience: "How many years of professional experience do you have?",
  position: "Which position or positions are you interested in?",
  location: "Where are you currently located? City and country are enough.",
  techStack:
    "Please list your tech stack: the languages, frameworks, databases and tools you work with, separated by commas.",
};

export const FIELD_HINTS: Record<CandidateField, string> = {
  name: "letters, spaces, periods, hyphens and apostrophes",
  email: "name@example.com",
  phone: "international format with country code, e.g. +1 234 567 8900",
  experience: 'a number of years, e.g. "3" or "3 years"',
  position: "free text, e.g. Backend Engineer",
  location: "city and country",
  techStack: "comma-separated list, e.g. Python, React, Docker",
};

export function greetingMessage(companyName: string): string {
  return [
    `Hello! Welcome to the ${companyName} hiring assistant.`,
    "I will guide you through a short initial screening: a few details about you, then some technical questions based on your tech stack. It only takes a few minutes.",
    'You can type "exit" at any time to leave.',
    "",
    `To begin, ${FIELD_QUESTIONS.name.charAt(0).toLowerCase()}${FIELD_QUESTIONS.name.slice(1)}`,
  ].join("\n");
}

export function formatFieldValue(value: CandidateFieldValues[CandidateField]): string {
  if (Array.isArray(value)) {
    return value.join(", ");
  }
  return String(value);
}

export function acknowledgementMessage(field: CandidateField, value: string): string {
  switch (field) {
    case "name":
      return `Nice to meet you, ${value}!`;
    case "email":
      return `Thanks, I have your email as ${value}.`;
    case "phone":
      return `Got it, ${value}.`;
    case "experience":
      return `${value} ${value === "1" ? "year" : "years"} of experience, noted.`;
    case "position":
      return `Great, ${value} it is.`;
    case "location":
      return `Thanks, noted that you are based in ${value}.`;
    case "techStack":
      return `Thanks! I have noted your tech stack: ${value}.`;
  }
}

export function nextFieldMessage(acceptedField: CandidateField, acceptedValue: string, nextField: CandidateField): string {
  return `${acknowledgementMessage(acceptedField, acceptedValue)} ${FIELD_QUESTIONS[nextField]}`;
}

export function validationRetryMessage(reason: string, field: CandidateField): string {
  return `Sorry, that doesn't look right. ${reason} ${FIELD_QUESTIONS[field]}`;
}

export function cannedRedirectMessage(question: string): string {
  return `I might have missed that. Let's continue with the screening. ${question}`;
}

export function techQuestionMessage(index: number, total: number, question: string): string {
  return `Question ${index + 1} of ${total}: ${question}`;
}

export function techIntroMessage(techStack: string, total: number, firstQuestion: string): string {
  return [
    `${acknowledgementMessage("techStack", techStack)} I have ${total} technical questions for you. There are no trick questions, just answer in your own words.`,
    "",
    techQuestionMessage(0, total, firstQuestion),
  ].join("\n");
}

export function nextTechQuestionMessage(index: number, total: number, question: string): string {
  return ["Thanks for your answer.", "", techQuestionMessage(index, total, question)].join("\n");
}

export function summaryMessage(candidate: CandidateRecord, answered: number, total: number, companyName: string): string {
  const lines = CANDIDATE_FIELDS.flatMap((field) => {
    const value = candidate[field];
    return value === undefined ? [] : [`- ${FIELD_LABELS[field]}: ${formatFieldValue(value)}`];
  });
  return [
    "Thank you for completing the screening!",
    "",
    "Here is a summary of what you shared:",
    ...lines,
    `- Technical questions answered: ${answered} of ${total}`,
    "",
    `The ${companyName} team will review your profile and get back to you within 3-5 business days. Good luck!`,
  ].join("\n");
}

export function farewellMessage(name?: string): string {
  const addressee = name ? `, ${name}` : "";
  return `Thank you for your time${addressee}! The screening has been stopped. If you would like to continue later, just start a new conversation. Goodbye!`;
}

export function conversationEndedMessage(): string {
  return "This conversation has ended. Please reset to start a new screening.";
}
