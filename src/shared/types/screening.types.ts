export type Stage =
  | "greeting"
  | "collect_name"
  | "collect_email"
  | "collect_phone"
  | "collect_experience"
  | "collect_position"
  | "collect_location"
  | "collect_tech_stack"
  | "tech_questions"
  | "conclusion"
  | "exited";

export type CollectionStage = Extract<Stage, `collect_${string}`>;

export const STAGE_SEQUENCE: ReadonlyArray<Stage> = [
  "greeting",
  "collect_name",
  "collect_email",
  "collect_phone",
  "collect_experience",
  "collect_position",
  "collect_location",
  "collect_tech_stack",
  "tech_questions",
  "conclusion",
  "exited",
];

export interface CandidateFieldValues {
  name: string;
  email: string;
  phone: string;
  experience: number;
  position: string;
  location: string;
  techStack: string[];
}

export type CandidateField = keyof CandidateFieldValues;

export type CandidateRecord = Partial<CandidateFieldValues>;

export const CANDIDATE_FIELDS: ReadonlyArray<CandidateField> = [
  "name",
  "email",
  "phone",
  "experience",
  "position",
  "location",
  "techStack",
];

export const STAGE_FIELDS: Record<CollectionStage, CandidateField> = {
  collect_name: "name",
  collect_email: "email",
  collect_phone: "phone",
  collect_experience: "experience",
  collect_position: "position",
  collect_location: "location",
  collect_tech_stack: "techStack",
};

export const FIELD_LABELS: Record<CandidateField, string> = {
  name: "Full Name",
  email: "Email Address",
  phone: "Phone Number",
  experience: "Years of Experience",
  position: "Desired Position",
  location: "Current Location",
  techStack: "Tech Stack",
};

export type MessageRole = "system" | "user" | "assistant";

export interface Message {
  role: MessageRole;
  text: string;
  timestamp: string;
}

export interface TechAnswer {
  question: string;
  answer: string;
}

export type PhrasingMode = "templated" | "generated";

export interface ScreeningConfig {
  minQuestions: number;
  maxQuestions: number;
  questionsPerTech: number;
  phrasingMode: PhrasingMode;
  companyName: string;
  transcriptTailSize: number;
}

export interface TurnResult {
  assistantText: string;
  stage: Stage;
  progressFraction: number;
}

export interface SessionSnapshot {
  stage: Stage;
  progressFraction: number;
  candidate: CandidateRecord;
  questionSet: string[];
  answers: TechAnswer[];
}

export function isCollectionStage(stage: Stage): stage is CollectionStage {
  return stage.startsWith("collect_");
}
