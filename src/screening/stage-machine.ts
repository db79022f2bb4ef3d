import { Stage, STAGE_SEQUENCE } from "../shared/types/screening.types";

const transitionRules: Record<Stage, Stage[]> = {
  greeting: ["collect_name", "exited"],
  collect_name: ["collect_email", "exited"],
  collect_email: ["collect_phone", "exited"],
  collect_phone: ["collect_experience", "exited"],
  collect_experience: ["collect_position", "exited"],
  collect_position: ["collect_location", "exited"],
  collect_location: ["collect_tech_stack", "exited"],
  collect_tech_stack: ["tech_questions", "exited"],
  tech_questions: ["conclusion", "exited"],
  conclusion: ["exited"],
  exited: [],
};

export function isAllowedTransition(from: Stage, to: Stage): boolean {
  return transitionRules[from].includes(to);
}

export function assertTransition(from: Stage, to: Stage): void {
  if (!isAllowedTransition(from, to)) {
    throw new Error(`Invalid transition from ${from} to ${to}`);
  }
}

export function nextStage(stage: Stage): Stage | null {
  switch (stage) {
    case "greeting":
      return "collect_name";
    case "collect_name":
      return "collect_email";
    case "collect_email":
      return "collect_phone";
    case "collect_phone":
      return "collect_experience";
    case "collect_experience":
      return "collect_position";
    case "collect_position":
      return "collect_location";
    case "collect_location":
      return "collect_tech_stack";
    case "collect_tech_stack":
      return "tech_questions";
    case "tech_questions":
      return "conclusion";
    case "conclusion":
    case "exited":
      return null;
    default:
      return assertNever(stage);
  }
}

export function progressFraction(stage: Stage): number {
  return STAGE_SEQUENCE.indexOf(stage) / (STAGE_SEQUENCE.length - 1);
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled stage: ${String(value)}`);
}
