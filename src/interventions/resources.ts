import type { SupportResource } from "./types";

export const CRISIS_RESOURCES: readonly SupportResource[] = [
  { type: "crisis", name: "Crisis Hotline", contact: "988 (Suicide & Crisis Lifeline)" },
  { type: "crisis", name: "Crisis Text Line", contact: "Text HOME to 741741" },
  { type: "professional", name: "Campus Counseling", contact: "Contact your campus counseling center" }
];

export const ACADEMIC_RESOURCES: readonly SupportResource[] = [
  { type: "academic", name: "Tutoring Center", description: "Academic tutoring center" },
  { type: "academic", name: "Writing Center", description: "Writing support center" },
  { type: "academic", name: "Study Skills", description: "Academic success workshops" }
];
