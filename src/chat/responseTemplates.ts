import { hasReplyTrigger } from "../sentiment/keywordTaxonomy";
import type { SentimentResult } from "../sentiment/types";

export type FallbackKind = "crisis" | "academic" | "emotional" | "generic";

export const GREETING = "Hi there! I'm here to listen and support you. How are you feeling today?";

const TEMPLATES: Record<FallbackKind, string> = {
  crisis: [
    "I'm very concerned about what you're sharing with me. Your safety and wellbeing matter most right now.",
    "",
    "Please reach out for immediate help:",
    "• Crisis Hotline: 988 (Suicide & Crisis Lifeline)",
    "• Crisis Text Line: Text HOME to 741741",
    "• Emergency: Call 911 if you're in immediate danger",
    "",
    "You don't have to go through this alone. There are people who want to help you."
  ].join("\n"),
  academic: [
    "Academic pressure can feel overwhelming, and it's completely normal to feel stressed about your studies.",
    "",
    "A few strategies that might help:",
    "• Break large tasks into smaller, manageable steps",
    "• Make a study schedule and keep to it",
    "• Take regular breaks to avoid burnout",
    "• Visit your professors during office hours",
    "• Form a study group with classmates",
    "• Use the tutoring center for extra support",
    "",
    "Asking for help is a sign of strength. Which challenge would you like to talk through?"
  ].join("\n"),
  emotional: [
    "Thank you for sharing how you feel. It takes courage to reach out when you're struggling.",
    "",
    "What you're going through is valid, and many students feel the same way.",
    "",
    "Some things that might help:",
    "• Try deep breathing or a short mindfulness exercise",
    "• Keep a regular sleep schedule",
    "• Stay in touch with friends and family",
    "• Make time for activities you enjoy",
    "• Consider speaking with a counselor",
    "",
    "Would you like to talk more about what's on your mind? I'm here to listen."
  ].join("\n"),
  generic: [
    "Thank you for reaching out. I'm here to listen and support you through whatever you're facing.",
    "",
    "Students run into all kinds of challenges, academic, social or personal, and looking for support is a positive step.",
    "",
    "Resources that might be useful:",
    "• Campus counseling services",
    "• Academic support centers",
    "• Student wellness programs",
    "• Peer support groups",
    "",
    "Is there something specific you'd like to talk about?"
  ].join("\n")
};

/** Scanned against the raw message as well as the scored result. */
export const selectFallbackKind = (message: string, sentiment: SentimentResult): FallbackKind => {
  if (sentiment.riskLevel === "high" || hasReplyTrigger(message, "crisis")) return "crisis";
  if (hasReplyTrigger(message, "academic")) return "academic";
  if (hasReplyTrigger(message, "emotional")) return "emotional";
  return "generic";
};

export const fallbackReply = (message: string, sentiment: SentimentResult): string =>
  TEMPLATES[selectFallbackKind(message, sentiment)];

export const fallbackTemplate = (kind: FallbackKind): string => TEMPLATES[kind];
