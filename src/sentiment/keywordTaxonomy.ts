import keywords from "./keywords.json";

export type EmotionTag = "high_risk" | "medium_risk" | "positive";

export type KeywordMatch = [tag: EmotionTag, term: string];

export interface EmotionAnalysis {
  highRiskCount: number;
  mediumRiskCount: number;
  positiveCount: number;
  detectedKeywords: KeywordMatch[];
}

export interface AcademicStressAnalysis {
  stressIndicators: number;
  detectedTerms: string[];
  hasAcademicStress: boolean;
}

export type ReplyTrigger = "crisis" | "academic" | "emotional";

export const ACADEMIC_STRESS_THRESHOLD = 2;

const EMOTION_TAGS: readonly EmotionTag[] = ["high_risk", "medium_risk", "positive"];

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

// A term only matches when it is not glued to another letter, digit or underscore,
// so "scared" never matches inside "scaredycat" or "scaredé".
export const compileTermPattern = (term: string): RegExp =>
  new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(term.toLowerCase())}(?![\\p{L}\\p{N}_])`, "u");

interface CompiledTerm {
  term: string;
  pattern: RegExp;
}

const compile = (terms: readonly string[]): CompiledTerm[] =>
  terms.map((term) => ({ term, pattern: compileTermPattern(term) }));

const EMOTION_TERMS: Record<EmotionTag, CompiledTerm[]> = {
  high_risk: compile(keywords.emotion.high_risk),
  medium_risk: compile(keywords.emotion.medium_risk),
  positive: compile(keywords.emotion.positive)
};

const ACADEMIC_TERMS = compile(keywords.academic_stress);

const REPLY_TRIGGERS: Record<ReplyTrigger, CompiledTerm[]> = {
  crisis: compile(keywords.reply_triggers.crisis),
  academic: compile(keywords.reply_triggers.academic),
  emotional: compile(keywords.reply_triggers.emotional)
};

const matchTerms = (text: string, terms: CompiledTerm[]): string[] =>
  terms.filter(({ pattern }) => pattern.test(text)).map(({ term }) => term);

export const getTaxonomyTerms = (tag: EmotionTag | "academic_stress"): string[] =>
  tag === "academic_stress" ? ACADEMIC_TERMS.map((t) => t.term) : EMOTION_TERMS[tag].map((t) => t.term);

export const analyzeEmotionalKeywords = (text: string): EmotionAnalysis => {
  const lowered = text.toLowerCase();
  const detectedKeywords: KeywordMatch[] = [];
  const counts: Record<EmotionTag, number> = { high_risk: 0, medium_risk: 0, positive: 0 };

  for (const tag of EMOTION_TAGS) {
    for (const term of matchTerms(lowered, EMOTION_TERMS[tag])) {
      counts[tag] += 1;
      detectedKeywords.push([tag, term]);
    }
  }

  return {
    highRiskCount: counts.high_risk,
    mediumRiskCount: counts.medium_risk,
    positiveCount: counts.positive,
    detectedKeywords
  };
};

export const detectAcademicStress = (text: string): AcademicStressAnalysis => {
  const detectedTerms = matchTerms(text.toLowerCase(), ACADEMIC_TERMS);
  return {
    stressIndicators: detectedTerms.length,
    detectedTerms,
    hasAcademicStress: detectedTerms.length >= ACADEMIC_STRESS_THRESHOLD
  };
};

export const hasReplyTrigger = (text: string, trigger: ReplyTrigger): boolean => {
  const lowered = text.toLowerCase();
  return REPLY_TRIGGERS[trigger].some(({ pattern }) => pattern.test(lowered));
};
