import { analyzeEmotionalKeywords, detectAcademicStress } from "./keywordTaxonomy";
import {
  PatternPolarityEstimator,
  VaderValenceEstimator,
  type GeneralPolarityEstimator,
  type LexiconValenceEstimator
} from "./polarity";
import {
  classifyOverallSentiment,
  classifyTextRisk,
  counselorReferralFor,
  estimatorConfidence,
  needsAttentionFor,
  roundTo
} from "./riskFusion";
import { isBlank, preprocessText } from "./textPreprocessor";
import { buildTrendReport } from "./trends";
import type { SentimentResult, SentimentTrendReport } from "./types";

export interface SentimentAnalyzerOptions {
  generalEstimator?: GeneralPolarityEstimator;
  lexiconEstimator?: LexiconValenceEstimator;
  clock?: () => Date;
}

/**
 * Scores free text for polarity and distress. Stateless apart from its estimators,
 * so one instance can serve concurrent requests.
 */
export class SentimentAnalyzer {
  private readonly general: GeneralPolarityEstimator;
  private readonly lexicon: LexiconValenceEstimator;
  private readonly clock: () => Date;

  constructor(options: SentimentAnalyzerOptions = {}) {
    this.general = options.generalEstimator ?? new PatternPolarityEstimator();
    this.lexicon = options.lexiconEstimator ?? new VaderValenceEstimator();
    this.clock = options.clock ?? (() => new Date());
  }

  analyze(text: string): SentimentResult {
    if (isBlank(text)) return this.emptyAnalysis();

    const cleaned = preprocessText(text);
    const general = this.general.estimate(cleaned);
    const valence = this.lexicon.estimate(cleaned);
    const emotionAnalysis = analyzeEmotionalKeywords(cleaned);
    const academicStress = detectAcademicStress(cleaned);

    const overallSentiment = classifyOverallSentiment(general.polarity, valence.compound, emotionAnalysis);
    const riskLevel = classifyTextRisk(emotionAnalysis, overallSentiment, academicStress);

    return {
      text,
      timestamp: this.clock().toISOString(),
      scores: {
        generalPolarity: roundTo(general.polarity),
        subjectivity: roundTo(general.subjectivity),
        lexiconPositive: roundTo(valence.positive),
        lexiconNeutral: roundTo(valence.neutral),
        lexiconNegative: roundTo(valence.negative),
        lexiconCompound: roundTo(valence.compound)
      },
      overallSentiment,
      emotionAnalysis,
      academicStress,
      riskLevel,
      needsAttention: needsAttentionFor(riskLevel),
      counselorReferral: counselorReferralFor(riskLevel),
      confidence: estimatorConfidence(general.polarity, valence.compound)
    };
  }

  analyzeBatch(texts: string[]): SentimentResult[] {
    return texts.map((text) => this.analyze(text));
  }

  getSentimentTrends(analyses: SentimentResult[]): SentimentTrendReport {
    return buildTrendReport(analyses);
  }

  private emptyAnalysis(): SentimentResult {
    return {
      text: "",
      timestamp: this.clock().toISOString(),
      scores: {
        generalPolarity: 0,
        subjectivity: 0,
        lexiconPositive: 0,
        lexiconNeutral: 1,
        lexiconNegative: 0,
        lexiconCompound: 0
      },
      overallSentiment: "neutral",
      emotionAnalysis: { highRiskCount: 0, mediumRiskCount: 0, positiveCount: 0, detectedKeywords: [] },
      academicStress: { stressIndicators: 0, detectedTerms: [], hasAcademicStress: false },
      riskLevel: "low",
      needsAttention: false,
      counselorReferral: false,
      confidence: 0
    };
  }
}
