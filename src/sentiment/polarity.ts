import { PorterStemmer, SentimentAnalyzer, WordTokenizer } from "natural";
import vader from "vader-sentiment";

export interface GeneralPolarity {
  polarity: number;
  subjectivity: number;
}

export interface LexiconValence {
  positive: number;
  neutral: number;
  negative: number;
  compound: number;
}

export interface GeneralPolarityEstimator {
  estimate(text: string): GeneralPolarity;
}

export interface LexiconValenceEstimator {
  estimate(text: string): LexiconValence;
}

const clamp = (value: number, min: number, max: number): number => {
  if (!Number.isFinite(value)) return 0;
  return Math.min(max, Math.max(min, value));
};

/**
 * Word-averaged polarity over the English "pattern" vocabulary.
 * Subjectivity is the share of tokens that carry any polarity at all.
 */
export class PatternPolarityEstimator implements GeneralPolarityEstimator {
  private readonly analyzer = new SentimentAnalyzer("English", PorterStemmer, "pattern");
  private readonly tokenizer = new WordTokenizer();

  estimate(text: string): GeneralPolarity {
    const tokens = this.tokenizer.tokenize(text) ?? [];
    if (tokens.length === 0) return { polarity: 0, subjectivity: 0 };

    const polarity = this.analyzer.getSentiment(tokens);
    const opinionated = tokens.filter((token) => this.analyzer.getSentiment([token]) !== 0).length;

    return {
      polarity: clamp(polarity, -1, 1),
      subjectivity: clamp(opinionated / tokens.length, 0, 1)
    };
  }
}

/** VADER valence scores, including its booster words and negation handling. */
export class VaderValenceEstimator implements LexiconValenceEstimator {
  estimate(text: string): LexiconValence {
    const scores = vader.SentimentIntensityAnalyzer.polarity_scores(text);
    return {
      positive: clamp(scores.pos, 0, 1),
      neutral: clamp(scores.neu, 0, 1),
      negative: clamp(scores.neg, 0, 1),
      compound: clamp(scores.compound, -1, 1)
    };
  }
}
