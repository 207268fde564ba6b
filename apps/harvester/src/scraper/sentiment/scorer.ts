/**
 * Sentiment Scorer
 *
 * Any backend that maps text to a raw score in [-1, 1] can be plugged in. The
 * scorer owns the label convention:
 *   value >= positive threshold -> positive
 *   value <= negative threshold -> negative
 *   otherwise                   -> neutral
 * Empty or whitespace-only text is neutral with value 0 and never reaches the backend.
 */

import vader from 'vader-sentiment'
import type { NormalizedReview, ScoredReview, SentimentLabel, SentimentScore } from '../types.js'

export interface SentimentScorer {
  score(text: string): SentimentScore
}

export interface SentimentThresholds {
  positive: number
  negative: number
}

export const DEFAULT_SENTIMENT_THRESHOLDS: SentimentThresholds = {
  positive: 0.05,
  negative: -0.05,
}

/**
 * Raw polarity for a piece of text, nominally in [-1, 1].
 */
export type SentimentBackend = (text: string) => number

export function clampScore(value: number): number {
  if (!Number.isFinite(value)) return 0
  return Math.min(1, Math.max(-1, value))
}

export function labelFor(value: number, thresholds: SentimentThresholds): SentimentLabel {
  if (value >= thresholds.positive) return 'positive'
  if (value <= thresholds.negative) return 'negative'
  return 'neutral'
}

export class ThresholdSentimentScorer implements SentimentScorer {
  constructor(
    private readonly backend: SentimentBackend,
    private readonly thresholds: SentimentThresholds = DEFAULT_SENTIMENT_THRESHOLDS
  ) {
    const { positive, negative } = thresholds
    if (negative > positive || positive > 1 || negative < -1) {
      throw new RangeError(`Invalid sentiment thresholds: negative=${negative}, positive=${positive}`)
    }
  }

  score(text: string): SentimentScore {
    if (text.trim().length === 0) {
      return { label: 'neutral', value: 0 }
    }
    const value = clampScore(this.backend(text))
    return { label: labelFor(value, this.thresholds), value }
  }
}

/**
 * VADER compound score.
 */
export const vaderBackend: SentimentBackend = (text) => vader.SentimentIntensityAnalyzer.polarity_scores(text).compound

export function createVaderScorer(thresholds: SentimentThresholds = DEFAULT_SENTIMENT_THRESHOLDS): SentimentScorer {
  return new ThresholdSentimentScorer(vaderBackend, thresholds)
}

export function scoreReviews(reviews: NormalizedReview[], scorer: SentimentScorer): ScoredReview[] {
  return reviews.map((review) => ({ ...review, sentiment: scorer.score(review.text) }))
}
