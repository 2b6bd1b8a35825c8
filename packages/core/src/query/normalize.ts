/**
 * Maps one App's raw scores onto the range shared by every App.
 */
export interface ScoreNormalizer {
  normalize(scores: readonly number[]): number[];
}

/**
 * Scales scores so the App's best score lands on `ceiling`. Negative
 * scores clamp to 0, and an App whose best score is not positive gets 0
 * across the board.
 */
export class MaxScoreNormalizer implements ScoreNormalizer {
  constructor(private readonly ceiling = 1000) {}

  normalize(scores: readonly number[]): number[] {
    const best = scores.reduce((max, score) => Math.max(max, score), 0);
    if (best <= 0) {
      return scores.map(() => 0);
    }
    return scores.map((score) => (Math.max(score, 0) / best) * this.ceiling);
  }
}
