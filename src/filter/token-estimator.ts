/**
 * Character-based token estimate. Only used for reporting, never for
 * decisions, so a cheap tokenizer-independent heuristic is enough.
 */
export class TokenEstimator {
  private charsPerToken: number;

  constructor(charsPerToken: number = 4) {
    this.charsPerToken = charsPerToken > 0 ? charsPerToken : 4;
  }

  estimate(text: string): number {
    if (!text || text.length === 0) return 0;
    return Math.floor(text.length / this.charsPerToken);
  }
}

const defaultEstimator = new TokenEstimator();

export function estimateTokens(text: string): number {
  return defaultEstimator.estimate(text);
}
