/** Probability that a player rated `ratingA` beats one rated `ratingB`. */
export function expectedScore(ratingA: number, ratingB: number): number {
  return 1 / (1 + 10 ** ((ratingB - ratingA) / 400));
}

/** Nearest integer; exact halves go to the even neighbour. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function updateRating(
  rating: number,
  expected: number,
  actual: 0 | 1,
  k: number,
): number {
  return roundHalfEven(rating + k * (actual - expected));
}

export interface MatchRatings {
  readonly winner: number;
  readonly loser: number;
}

/**
 * New ratings for both participants, computed from the same pre-match
 * snapshot so the order of application does not matter.
 */
export function rateMatch(winnerRating: number, loserRating: number, k: number): MatchRatings {
  const expectedWinner = expectedScore(winnerRating, loserRating);
  const expectedLoser = expectedScore(loserRating, winnerRating);

  return {
    winner: updateRating(winnerRating, expectedWinner, 1, k),
    loser: updateRating(loserRating, expectedLoser, 0, k),
  };
}
