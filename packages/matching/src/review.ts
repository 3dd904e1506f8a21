import type { MatchResult, ReviewItem } from '@exclusion/core';

/**
 * Attach a review item unless the result already carries one; only the
 * first candidate found is reported.
 */
export function setReview(result: MatchResult, item: ReviewItem): void {
  if (result.review) return;
  result.review = item;
}
