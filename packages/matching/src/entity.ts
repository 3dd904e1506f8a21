/**
 * Entity matcher: exact normalized name confirms; a strong fuzzy hit is only
 * ever a review item, and on SAM it also needs state or zip corroboration.
 */

import {
  FUZZ_STRONG,
  emptyMatchResult,
  formatScore,
  ratio,
  type ExclusionLookup,
  type MatchResult,
} from '@exclusion/core';
import { setReview } from './review.js';

export interface EntityQuery {
  /** normalized entity name (suffixes removed) */
  name: string;
  city?: string | null;
  state?: string | null;
  zip?: string | null;
}

function matchOig(lookup: ExclusionLookup, name: string, result: MatchResult): void {
  const [exact] = lookup.oigEntitiesByName(name);
  if (exact) {
    result.oigStatus = 'CONFIRMED';
    result.oigDate = exact.exclusionDate;
    result.reason = 'Exact entity name match (OIG)';
    return;
  }

  for (const candidate of lookup.allOigEntities()) {
    const score = ratio(name, candidate.name);
    if (score >= FUZZ_STRONG) {
      setReview(result, {
        source: 'OIG Entities',
        candidateName: candidate.name,
        candidateExclusionDate: candidate.exclusionDate,
        note: `High-similarity OIG entity name match (score=${formatScore(score)}).`,
        neededData: 'Tax ID / address corroboration',
      });
      return;
    }
  }
}

function matchSam(lookup: ExclusionLookup, query: EntityQuery, result: MatchResult): void {
  const [exact] = lookup.samEntitiesByName(query.name);
  if (exact) {
    result.samStatus = 'CONFIRMED';
    result.samDate = exact.exclusionDate;
    if (!result.reason) result.reason = 'Exact entity name match (SAM)';
    return;
  }

  const state = query.state?.toUpperCase() ?? '';
  const zip = query.zip ?? '';

  for (const candidate of lookup.allSamEntities()) {
    const score = ratio(query.name, candidate.name);
    if (score < FUZZ_STRONG) continue;

    const corroboration =
      state !== '' && state === candidate.state ? 'state' : zip !== '' && zip === candidate.zip ? 'zip' : null;
    if (corroboration) {
      setReview(result, {
        source: 'SAM Entities',
        candidateName: candidate.name,
        candidateExclusionDate: candidate.exclusionDate,
        note: `High-similarity SAM entity match (score=${formatScore(score)}) with ${corroboration} corroboration.`,
        neededData: 'Tax ID / exact legal name confirmation',
      });
      return;
    }
  }
}

export function matchEntity(lookup: ExclusionLookup, query: EntityQuery): MatchResult {
  const result = emptyMatchResult();

  if (!query.name) {
    setReview(result, {
      source: 'Source Record',
      candidateName: '',
      candidateExclusionDate: '',
      note: 'Vendor name is empty after normalization and could not be screened.',
      neededData: 'Legal entity name',
    });
    return result;
  }

  matchOig(lookup, query.name, result);
  matchSam(lookup, query, result);
  return result;
}
