/**
 * Person matcher
 *
 * OIG: same last name, then first name exact or fuzzy, confirmed only with a
 * matching DOB. Near misses become review items.
 * SAM: individual records rarely carry identifiers, so only an exact name
 * corroborated by location is confirmed and nothing else is reported.
 */

import {
  FUZZ_POSSIBLE,
  FUZZ_STRONG,
  emptyMatchResult,
  formatScore,
  ratio,
  type ExclusionLookup,
  type MatchResult,
} from '@exclusion/core';
import { setReview } from './review.js';

export interface PersonQuery {
  /** normalized first name */
  first: string;
  /** normalized last name */
  last: string;
  /** YYYYMMDD */
  dobCompact?: string | null;
  city?: string | null;
  state?: string | null;
  zip?: string | null;
}

function matchOig(lookup: ExclusionLookup, query: PersonQuery, result: MatchResult): void {
  const dob = query.dobCompact || '';

  for (const candidate of lookup.oigPeopleByLastName(query.last)) {
    const score = ratio(query.first, candidate.first);
    const dobMatches = dob !== '' && dob === candidate.dobCompact;

    if (query.first === candidate.first && dobMatches) {
      result.oigStatus = 'CONFIRMED';
      result.oigDate = candidate.exclusionDate;
      result.reason = 'Exact first+last+DOB';
      return;
    }

    if (score >= FUZZ_STRONG && dobMatches) {
      result.oigStatus = 'CONFIRMED';
      result.oigDate = candidate.exclusionDate;
      result.reason = `Fuzzy first (${formatScore(score)}) + DOB`;
      return;
    }

    if (score < FUZZ_POSSIBLE) continue;

    const candidateName = `${candidate.first} ${candidate.last}`.trim();
    if (!dob) {
      setReview(result, {
        source: 'OIG People',
        candidateName,
        candidateExclusionDate: candidate.exclusionDate,
        note: `High-similarity OIG name match (score=${formatScore(score)}) but DOB missing in source record.`,
        neededData: 'DOB',
      });
    } else if (candidate.dobCompact && dob !== candidate.dobCompact) {
      setReview(result, {
        source: 'OIG People',
        candidateName,
        candidateExclusionDate: candidate.exclusionDate,
        note: `High-similarity OIG name match (score=${formatScore(score)}) but DOB does not match reference.`,
        neededData: 'Confirm DOB / SSN last4',
      });
    }
  }
}

function matchSam(lookup: ExclusionLookup, query: PersonQuery, result: MatchResult): void {
  const city = query.city?.toUpperCase() ?? '';
  const state = query.state?.toUpperCase() ?? '';
  const zip = query.zip ?? '';

  for (const candidate of lookup.samPeopleByLastName(query.last)) {
    if (query.first !== candidate.first) continue;

    const zipMatches = zip !== '' && zip === candidate.zip;
    const cityMatches = city !== '' && city === candidate.city;
    const stateMatches = state !== '' && state === candidate.state;
    const noLocation = city === '' && state === '';

    if (zipMatches && (noLocation || (cityMatches && stateMatches))) {
      result.samStatus = 'CONFIRMED';
      result.samDate = candidate.exclusionDate;
      return;
    }
  }
}

export function matchPerson(lookup: ExclusionLookup, query: PersonQuery): MatchResult {
  const result = emptyMatchResult();

  if (!query.first || !query.last) {
    setReview(result, {
      source: 'Source Record',
      candidateName: '',
      candidateExclusionDate: '',
      note: 'Source record has an incomplete name and could not be screened by name.',
      neededData: 'First and last name',
    });
    return result;
  }

  matchOig(lookup, query, result);
  matchSam(lookup, query, result);
  return result;
}
