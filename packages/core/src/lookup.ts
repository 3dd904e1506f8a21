/**
 * Read access to a month's exclusion lists. All names, cities and states are
 * stored normalized (uppercase, no punctuation); dates are ISO when the
 * source date parsed.
 */

export interface OigPersonRecord {
  first: string;
  last: string;
  dob: string;
  dobCompact: string;
  exclusionDate: string;
}

export interface OigEntityRecord {
  name: string;
  exclusionDate: string;
}

export interface SamPersonRecord {
  first: string;
  last: string;
  exclusionDate: string;
  city: string;
  state: string;
  zip: string;
}

export interface SamEntityRecord {
  name: string;
  exclusionDate: string;
  city: string;
  state: string;
  zip: string;
}

export interface ExclusionLookup {
  oigPeopleByLastName(last: string): OigPersonRecord[];
  samPeopleByLastName(last: string): SamPersonRecord[];
  oigEntitiesByName(name: string): OigEntityRecord[];
  samEntitiesByName(name: string): SamEntityRecord[];
  /** every OIG entity, for fuzzy scans */
  allOigEntities(): OigEntityRecord[];
  /** every SAM entity, for fuzzy scans */
  allSamEntities(): SamEntityRecord[];
}
