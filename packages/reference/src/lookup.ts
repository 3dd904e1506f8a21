import type Database from 'better-sqlite3';
import type {
  ExclusionLookup,
  OigEntityRecord,
  OigPersonRecord,
  SamEntityRecord,
  SamPersonRecord,
} from '@exclusion/core';

/**
 * ExclusionLookup over an open reference cache. The full entity lists used by
 * the fuzzy scans are read once per handle.
 */
export function createExclusionLookup(db: Database.Database): ExclusionLookup {
  const oigPeople = db.prepare<[string], OigPersonRecord>(
    'SELECT first, last, dob, dob_compact AS dobCompact, exclusion_date AS exclusionDate FROM oig_people WHERE last = ? ORDER BY rowid'
  );
  const samPeople = db.prepare<[string], SamPersonRecord>(
    'SELECT first, last, exclusion_date AS exclusionDate, city, state, zip FROM sam_people WHERE last = ? ORDER BY rowid'
  );
  const oigEntityByName = db.prepare<[string], OigEntityRecord>(
    'SELECT name, exclusion_date AS exclusionDate FROM oig_entities WHERE name = ? ORDER BY rowid'
  );
  const samEntityByName = db.prepare<[string], SamEntityRecord>(
    'SELECT name, exclusion_date AS exclusionDate, city, state, zip FROM sam_entities WHERE name = ? ORDER BY rowid'
  );
  const oigEntities = db.prepare<[], OigEntityRecord>(
    'SELECT name, exclusion_date AS exclusionDate FROM oig_entities ORDER BY rowid'
  );
  const samEntities = db.prepare<[], SamEntityRecord>(
    'SELECT name, exclusion_date AS exclusionDate, city, state, zip FROM sam_entities ORDER BY rowid'
  );

  let oigEntityList: OigEntityRecord[] | null = null;
  let samEntityList: SamEntityRecord[] | null = null;

  return {
    oigPeopleByLastName: (last) => oigPeople.all(last),
    samPeopleByLastName: (last) => samPeople.all(last),
    oigEntitiesByName: (name) => oigEntityByName.all(name),
    samEntitiesByName: (name) => samEntityByName.all(name),
    allOigEntities: () => (oigEntityList ??= oigEntities.all()),
    allSamEntities: () => (samEntityList ??= samEntities.all()),
  };
}
