import type {
  ExclusionLookup,
  OigEntityRecord,
  OigPersonRecord,
  SamEntityRecord,
  SamPersonRecord,
} from '@exclusion/core';

export interface ExclusionLists {
  oigPeople?: OigPersonRecord[];
  oigEntities?: OigEntityRecord[];
  samPeople?: SamPersonRecord[];
  samEntities?: SamEntityRecord[];
}

/**
 * In-memory ExclusionLookup, for tests and small ad-hoc lists. Records must
 * already be normalized.
 */
export function createMemoryLookup(lists: ExclusionLists): ExclusionLookup {
  const oigPeople = lists.oigPeople ?? [];
  const oigEntities = lists.oigEntities ?? [];
  const samPeople = lists.samPeople ?? [];
  const samEntities = lists.samEntities ?? [];

  return {
    oigPeopleByLastName: (last) => oigPeople.filter((record) => record.last === last),
    samPeopleByLastName: (last) => samPeople.filter((record) => record.last === last),
    oigEntitiesByName: (name) => oigEntities.filter((record) => record.name === name),
    samEntitiesByName: (name) => samEntities.filter((record) => record.name === name),
    allOigEntities: () => oigEntities,
    allSamEntities: () => samEntities,
  };
}
