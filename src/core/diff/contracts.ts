import type { ChangeSet } from "../types.js";

export interface DiffProvider {
  getChangeSet(repoRef: string, base: string, head: string, signal?: AbortSignal): Promise<ChangeSet>;
}

export function freezeChangeSet(changeSet: ChangeSet): ChangeSet {
  for (const file of changeSet.files) {
    for (const hunk of file.hunks) Object.freeze(hunk);
    Object.freeze(file.hunks);
    Object.freeze(file);
  }
  Object.freeze(changeSet.files);
  Object.freeze(changeSet.metadata.commitSubjects);
  Object.freeze(changeSet.metadata);
  return Object.freeze(changeSet);
}

export function fileInventory(changeSet: ChangeSet): Set<string> {
  return new Set(changeSet.files.map((file) => file.path));
}
