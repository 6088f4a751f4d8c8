import type { LockedStyleRecord } from "../style/record";

export interface StyleStore {
  getRecord(projectId: string): Promise<LockedStyleRecord | null>;
  /** Writes a first record; fails with StyleAlreadyLockedError when an approved one exists. */
  saveRecord(projectId: string, record: LockedStyleRecord): Promise<LockedStyleRecord>;
  /** Archives the current record and writes `record` with the next version. */
  replaceRecord(projectId: string, record: LockedStyleRecord): Promise<LockedStyleRecord>;
  listVersions(projectId: string): Promise<number[]>;
}
