import fs from "node:fs/promises";
import { hasErrorCode, InvalidParameterError, StyleAlreadyLockedError } from "../errors";
import { createLogger } from "../logger";
import { projectLocksDir, projectStyleDir, styleRecordArchivePath, styleRecordPath } from "../paths";
import { isValidProjectId } from "../style/ids";
import { parseLockedStyleRecord, type LockedStyleRecord } from "../style/record";
import { withFileLock } from "./lock.file";
import type { StyleStore } from "./styleStore";

const log = createLogger("style-store");

const ARCHIVE_RE = /^style-lock\.v(\d+)\.json$/;

function assertProjectId(projectId: string) {
  if (!isValidProjectId(projectId)) {
    throw new InvalidParameterError(`Invalid project id "${projectId}"`, "projectId");
  }
}

export class FileStyleStore implements StyleStore {
  constructor(private readonly rootDir: string) {}

  async getRecord(projectId: string): Promise<LockedStyleRecord | null> {
    assertProjectId(projectId);
    let raw: string;
    try {
      raw = await fs.readFile(styleRecordPath(this.rootDir, projectId), "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return null;
      throw error;
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new InvalidParameterError(`Locked style record for "${projectId}" is not valid JSON`);
    }
    return parseLockedStyleRecord(json);
  }

  async saveRecord(projectId: string, record: LockedStyleRecord): Promise<LockedStyleRecord> {
    assertProjectId(projectId);
    return this.withProjectLock(projectId, async () => {
      const current = await this.getRecord(projectId);
      if (current?.approved) {
        throw new StyleAlreadyLockedError(projectId, `${projectId}@v${current.version}`);
      }
      const next = parseLockedStyleRecord({ ...record, version: current?.version ?? record.version });
      await this.write(projectId, next);
      log.info(`Saved locked style for ${projectId} (v${next.version})`);
      return next;
    });
  }

  async replaceRecord(projectId: string, record: LockedStyleRecord): Promise<LockedStyleRecord> {
    assertProjectId(projectId);
    return this.withProjectLock(projectId, async () => {
      const current = await this.getRecord(projectId);
      if (current) {
        await fs.writeFile(
          styleRecordArchivePath(this.rootDir, projectId, current.version),
          JSON.stringify(current, null, 2),
        );
      }
      const next = parseLockedStyleRecord({ ...record, version: current ? current.version + 1 : 1 });
      await this.write(projectId, next);
      log.warn(`Relocked style for ${projectId}: v${current?.version ?? 0} -> v${next.version}`);
      return next;
    });
  }

  async listVersions(projectId: string): Promise<number[]> {
    assertProjectId(projectId);
    let entries: string[];
    try {
      entries = await fs.readdir(projectStyleDir(this.rootDir, projectId));
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) return [];
      throw error;
    }
    const versions: number[] = [];
    for (const entry of entries) {
      const match = ARCHIVE_RE.exec(entry);
      if (match) versions.push(Number(match[1]));
    }
    const current = await this.getRecord(projectId);
    if (current) versions.push(current.version);
    return versions.sort((a, b) => a - b);
  }

  private async write(projectId: string, record: LockedStyleRecord) {
    await fs.mkdir(projectStyleDir(this.rootDir, projectId), { recursive: true });
    await fs.writeFile(styleRecordPath(this.rootDir, projectId), JSON.stringify(record, null, 2));
  }

  private withProjectLock<T>(projectId: string, fn: () => Promise<T>) {
    return withFileLock(projectLocksDir(this.rootDir, projectId), "style-record", fn);
  }
}
