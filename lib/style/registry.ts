import { StyleAlreadyLockedError } from "../errors";
import { createLogger } from "../logger";
import { createLockedStyleConfig, lockedStyleEquals, lockedStyleRef } from "./lockedStyle";
import type { LockedStyleConfig, LockedStyleParams } from "./types";

const log = createLogger("style-lock");

/**
 * Per-project lock table. Every batch of a project shares the registered
 * config instance; only `relock` may replace it.
 */
export class StyleLockRegistry {
  private readonly locks = new Map<string, LockedStyleConfig>();
  private readonly superseded = new Map<string, LockedStyleConfig[]>();

  get(projectId: string): LockedStyleConfig | null {
    return this.locks.get(projectId) ?? null;
  }

  isLocked(projectId: string) {
    return this.locks.has(projectId);
  }

  lock(projectId: string, params: LockedStyleParams, createdAt?: string): LockedStyleConfig {
    const current = this.locks.get(projectId);
    if (current) {
      throw new StyleAlreadyLockedError(projectId, lockedStyleRef(current));
    }
    const config = createLockedStyleConfig({ ...params, projectId, version: 1, createdAt });
    this.locks.set(projectId, config);
    log.info(`Locked ${lockedStyleRef(config)}`);
    return config;
  }

  /** Explicit caller decision; the orchestrator never relocks on its own. */
  relock(projectId: string, params: LockedStyleParams, createdAt?: string): LockedStyleConfig {
    const current = this.locks.get(projectId);
    const version = current ? current.version + 1 : 1;
    const config = createLockedStyleConfig({ ...params, projectId, version, createdAt });
    if (current) {
      const history = this.superseded.get(projectId) ?? [];
      history.push(current);
      this.superseded.set(projectId, history);
    }
    this.locks.set(projectId, config);
    log.warn(`Relocked ${projectId}: ${current ? lockedStyleRef(current) : "none"} -> ${lockedStyleRef(config)}`);
    return config;
  }

  /**
   * Registers a config loaded from storage. Returns the registered instance when
   * it matches; a stored config that drifted without a relock is rejected.
   */
  adopt(config: LockedStyleConfig): LockedStyleConfig {
    const current = this.locks.get(config.projectId);
    if (!current) {
      this.locks.set(config.projectId, config);
      return config;
    }
    if (lockedStyleEquals(current, config)) return current;
    if (config.version > current.version) {
      // Relocked elsewhere (e.g. through the store) with a new version.
      const history = this.superseded.get(config.projectId) ?? [];
      history.push(current);
      this.superseded.set(config.projectId, history);
      this.locks.set(config.projectId, config);
      return config;
    }
    throw new StyleAlreadyLockedError(
      config.projectId,
      lockedStyleRef(current),
      `Stored style for "${config.projectId}" (${lockedStyleRef(config)}) differs from locked ${lockedStyleRef(current)}`,
    );
  }

  history(projectId: string): LockedStyleConfig[] {
    return [...(this.superseded.get(projectId) ?? [])];
  }
}
