/**
 * Project status reducer
 *
 * Folds project status records into one snapshot per project. A newer
 * snapshot replaces the previous one wholesale, so agents missing from it
 * are no longer available.
 */

import type { SyncRecord } from "../records/record.js";
import { RecordKind } from "../records/kinds.js";
import {
  parseProjectStatus,
  projectStatusPolicy,
  type AgentAvailability,
  type ProjectStatus,
} from "../entities/status.js";
import { EntityStore, type UpsertResult } from "../store/entity-store.js";

export const DEFAULT_STATUS_FRESHNESS_SECONDS = 120;

export interface ProjectStatusReducerOptions {
  /** How long a status keeps its project online */
  freshnessSeconds?: number;
}

export class ProjectStatusReducer {
  readonly store = new EntityStore<ProjectStatus>(projectStatusPolicy, "ProjectStatusReducer");
  private readonly freshnessSeconds: number;

  constructor(options: ProjectStatusReducerOptions = {}) {
    this.freshnessSeconds = options.freshnessSeconds ?? DEFAULT_STATUS_FRESHNESS_SECONDS;
  }

  /**
   * Returns null for other kinds and for statuses without a project reference.
   */
  reduce(record: SyncRecord): UpsertResult<ProjectStatus> | null {
    if (record.kind !== RecordKind.projectStatus) return null;

    const status = parseProjectStatus(record);
    if (status.projectIdentity === "") {
      console.warn(`[ProjectStatusReducer] Ignoring status ${record.id} without project reference`);
      return null;
    }

    return this.store.upsert(status.projectIdentity, status);
  }

  get(projectIdentity: string): ProjectStatus | undefined {
    return this.store.get(projectIdentity);
  }

  isOnline(projectIdentity: string, nowMs: number = Date.now()): boolean {
    const status = this.store.get(projectIdentity);
    if (!status) return false;
    return nowMs / 1000 - status.observedAt < this.freshnessSeconds;
  }

  /** Available agents of an online project; empty when offline */
  onlineAgents(projectIdentity: string, nowMs: number = Date.now()): AgentAvailability[] {
    if (!this.isOnline(projectIdentity, nowMs)) return [];
    return this.store.get(projectIdentity)?.availableAgents ?? [];
  }
}
