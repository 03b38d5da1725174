/**
 * aggregator.ts — Shared progress state for concurrent merges
 *
 * PURPOSE:
 *   Every running merge job reports into one ProgressAggregator; the
 *   reporter loop reads it on a timer. The aggregator knows nothing about
 *   merging, only files, bytes and status text per group.
 *
 * CONSISTENCY:
 *   Mutations and the overall recomputation happen inside one synchronous
 *   method call. Node runs them to completion before any other task resumes,
 *   so no reader can observe a group total that the overall totals do not
 *   include yet. snapshot() hands out copies; callers never hold live state.
 *
 * DERIVED METRICS (computed on read, never stored):
 *   percentage  processed files / total files, 0 when total is 0, capped at 100
 *   elapsed     now − start, 0 before the group's first update
 *   throughput  processed bytes / elapsed seconds, 0 when elapsed is 0
 *   eta         elapsed × (100 − percentage) / percentage, 0 when percentage is 0
 */

export interface ProgressSink {
  updateGroup(
    id: string,
    currentFileIndex: number,
    currentFileName: string,
    processedBytes: number,
    statusText: string
  ): boolean;
}

interface GroupState {
  id: string;
  label: string;
  currentFile: number;
  totalFiles: number;
  currentFileName: string;
  processedBytes: number;
  totalBytes: number;
  status: string;
  /** Epoch ms of the first update, null while the group is still queued. */
  startedAt: number | null;
}

interface Totals {
  currentFile: number;
  totalFiles: number;
  processedBytes: number;
  totalBytes: number;
  activeGroups: number;
  startedAt: number | null;
}

export interface ProgressMetrics {
  percentage: number;
  elapsedSec: number;
  etaSec: number;
  throughputBytesPerSec: number;
}

export type GroupSnapshot = Readonly<GroupState> & ProgressMetrics;

export interface OverallSnapshot extends ProgressMetrics {
  currentFile: number;
  totalFiles: number;
  processedBytes: number;
  totalBytes: number;
  groupCount: number;
  activeGroups: number;
  status: string;
}

export interface ProgressSnapshot {
  takenAt: number;
  groups: GroupSnapshot[];
  overall: OverallSnapshot;
}

export function computeMetrics(
  current: number,
  total: number,
  processedBytes: number,
  startedAt: number | null,
  now: number
): ProgressMetrics {
  const percentage = total > 0 ? Math.min(100, (current / total) * 100) : 0;
  const elapsedSec = startedAt === null ? 0 : Math.max(0, (now - startedAt) / 1000);
  const throughputBytesPerSec = elapsedSec > 0 ? processedBytes / elapsedSec : 0;
  const etaSec = percentage > 0 ? (elapsedSec * (100 - percentage)) / percentage : 0;
  return { percentage, elapsedSec, etaSec, throughputBytesPerSec };
}

const EMPTY_TOTALS: Totals = {
  currentFile: 0,
  totalFiles: 0,
  processedBytes: 0,
  totalBytes: 0,
  activeGroups: 0,
  startedAt: null,
};

export class ProgressAggregator implements ProgressSink {
  private readonly groups = new Map<string, GroupState>();
  private overall: Totals = EMPTY_TOTALS;

  constructor(private readonly now: () => number = Date.now) {}

  registerGroup(id: string, totalFiles: number, totalBytes: number, label = id): void {
    this.groups.set(id, {
      id,
      label,
      currentFile: 0,
      totalFiles,
      currentFileName: "",
      processedBytes: 0,
      totalBytes,
      status: `${label} waiting`,
      startedAt: null,
    });
    this.recompute();
  }

  /**
   * Returns false (and changes nothing) for an unregistered id.
   */
  updateGroup(
    id: string,
    currentFileIndex: number,
    currentFileName: string,
    processedBytes: number,
    statusText: string
  ): boolean {
    const group = this.groups.get(id);
    if (!group) return false;

    group.currentFile = currentFileIndex;
    group.currentFileName = currentFileName;
    group.processedBytes = processedBytes;
    group.status = statusText;
    if (group.startedAt === null) group.startedAt = this.now();
    this.recompute();
    return true;
  }

  snapshot(): ProgressSnapshot {
    const now = this.now();
    const groups = [...this.groups.values()].map(
      (group): GroupSnapshot => ({
        ...group,
        ...computeMetrics(
          group.currentFile,
          group.totalFiles,
          group.processedBytes,
          group.startedAt,
          now
        ),
      })
    );

    const totals = this.overall;
    return {
      takenAt: now,
      groups,
      overall: {
        currentFile: totals.currentFile,
        totalFiles: totals.totalFiles,
        processedBytes: totals.processedBytes,
        totalBytes: totals.totalBytes,
        groupCount: groups.length,
        activeGroups: totals.activeGroups,
        status: `Processing (${totals.activeGroups}/${groups.length} groups)`,
        ...computeMetrics(
          totals.currentFile,
          totals.totalFiles,
          totals.processedBytes,
          totals.startedAt,
          now
        ),
      },
    };
  }

  private recompute(): void {
    const totals: Totals = { ...EMPTY_TOTALS };
    for (const group of this.groups.values()) {
      totals.currentFile += group.currentFile;
      totals.totalFiles += group.totalFiles;
      totals.processedBytes += group.processedBytes;
      totals.totalBytes += group.totalBytes;
      if (group.currentFile > 0) totals.activeGroups++;
      if (group.startedAt !== null) {
        totals.startedAt =
          totals.startedAt === null ? group.startedAt : Math.min(totals.startedAt, group.startedAt);
      }
    }
    this.overall = totals;
  }
}
