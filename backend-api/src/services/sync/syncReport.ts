import {
  ENTITY_KIND_ORDER,
  SyncWireKey,
  formatSyncTimestamp,
  type EntityKind,
  type SyncConflictDto,
  type SyncRecordErrorDto,
  type SyncResponse,
  type SyncServerData,
} from '@tripsync/shared';

export type SyncConflictDescriptor = {
  kind: EntityKind;
  id: string;
  clientUpdatedAt: number;
  serverUpdatedAt: number;
  resolution: 'client_wins' | 'server_wins';
};

export type SyncRecordError = {
  kind: EntityKind;
  id: string | null;
  code: string;
  message: string;
};

export type SyncKindCounts = Record<EntityKind, number>;

/** Outcome of one sync cycle. Purely observational. */
export type SyncReport = {
  uploaded: SyncKindCounts;
  downloaded: SyncKindCounts;
  conflicts: SyncConflictDescriptor[];
  errors: SyncRecordError[];
  newWatermark: number;
};

function zeroCounts(): SyncKindCounts {
  return { trip: 0, day: 0, activity: 0, budget_item: 0, note: 0 };
}

export class SyncReportBuilder {
  private readonly uploaded = zeroCounts();
  private readonly downloaded = zeroCounts();
  private readonly conflicts: SyncConflictDescriptor[] = [];
  private readonly errors: SyncRecordError[] = [];

  noteUpload(kind: EntityKind) {
    this.uploaded[kind] += 1;
  }

  noteDownloads(kind: EntityKind, count: number) {
    this.downloaded[kind] += count;
  }

  noteConflict(conflict: SyncConflictDescriptor) {
    this.conflicts.push(conflict);
  }

  noteError(error: SyncRecordError) {
    this.errors.push(error);
  }

  build(newWatermark: number): SyncReport {
    return {
      uploaded: { ...this.uploaded },
      downloaded: { ...this.downloaded },
      conflicts: [...this.conflicts],
      errors: [...this.errors],
      newWatermark,
    };
  }
}

export function totalOf(counts: SyncKindCounts): number {
  return ENTITY_KIND_ORDER.reduce((sum, kind) => sum + counts[kind], 0);
}

function conflictToDto(c: SyncConflictDescriptor): SyncConflictDto {
  return {
    entity_type: c.kind,
    entity_id: c.id,
    client_updated_at: formatSyncTimestamp(c.clientUpdatedAt),
    server_updated_at: formatSyncTimestamp(c.serverUpdatedAt),
    resolution: c.resolution,
  };
}

function errorToDto(e: SyncRecordError): SyncRecordErrorDto {
  return { entity_type: e.kind, entity_id: e.id, code: e.code, message: e.message };
}

/** Wire response of `POST /api/sync`. */
export function toSyncResponse(report: SyncReport, serverData: SyncServerData): SyncResponse {
  return {
    sync_timestamp: formatSyncTimestamp(report.newWatermark),
    trips_uploaded: report.uploaded.trip,
    trips_downloaded: report.downloaded.trip,
    days_uploaded: report.uploaded.day,
    days_downloaded: report.downloaded.day,
    activities_uploaded: report.uploaded.activity,
    activities_downloaded: report.downloaded.activity,
    budget_items_uploaded: report.uploaded.budget_item,
    budget_items_downloaded: report.downloaded.budget_item,
    notes_uploaded: report.uploaded.note,
    notes_downloaded: report.downloaded.note,
    conflicts_resolved: report.conflicts.length,
    conflicts: report.conflicts.map(conflictToDto),
    errors: report.errors.map(errorToDto),
    server_data: serverData,
  };
}

/** One-line summary for the cycle log. */
export function summarizeReport(report: SyncReport): Record<string, unknown> {
  const perKind: Record<string, string> = {};
  for (const kind of ENTITY_KIND_ORDER) {
    const up = report.uploaded[kind];
    const down = report.downloaded[kind];
    if (up > 0 || down > 0) perKind[SyncWireKey[kind]] = `${up}/${down}`;
  }
  return {
    uploaded: totalOf(report.uploaded),
    downloaded: totalOf(report.downloaded),
    conflicts: report.conflicts.length,
    errors: report.errors.length,
    per_kind: perKind,
    watermark: formatSyncTimestamp(report.newWatermark),
  };
}
