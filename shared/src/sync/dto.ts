import { z } from 'zod';

import { ConflictStrategy } from './kinds.js';
import { parseSyncTimestamp } from './timestamps.js';

export const syncTimestampSchema = z.string().transform((value, ctx) => {
  const ms = parseSyncTimestamp(value);
  if (ms === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unparseable timestamp: ${value}` });
    return z.NEVER;
  }
  return ms;
});

// Sync fields shared by every entity kind.
export const baseSyncFields = {
  id: z.string().uuid(),
  local_updated_at: syncTimestampSchema,
  is_deleted: z.boolean().default(false),
} as const;

const optionalText = (max?: number) => (max ? z.string().max(max) : z.string()).nullable().default(null);

export const tripRowSchema = z.object({
  ...baseSyncFields,
  title: z.string().min(1).max(255),
  destination: z.string().max(255).default(''),
  start_date: optionalText(50),
  end_date: optionalText(50),
  budget: z.number().nonnegative().nullable().default(null),
  preferences: z.record(z.unknown()).nullable().default(null),
  is_generated: z.boolean().default(false),
});

export const dayRowSchema = z.object({
  ...baseSyncFields,
  trip_id: z.string().uuid(),
  day_number: z.number().int().positive(),
  date: optionalText(50),
  title: optionalText(255),
});

export const activityRowSchema = z.object({
  ...baseSyncFields,
  day_id: z.string().uuid(),
  time: optionalText(50),
  title: z.string().min(1).max(255),
  description: optionalText(),
  location: optionalText(255),
  estimated_cost: z.number().nonnegative().nullable().default(null),
  notes: optionalText(),
  is_completed: z.boolean().default(false),
});

// Budget items and notes hang off either a trip or a single day, never both.
const tripOrDayParent = {
  trip_id: z.string().uuid().nullable().default(null),
  day_id: z.string().uuid().nullable().default(null),
} as const;

function exactlyOneParent(row: { trip_id: string | null; day_id: string | null }, ctx: z.RefinementCtx) {
  const set = (row.trip_id === null ? 0 : 1) + (row.day_id === null ? 0 : 1);
  if (set !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['trip_id'],
      message: 'exactly one of trip_id or day_id must be set',
    });
  }
}

export const budgetItemRowSchema = z
  .object({
    ...baseSyncFields,
    ...tripOrDayParent,
    category: z.string().min(1).max(100),
    amount: z.number(),
    note: optionalText(),
  })
  .superRefine(exactlyOneParent);

export const noteRowSchema = z
  .object({
    ...baseSyncFields,
    ...tripOrDayParent,
    content: z.string(),
  })
  .superRefine(exactlyOneParent);

export type TripRow = z.output<typeof tripRowSchema>;
export type DayRow = z.output<typeof dayRowSchema>;
export type ActivityRow = z.output<typeof activityRowSchema>;
export type BudgetItemRow = z.output<typeof budgetItemRowSchema>;
export type NoteRow = z.output<typeof noteRowSchema>;

export type SyncRowByKind = {
  trip: TripRow;
  day: DayRow;
  activity: ActivityRow;
  budget_item: BudgetItemRow;
  note: NoteRow;
};

/** Wire form of a row: identical to the internal row except for the ISO timestamp. */
export type WireRow<R> = Omit<R, 'local_updated_at'> & { local_updated_at: string };

export const conflictStrategySchema = z.nativeEnum(ConflictStrategy);

// Record arrays stay `unknown` here: the engine validates each record on its own
// so that one malformed record never rejects the whole batch.
export const syncRequestSchema = z.object({
  last_sync_at: syncTimestampSchema.nullable().default(null),
  conflict_resolution: conflictStrategySchema.default(ConflictStrategy.NewerWins),
  trips: z.array(z.unknown()).default([]),
  days: z.array(z.unknown()).default([]),
  activities: z.array(z.unknown()).default([]),
  budget_items: z.array(z.unknown()).default([]),
  notes: z.array(z.unknown()).default([]),
});

export type SyncRequest = z.output<typeof syncRequestSchema>;
export type SyncRequestBody = z.input<typeof syncRequestSchema>;

export type SyncConflictDto = {
  entity_type: string;
  entity_id: string;
  client_updated_at: string;
  server_updated_at: string;
  resolution: 'client_wins' | 'server_wins';
};

export type SyncRecordErrorDto = {
  entity_type: string;
  entity_id: string | null;
  code: string;
  message: string;
};

export type SyncServerData = {
  trips: WireRow<TripRow>[];
  days: WireRow<DayRow>[];
  activities: WireRow<ActivityRow>[];
  budget_items: WireRow<BudgetItemRow>[];
  notes: WireRow<NoteRow>[];
};

export type SyncResponse = {
  sync_timestamp: string;
  trips_uploaded: number;
  trips_downloaded: number;
  days_uploaded: number;
  days_downloaded: number;
  activities_uploaded: number;
  activities_downloaded: number;
  budget_items_uploaded: number;
  budget_items_downloaded: number;
  notes_uploaded: number;
  notes_downloaded: number;
  conflicts_resolved: number;
  conflicts: SyncConflictDto[];
  errors: SyncRecordErrorDto[];
  server_data: SyncServerData;
};

// Client-side view of the response. Server rows stay `unknown` until the client
// validates each one against its kind, like the server does for uploads.
const responseCount = z.number().int().nonnegative();

export const syncResponseSchema = z.object({
  sync_timestamp: syncTimestampSchema,
  trips_uploaded: responseCount,
  trips_downloaded: responseCount,
  days_uploaded: responseCount,
  days_downloaded: responseCount,
  activities_uploaded: responseCount,
  activities_downloaded: responseCount,
  budget_items_uploaded: responseCount,
  budget_items_downloaded: responseCount,
  notes_uploaded: responseCount,
  notes_downloaded: responseCount,
  conflicts_resolved: responseCount,
  conflicts: z
    .array(
      z.object({
        entity_type: z.string(),
        entity_id: z.string(),
        client_updated_at: z.string(),
        server_updated_at: z.string(),
        resolution: z.enum(['client_wins', 'server_wins']),
      }),
    )
    .default([]),
  errors: z
    .array(
      z.object({
        entity_type: z.string(),
        entity_id: z.string().nullable(),
        code: z.string(),
        message: z.string(),
      }),
    )
    .default([]),
  server_data: z.object({
    trips: z.array(z.unknown()).default([]),
    days: z.array(z.unknown()).default([]),
    activities: z.array(z.unknown()).default([]),
    budget_items: z.array(z.unknown()).default([]),
    notes: z.array(z.unknown()).default([]),
  }),
});

export type SyncResponseEnvelope = z.output<typeof syncResponseSchema>;
