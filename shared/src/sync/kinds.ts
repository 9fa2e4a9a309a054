// Entity kinds that take part in synchronization.
// Kept in one place so that server and client always agree on names.

export const EntityKind = {
  Trip: 'trip',
  Day: 'day',
  Activity: 'activity',
  BudgetItem: 'budget_item',
  Note: 'note',
} as const;

export type EntityKind = (typeof EntityKind)[keyof typeof EntityKind];

// Array keys used by the sync request and by `server_data` in the response.
export const SyncWireKey = {
  [EntityKind.Trip]: 'trips',
  [EntityKind.Day]: 'days',
  [EntityKind.Activity]: 'activities',
  [EntityKind.BudgetItem]: 'budget_items',
  [EntityKind.Note]: 'notes',
} as const;

export type SyncWireKey = (typeof SyncWireKey)[EntityKind];

// Parents before children.
export const ENTITY_KIND_ORDER: readonly EntityKind[] = [
  EntityKind.Trip,
  EntityKind.Day,
  EntityKind.Activity,
  EntityKind.BudgetItem,
  EntityKind.Note,
];

export const ConflictStrategy = {
  NewerWins: 'newer_wins',
  ClientWins: 'client_wins',
  ServerWins: 'server_wins',
  Merge: 'merge',
} as const;

export type ConflictStrategy = (typeof ConflictStrategy)[keyof typeof ConflictStrategy];

export function isEntityKind(value: unknown): value is EntityKind {
  return typeof value === 'string' && ENTITY_KIND_ORDER.some((kind) => kind === value);
}
