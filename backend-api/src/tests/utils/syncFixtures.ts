import { EntityKind } from '@tripsync/shared';

import type { SyncChangeBatch } from '../../services/sync/syncEngine.js';

export const USER_A = 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa';
export const USER_B = 'bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb';

export const TRIP_1 = '11111111-1111-4111-8111-111111111111';
export const TRIP_2 = '11111111-1111-4111-8111-222222222222';
export const DAY_1 = '22222222-2222-4222-8222-111111111111';
export const ACTIVITY_1 = '33333333-3333-4333-8333-111111111111';
export const BUDGET_1 = '44444444-4444-4444-8444-111111111111';
export const NOTE_1 = '55555555-5555-4555-8555-111111111111';
export const MISSING_ID = '99999999-9999-4999-8999-999999999999';

export function at(hhmm: string): string {
  return `2024-05-01T${hhmm}:00.000Z`;
}

export function ms(hhmm: string): number {
  return Date.parse(at(hhmm));
}

export function emptyChanges(overrides: Partial<SyncChangeBatch> = {}): SyncChangeBatch {
  return {
    [EntityKind.Trip]: [],
    [EntityKind.Day]: [],
    [EntityKind.Activity]: [],
    [EntityKind.BudgetItem]: [],
    [EntityKind.Note]: [],
    ...overrides,
  };
}

export function tripWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: TRIP_1,
    local_updated_at: at('10:00'),
    is_deleted: false,
    title: 'Paris Trip',
    destination: 'Paris, France',
    start_date: '2024-06-01',
    end_date: '2024-06-05',
    budget: 1500,
    preferences: null,
    is_generated: false,
    ...overrides,
  };
}

export function dayWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: DAY_1,
    local_updated_at: at('10:00'),
    is_deleted: false,
    trip_id: TRIP_1,
    day_number: 1,
    date: '2024-06-01',
    title: 'Arrival',
    ...overrides,
  };
}

export function activityWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: ACTIVITY_1,
    local_updated_at: at('11:00'),
    is_deleted: false,
    day_id: DAY_1,
    time: '09:00',
    title: 'Louvre',
    description: 'Morning visit',
    location: 'Rue de Rivoli',
    estimated_cost: 22,
    notes: null,
    is_completed: false,
    ...overrides,
  };
}

export function budgetItemWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: BUDGET_1,
    local_updated_at: at('10:00'),
    is_deleted: false,
    trip_id: TRIP_1,
    day_id: null,
    category: 'Accommodation',
    amount: 500,
    note: null,
    ...overrides,
  };
}

export function noteWire(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: NOTE_1,
    local_updated_at: at('10:00'),
    is_deleted: false,
    trip_id: null,
    day_id: DAY_1,
    content: 'Bring the museum pass',
    ...overrides,
  };
}
