export const TRIP_1 = '11111111-1111-4111-8111-111111111111';
export const DAY_1 = '22222222-2222-4222-8222-111111111111';
export const NOTE_1 = '55555555-5555-4555-8555-111111111111';

export function at(hhmm: string): string {
  return `2024-05-01T${hhmm}:00.000Z`;
}

export function ms(hhmm: string): number {
  return Date.parse(at(hhmm));
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

export function serverData(overrides: Record<string, unknown[]> = {}): Record<string, unknown[]> {
  return { trips: [], days: [], activities: [], budget_items: [], notes: [], ...overrides };
}

export function syncResponse(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    sync_timestamp: at('12:00'),
    trips_uploaded: 0,
    trips_downloaded: 0,
    days_uploaded: 0,
    days_downloaded: 0,
    activities_uploaded: 0,
    activities_downloaded: 0,
    budget_items_uploaded: 0,
    budget_items_downloaded: 0,
    notes_uploaded: 0,
    notes_downloaded: 0,
    conflicts_resolved: 0,
    conflicts: [],
    errors: [],
    server_data: serverData(),
    ...overrides,
  };
}
