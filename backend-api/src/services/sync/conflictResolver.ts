import { ConflictStrategy } from '@tripsync/shared';

type Resolvable = {
  id: string;
  local_updated_at: number;
};

export type ConflictWinner = 'client' | 'server';

export type ConflictResolution<R extends Resolvable> = {
  winner: ConflictWinner;
  /** The record to persist. Its `local_updated_at` is the timestamp to store. */
  record: R;
};

function newerWins<R extends Resolvable>(client: R, server: R): ConflictResolution<R> {
  // Equal timestamps go to the server so racing devices cannot flap.
  if (client.local_updated_at > server.local_updated_at) return { winner: 'client', record: client };
  return { winner: 'server', record: server };
}

/**
 * Picks the winning version of a record present on both sides with differing content.
 *
 * Pure: no I/O, inputs are never mutated. Tombstones get no special treatment, so a
 * live client edit that wins over a server tombstone resurrects the record.
 */
export function resolveConflict<R extends Resolvable>(
  client: R,
  server: R,
  strategy: ConflictStrategy,
): ConflictResolution<R> {
  switch (strategy) {
    case ConflictStrategy.ServerWins:
      return { winner: 'server', record: server };
    case ConflictStrategy.ClientWins:
      // Identity never changes on resolution.
      return { winner: 'client', record: { ...client, id: server.id } };
    case ConflictStrategy.NewerWins:
      return newerWins(client, server);
    case ConflictStrategy.Merge:
      // Whole-record merge: same outcome as newer_wins; the winner already carries the later instant.
      return newerWins(client, server);
  }
}
