/**
 * Index plan for the run report collection:
 * - unique: { runId: 1 }
 * - listing: { startedAt: -1 }
 */
export const mongoIndexes = {
  runCollection: [
    { keys: { runId: 1 }, options: { unique: true } },
    { keys: { startedAt: -1 }, options: {} }
  ]
} as const;
