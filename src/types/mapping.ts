export type IdMapping = Map<string, string>;  // source ID -> destination ID

export const DATASET_MIGRATION_MODES = ['EXAMPLES', 'EXAMPLES_AND_EXPERIMENTS', 'DATASET_ONLY'] as const;
export type DatasetMigrationMode = (typeof DATASET_MIGRATION_MODES)[number];

export const QUEUE_MIGRATION_MODES = ['QUEUE_AND_DATASET', 'QUEUE_ONLY'] as const;
export type QueueMigrationMode = (typeof QUEUE_MIGRATION_MODES)[number];

export function isDatasetMigrationMode(value: string): value is DatasetMigrationMode {
  return DATASET_MIGRATION_MODES.some(mode => mode === value);
}

export function isQueueMigrationMode(value: string): value is QueueMigrationMode {
  return QUEUE_MIGRATION_MODES.some(mode => mode === value);
}
