import { PlatformService } from './platform.js';
import { createPromptHub, type PromptHub } from './prompts.js';
import type {
  AnnotationQueue,
  AnnotationQueueCreate,
  Dataset,
  DatasetCreate,
  Example,
  ExampleCreate,
  ExampleSplit,
  Experiment,
  ExperimentCreate,
  JsonObject,
  MigrationConfig,
  Rule,
  RuleCreate,
  Run,
  RunCreate,
  RunQuery,
  RunQueryResponse,
} from '../types/platform.js';
import {
  DATASET_MIGRATION_MODES,
  QUEUE_MIGRATION_MODES,
  isDatasetMigrationMode,
  isQueueMigrationMode,
  type DatasetMigrationMode,
  type IdMapping,
  type QueueMigrationMode,
} from '../types/mapping.js';
import { AmbiguousNameError, BulkCreateMismatchError, InvalidMigrationModeError, MigrationError } from '../errors.js';

export const DEFAULT_SPLIT = 'base';

export interface PlatformInstance {
  api: PlatformService;
  prompts: PromptHub;
}

export interface MigrationLogger {
  log(message: string): void;
}

interface NamedEntity {
  id: string;
  name: string;
}

// Any dataset_split that is neither a string nor a string array, null included, becomes the base split
export function exampleSplit(metadata: JsonObject | null): ExampleSplit {
  if (metadata && 'dataset_split' in metadata) {
    const split = metadata.dataset_split;
    if (typeof split === 'string') {
      return split;
    }
    if (Array.isArray(split) && split.every((value): value is string => typeof value === 'string')) {
      return split;
    }
  }
  return DEFAULT_SPLIT;
}

export function toDatasetCreate(dataset: Dataset): DatasetCreate {
  return {
    name: dataset.name,
    description: dataset.description,
    created_at: dataset.created_at,
    inputs_schema_definition: dataset.inputs_schema_definition,
    outputs_schema_definition: dataset.outputs_schema_definition,
    externally_managed: dataset.externally_managed,
    transformations: dataset.transformations ?? [],
    data_type: dataset.data_type,
  };
}

export function toExampleCreate(example: Example, newDatasetId: string): ExampleCreate {
  return {
    dataset_id: newDatasetId,
    inputs: example.inputs,
    outputs: example.outputs,
    metadata: example.metadata,
    created_at: example.created_at,
    split: exampleSplit(example.metadata),
  };
}

export function toRunCreate(run: Run, experimentIds: IdMapping, exampleIds: IdMapping): RunCreate {
  const sessionId = experimentIds.get(run.session_id);
  if (!sessionId) {
    throw new MigrationError(`Run ${run.id} belongs to experiment ${run.session_id}, which was not migrated`);
  }

  return {
    name: run.name,
    inputs: run.inputs,
    run_type: run.run_type,
    start_time: run.start_time,
    end_time: run.end_time,
    extra: run.extra,
    error: run.error ?? null,
    serialized: run.serialized ?? {},
    outputs: run.outputs,
    parent_run_id: run.parent_run_id ?? null,
    events: run.events ?? [],
    tags: run.tags ?? [],
    // Run identity is kept so the trace tree stays intact
    trace_id: run.trace_id,
    id: run.id,
    dotted_order: run.dotted_order,
    session_id: sessionId,
    session_name: run.session_name ?? null,
    reference_example_id: run.reference_example_id ? exampleIds.get(run.reference_example_id) ?? null : null,
    input_attachments: run.input_attachments ?? {},
    output_attachments: run.output_attachments ?? {},
  };
}

export class Migrator {
  constructor(
    private source: PlatformInstance,
    private destination: PlatformInstance,
    private logger: MigrationLogger = console
  ) {}

  static fromConfig(config: MigrationConfig, logger?: MigrationLogger): Migrator {
    return new Migrator(
      { api: new PlatformService(config.source, 'source'), prompts: createPromptHub(config.source) },
      { api: new PlatformService(config.destination, 'destination'), prompts: createPromptHub(config.destination) },
      logger
    );
  }

  /**
   * Migrate a dataset, and depending on the mode its examples and experiments.
   * Returns the destination dataset ID. With `checkIfAlreadyExists`, a destination
   * dataset of the same name is reused and nothing else is copied.
   */
  async migrateDataset(
    originalDatasetId: string,
    checkIfAlreadyExists: boolean = true,
    migrationMode: DatasetMigrationMode = 'EXAMPLES'
  ): Promise<string> {
    if (!isDatasetMigrationMode(migrationMode)) {
      throw new InvalidMigrationModeError(migrationMode, DATASET_MIGRATION_MODES);
    }

    const originalDataset = await this.source.api.getDataset(originalDatasetId);

    if (checkIfAlreadyExists) {
      const existing = await this.findExisting('dataset', originalDataset.name, name =>
        this.destination.api.findDatasetsByName(name)
      );
      if (existing) {
        this.logger.log(`↺ Dataset "${existing.name}" already exists (${existing.id})`);
        return existing.id;
      }
    }

    const newDataset = await this.destination.api.createDataset(toDatasetCreate(originalDataset));
    this.logger.log(`✓ Created dataset "${newDataset.name}" (${newDataset.id})`);

    switch (migrationMode) {
      case 'EXAMPLES':
        await this.migrateDatasetExamples(originalDatasetId, newDataset.id);
        break;
      case 'EXAMPLES_AND_EXPERIMENTS': {
        const exampleIds = await this.migrateDatasetExamples(originalDatasetId, newDataset.id);
        await this.migrateDatasetExperiments(originalDatasetId, newDataset.id, exampleIds);
        break;
      }
      case 'DATASET_ONLY':
        break;
    }

    return newDataset.id;
  }

  /**
   * Copy every example of the source dataset into the destination dataset with one
   * bulk request. The destination returns created examples in submission order, so
   * IDs are mapped by position.
   */
  async migrateDatasetExamples(originalDatasetId: string, newDatasetId: string): Promise<IdMapping> {
    const originalExamples = await this.source.api.listExamples(originalDatasetId);
    const mapping: IdMapping = new Map();
    if (originalExamples.length === 0) {
      return mapping;
    }

    const newExamples = await this.destination.api.createExamples(
      originalExamples.map(example => toExampleCreate(example, newDatasetId))
    );
    if (newExamples.length !== originalExamples.length) {
      throw new BulkCreateMismatchError('example', originalExamples.length, newExamples.length);
    }

    originalExamples.forEach((example, index) => {
      mapping.set(example.id, newExamples[index].id);
    });
    this.logger.log(`✓ Migrated ${mapping.size} examples into dataset ${newDatasetId}`);
    return mapping;
  }

  async migrateDatasetExperiments(
    originalDatasetId: string,
    newDatasetId: string,
    originalToNewExampleIds: IdMapping
  ): Promise<IdMapping> {
    const experiments = await this.source.api.listExperiments(originalDatasetId);
    const experimentIds: IdMapping = new Map();

    for (const experiment of experiments) {
      const newExperiment = await this.destination.api.createExperiment(toExperimentCreate(experiment, newDatasetId));
      experimentIds.set(experiment.id, newExperiment.id);
      this.logger.log(`✓ Created experiment "${experiment.name}" (${newExperiment.id})`);
    }

    if (experiments.length === 0) {
      return experimentIds;
    }

    // Runs of all experiments come back in cursor-paginated pages; each page is
    // written before the next one is requested.
    const query: RunQuery = {
      session: experiments.map(experiment => experiment.id),
      skip_pagination: false,
    };
    let cursor: string | null = null;
    do {
      const page: RunQueryResponse = await this.source.api.queryRuns(cursor === null ? query : { ...query, cursor });
      const runs = page.runs.map(run => toRunCreate(run, experimentIds, originalToNewExampleIds));
      if (runs.length > 0) {
        await this.destination.api.createRuns(runs);
        this.logger.log(`✓ Migrated ${runs.length} runs`);
      }
      cursor = page.cursors.next ?? null;
    } while (cursor !== null);

    return experimentIds;
  }

  async migrateAnnotationQueue(
    oldAnnotationQueueId: string,
    checkIfAlreadyExists: boolean = true,
    migrationMode: QueueMigrationMode = 'QUEUE_AND_DATASET'
  ): Promise<string> {
    if (!isQueueMigrationMode(migrationMode)) {
      throw new InvalidMigrationModeError(migrationMode, QUEUE_MIGRATION_MODES);
    }

    const originalQueue = await this.source.api.getAnnotationQueue(oldAnnotationQueueId);

    if (checkIfAlreadyExists) {
      const existing = await this.findExisting('annotation queue', originalQueue.name, name =>
        this.destination.api.findAnnotationQueuesByName(name)
      );
      if (existing) {
        this.logger.log(`↺ Annotation queue "${existing.name}" already exists (${existing.id})`);
        return existing.id;
      }
    }

    // The queue's default dataset comes over with its examples, never its experiments
    let defaultDataset: string | null = null;
    if (migrationMode === 'QUEUE_AND_DATASET' && originalQueue.default_dataset != null) {
      defaultDataset = await this.migrateDataset(originalQueue.default_dataset, true, 'EXAMPLES');
    }

    const newQueue = await this.destination.api.createAnnotationQueue(toAnnotationQueueCreate(originalQueue, defaultDataset));
    this.logger.log(`✓ Created annotation queue "${newQueue.name}" (${newQueue.id})`);
    return newQueue.id;
  }

  /**
   * Recreate the automation rules of a project on the destination project. Datasets
   * and annotation queues the rules feed into are migrated first.
   * Returns the IDs of the created rules.
   */
  async migrateProjectRules(oldProjectId: string, newProjectId: string): Promise<string[]> {
    const oldRules = await this.source.api.listRules(oldProjectId);
    const newRuleIds: string[] = [];

    for (const oldRule of oldRules) {
      // Project rules never carry a dataset_id; those that do belong to a dataset
      if (oldRule.dataset_id != null) {
        this.logger.log(`- Skipping rule "${oldRule.display_name}" attached to dataset ${oldRule.dataset_id}`);
        continue;
      }

      let addToDatasetId: string | null = null;
      if (oldRule.add_to_dataset_id != null) {
        addToDatasetId = await this.migrateDataset(oldRule.add_to_dataset_id, true, 'EXAMPLES');
      }

      let addToAnnotationQueueId: string | null = null;
      if (oldRule.add_to_annotation_queue_id != null) {
        addToAnnotationQueueId = await this.migrateAnnotationQueue(
          oldRule.add_to_annotation_queue_id,
          true,
          'QUEUE_AND_DATASET'
        );
      }

      const newRule = await this.destination.api.createRule(
        toRuleCreate(oldRule, newProjectId, addToDatasetId, addToAnnotationQueueId)
      );
      newRuleIds.push(newRule.id);
      this.logger.log(`✓ Created rule "${oldRule.display_name}" (${newRule.id})`);
    }

    return newRuleIds;
  }

  /** Copy the latest commit of a prompt, model configuration included, under the same identifier. */
  async migratePrompt(originalPromptId: string): Promise<string> {
    const promptCommit = await this.source.prompts.pullPromptCommit(originalPromptId, { includeModel: true });
    const url = await this.destination.prompts.pushPrompt(originalPromptId, { object: promptCommit.manifest });
    this.logger.log(`✓ Pushed prompt "${originalPromptId}"`);
    return url;
  }

  private async findExisting<T extends NamedEntity>(
    resource: string,
    name: string,
    lookup: (name: string) => Promise<T[]>
  ): Promise<T | null> {
    const matches = await lookup(name);
    if (matches.length > 1) {
      throw new AmbiguousNameError(resource, name, matches.length);
    }
    return matches.length === 1 ? matches[0] : null;
  }
}

export function toExperimentCreate(experiment: Experiment, newDatasetId: string): ExperimentCreate {
  return {
    name: experiment.name,
    description: experiment.description,
    reference_dataset_id: newDatasetId,
    // Copied as-is; it still points into the source instance
    default_dataset_id: experiment.default_dataset_id,
    start_time: experiment.start_time,
    end_time: experiment.end_time,
    extra: experiment.extra,
    trace_tier: experiment.trace_tier ?? null,
  };
}

export function toAnnotationQueueCreate(queue: AnnotationQueue, defaultDataset: string | null): AnnotationQueueCreate {
  return {
    name: queue.name,
    description: queue.description,
    created_at: queue.created_at,
    updated_at: queue.updated_at,
    default_dataset: defaultDataset,
    num_reviewers_per_item: queue.num_reviewers_per_item,
    enable_reservations: queue.enable_reservations,
    reservation_minutes: queue.reservation_minutes,
    rubric_items: queue.rubric_items,
    rubric_instructions: queue.rubric_instructions,
    session_ids: [],
  };
}

export function toRuleCreate(
  rule: Rule,
  newProjectId: string,
  addToDatasetId: string | null,
  addToAnnotationQueueId: string | null
): RuleCreate {
  return {
    display_name: rule.display_name,
    session_id: newProjectId,
    is_enabled: rule.is_enabled,
    dataset_id: null,
    sampling_rate: rule.sampling_rate,
    filter: rule.filter,
    trace_filter: rule.trace_filter,
    tree_filter: rule.tree_filter,
    add_to_annotation_queue_id: addToAnnotationQueueId,
    add_to_dataset_id: addToDatasetId,
    add_to_dataset_prefer_correction: rule.add_to_dataset_prefer_correction,
    use_corrections_dataset: rule.use_corrections_dataset,
    num_few_shot_examples: rule.num_few_shot_examples,
    extend_only: rule.extend_only,
    transient: rule.transient,
    backfill_from: rule.backfill_from,
    evaluators: rule.evaluators,
    code_evaluators: rule.code_evaluators,
    alerts: rule.alerts,
    webhooks: rule.webhooks,
  };
}
