export type JsonObject = Record<string, unknown>;

export interface DatasetTransformation {
  path: string[];
  transformation_type: string;
}

export interface Dataset {
  id: string;
  name: string;
  description: string | null;
  created_at: string;
  inputs_schema_definition: JsonObject | null;
  outputs_schema_definition: JsonObject | null;
  externally_managed: boolean | null;
  transformations: DatasetTransformation[] | null;
  data_type: string | null;
}

export interface DatasetCreate extends Omit<Dataset, 'id' | 'transformations'> {
  transformations: DatasetTransformation[];
}

export interface Example {
  id: string;
  dataset_id: string;
  inputs: JsonObject;
  outputs: JsonObject | null;
  metadata: JsonObject | null;
  created_at: string;
}

export type ExampleSplit = string | string[];

export interface ExampleCreate {
  dataset_id: string;
  inputs: JsonObject;
  outputs: JsonObject | null;
  metadata: JsonObject | null;
  created_at: string;
  split: ExampleSplit;
}

// Experiments are tracer sessions that reference a dataset
export interface Experiment {
  id: string;
  name: string;
  description: string | null;
  reference_dataset_id: string | null;
  default_dataset_id: string | null;
  start_time: string;
  end_time: string | null;
  extra: JsonObject | null;
  trace_tier?: string | null;
}

export type ExperimentCreate = Omit<Experiment, 'id' | 'trace_tier'> & {
  trace_tier: string | null;
};

export interface Run {
  id: string;
  name: string;
  run_type: string;
  inputs: JsonObject;
  outputs: JsonObject | null;
  start_time: string;
  end_time: string | null;
  extra: JsonObject | null;
  error?: string | null;
  serialized?: JsonObject | null;
  parent_run_id?: string | null;
  events?: JsonObject[] | null;
  tags?: string[] | null;
  trace_id: string;
  dotted_order: string;
  session_id: string;
  session_name?: string | null;
  reference_example_id?: string | null;
  input_attachments?: JsonObject | null;
  output_attachments?: JsonObject | null;
}

export interface RunCreate {
  id: string;
  name: string;
  run_type: string;
  inputs: JsonObject;
  outputs: JsonObject | null;
  start_time: string;
  end_time: string | null;
  extra: JsonObject | null;
  error: string | null;
  serialized: JsonObject;
  parent_run_id: string | null;
  events: JsonObject[];
  tags: string[];
  trace_id: string;
  dotted_order: string;
  session_id: string;
  session_name: string | null;
  reference_example_id: string | null;
  input_attachments: JsonObject;
  output_attachments: JsonObject;
}

export interface RunQuery {
  session: string[];
  skip_pagination: boolean;
  cursor?: string;
}

export interface RunQueryResponse {
  runs: Run[];
  cursors: {
    next?: string | null;
    prev?: string | null;
  };
}

export interface RubricItem {
  feedback_key: string;
  description?: string | null;
  value_descriptions?: Record<string, string> | null;
  score_descriptions?: Record<string, string> | null;
}

export interface AnnotationQueue {
  id: string;
  name: string;
  description: string | null;
  created_at: string;
  updated_at: string;
  default_dataset?: string | null;
  num_reviewers_per_item: number | null;
  enable_reservations: boolean | null;
  reservation_minutes: number | null;
  rubric_items: RubricItem[] | null;
  rubric_instructions: string | null;
}

export interface AnnotationQueueCreate extends Omit<AnnotationQueue, 'id'> {
  session_ids: string[];
}

export interface Rule {
  id: string;
  display_name: string;
  session_id: string | null;
  is_enabled: boolean;
  dataset_id?: string | null;
  sampling_rate: number;
  filter: string | null;
  trace_filter: string | null;
  tree_filter: string | null;
  add_to_annotation_queue_id?: string | null;
  add_to_dataset_id?: string | null;
  add_to_dataset_prefer_correction: boolean;
  use_corrections_dataset: boolean;
  num_few_shot_examples: number | null;
  extend_only: boolean;
  transient: boolean;
  backfill_from: string | null;
  evaluators: JsonObject[] | null;
  code_evaluators: JsonObject[] | null;
  alerts: JsonObject[] | null;
  webhooks: JsonObject[] | null;
}

export type RuleCreate = Omit<Rule, 'id'>;

export interface InstanceConfig {
  apiKey: string;
  apiUrl: string;
}

export interface MigrationConfig {
  source: InstanceConfig;
  destination: InstanceConfig;
}
