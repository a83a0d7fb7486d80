import { Command, Option } from 'commander';
import inquirer from 'inquirer';
import type { Migrator } from './services/migrator.js';
import {
  DATASET_MIGRATION_MODES,
  QUEUE_MIGRATION_MODES,
  isDatasetMigrationMode,
  isQueueMigrationMode,
  type DatasetMigrationMode,
  type QueueMigrationMode,
} from './types/mapping.js';
import { InvalidMigrationModeError } from './errors.js';

export type MigrationOperations = Pick<
  Migrator,
  | 'migrateDataset'
  | 'migrateDatasetExamples'
  | 'migrateDatasetExperiments'
  | 'migrateAnnotationQueue'
  | 'migrateProjectRules'
  | 'migratePrompt'
>;

export interface Choice<T extends string> {
  name: string;
  value: T;
}

export interface Prompts {
  confirm(message: string): Promise<boolean>;
  select<T extends string>(message: string, choices: Choice<T>[]): Promise<T>;
  input(message: string): Promise<string>;
}

export type Output = Pick<Console, 'log' | 'error'>;

export const inquirerPrompts: Prompts = {
  async confirm(message) {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      { type: 'confirm', name: 'confirm', message, default: false },
    ]);
    return confirm;
  },
  async select<T extends string>(message: string, choices: Choice<T>[]): Promise<T> {
    const { selected } = await inquirer.prompt<{ selected: T }>([
      { type: 'list', name: 'selected', message, choices },
    ]);
    return selected;
  },
  async input(message) {
    const { value } = await inquirer.prompt<{ value: string }>([
      {
        type: 'input',
        name: 'value',
        message,
        validate: (input: string) => input.trim() !== '' || 'Please enter a value',
      },
    ]);
    return value.trim();
  },
};

interface ConfirmOptions {
  yes?: boolean;
}

interface DatasetCommandOptions extends ConfirmOptions {
  mode: string;
  check: boolean;
}

interface ExamplesCommandOptions extends ConfirmOptions {
  withExperiments?: boolean;
}

interface QueueCommandOptions extends ConfirmOptions {
  mode: string;
  check: boolean;
}

type MenuAction = 'dataset' | 'queue' | 'rules' | 'prompt' | 'exit';

export function parseDatasetMigrationMode(value: string): DatasetMigrationMode {
  if (!isDatasetMigrationMode(value)) {
    throw new InvalidMigrationModeError(value, DATASET_MIGRATION_MODES);
  }
  return value;
}

export function parseQueueMigrationMode(value: string): QueueMigrationMode {
  if (!isQueueMigrationMode(value)) {
    throw new InvalidMigrationModeError(value, QUEUE_MIGRATION_MODES);
  }
  return value;
}

export function buildProgram(
  createMigrator: () => MigrationOperations,
  prompts: Prompts = inquirerPrompts,
  out: Output = console
): Command {
  const program = new Command();

  const proceed = async (options: ConfirmOptions, message: string): Promise<boolean> => {
    if (options.yes) {
      return true;
    }
    const confirmed = await prompts.confirm(message);
    if (!confirmed) {
      out.log('Migration cancelled.');
    }
    return confirmed;
  };

  program
    .name('langsmith-migrate')
    .description('CLI tool to migrate datasets, experiments, annotation queues, rules and prompts between LangSmith instances')
    .version('1.0.0');

  program
    .command('dataset')
    .description('Migrate a dataset, with its examples and optionally its experiments')
    .argument('<datasetId>', 'dataset ID in the source instance')
    .addOption(
      new Option('-m, --mode <mode>', 'what to migrate along with the dataset')
        .choices(DATASET_MIGRATION_MODES)
        .default('EXAMPLES')
    )
    .option('--no-check', 'create the dataset even if one with the same name exists in the destination')
    .option('-y, --yes', 'skip the confirmation prompt')
    .action(async (datasetId: string, options: DatasetCommandOptions) => {
      const mode = parseDatasetMigrationMode(options.mode);
      if (!(await proceed(options, `Migrate dataset ${datasetId} (${mode})?`))) {
        return;
      }
      const newDatasetId = await createMigrator().migrateDataset(datasetId, options.check, mode);
      out.log(`\nMigration completed! New dataset ID: ${newDatasetId}`);
    });

  program
    .command('examples')
    .description('Copy the examples of a source dataset into an existing destination dataset')
    .argument('<originalDatasetId>', 'dataset ID in the source instance')
    .argument('<newDatasetId>', 'dataset ID in the destination instance')
    .option('--with-experiments', 'also migrate the experiments run against the source dataset')
    .option('-y, --yes', 'skip the confirmation prompt')
    .action(async (originalDatasetId: string, newDatasetId: string, options: ExamplesCommandOptions) => {
      if (!(await proceed(options, `Copy examples of ${originalDatasetId} into ${newDatasetId}?`))) {
        return;
      }
      const migrator = createMigrator();
      const exampleIds = await migrator.migrateDatasetExamples(originalDatasetId, newDatasetId);
      out.log(`\nMigrated ${exampleIds.size} examples.`);
      if (options.withExperiments) {
        const experimentIds = await migrator.migrateDatasetExperiments(originalDatasetId, newDatasetId, exampleIds);
        out.log(`Migrated ${experimentIds.size} experiments.`);
      }
    });

  program
    .command('queue')
    .description('Migrate an annotation queue, optionally with its default dataset')
    .argument('<queueId>', 'annotation queue ID in the source instance')
    .addOption(
      new Option('-m, --mode <mode>', 'whether to migrate the default dataset too')
        .choices(QUEUE_MIGRATION_MODES)
        .default('QUEUE_AND_DATASET')
    )
    .option('--no-check', 'create the queue even if one with the same name exists in the destination')
    .option('-y, --yes', 'skip the confirmation prompt')
    .action(async (queueId: string, options: QueueCommandOptions) => {
      const mode = parseQueueMigrationMode(options.mode);
      if (!(await proceed(options, `Migrate annotation queue ${queueId} (${mode})?`))) {
        return;
      }
      const newQueueId = await createMigrator().migrateAnnotationQueue(queueId, options.check, mode);
      out.log(`\nMigration completed! New annotation queue ID: ${newQueueId}`);
    });

  program
    .command('rules')
    .description('Recreate the automation rules of a tracing project on a destination project')
    .argument('<oldProjectId>', 'project ID in the source instance')
    .argument('<newProjectId>', 'project ID in the destination instance')
    .option('-y, --yes', 'skip the confirmation prompt')
    .action(async (oldProjectId: string, newProjectId: string, options: ConfirmOptions) => {
      if (!(await proceed(options, `Migrate rules of project ${oldProjectId} to ${newProjectId}?`))) {
        return;
      }
      const ruleIds = await createMigrator().migrateProjectRules(oldProjectId, newProjectId);
      out.log(`\nMigration completed! Created ${ruleIds.length} rules.`);
    });

  program
    .command('prompt')
    .description('Copy the latest commit of a prompt under the same identifier')
    .argument('<promptId>', 'prompt identifier')
    .option('-y, --yes', 'skip the confirmation prompt')
    .action(async (promptId: string, options: ConfirmOptions) => {
      if (!(await proceed(options, `Migrate prompt ${promptId}?`))) {
        return;
      }
      const url = await createMigrator().migratePrompt(promptId);
      out.log(`\nMigration completed! Prompt available at ${url}`);
    });

  program
    .command('interactive')
    .description('Choose migrations from a menu')
    .action(async () => {
      const migrator = createMigrator();

      while (true) {
        const action = await prompts.select<MenuAction>('What would you like to migrate?', [
          { name: 'Dataset', value: 'dataset' },
          { name: 'Annotation queue', value: 'queue' },
          { name: 'Project rules', value: 'rules' },
          { name: 'Prompt', value: 'prompt' },
          { name: 'Exit', value: 'exit' },
        ]);

        if (action === 'exit') {
          out.log('Goodbye!');
          return;
        }

        try {
          await runMenuAction(action, migrator, prompts, out);
        } catch (error) {
          out.error('Error:', error instanceof Error ? error.message : 'An unknown error occurred');
        }
      }
    });

  return program;
}

async function runMenuAction(
  action: Exclude<MenuAction, 'exit'>,
  migrator: MigrationOperations,
  prompts: Prompts,
  out: Output
): Promise<void> {
  switch (action) {
    case 'dataset': {
      const datasetId = await prompts.input('Source dataset ID:');
      const mode = await prompts.select<DatasetMigrationMode>(
        'What should come along with the dataset?',
        DATASET_MIGRATION_MODES.map(value => ({ name: value, value }))
      );
      const newDatasetId = await migrator.migrateDataset(datasetId, true, mode);
      out.log(`✓ Dataset migrated: ${newDatasetId}`);
      return;
    }
    case 'queue': {
      const queueId = await prompts.input('Source annotation queue ID:');
      const mode = await prompts.select<QueueMigrationMode>(
        'Migrate the default dataset too?',
        QUEUE_MIGRATION_MODES.map(value => ({ name: value, value }))
      );
      const newQueueId = await migrator.migrateAnnotationQueue(queueId, true, mode);
      out.log(`✓ Annotation queue migrated: ${newQueueId}`);
      return;
    }
    case 'rules': {
      const oldProjectId = await prompts.input('Source project ID:');
      const newProjectId = await prompts.input('Destination project ID:');
      const ruleIds = await migrator.migrateProjectRules(oldProjectId, newProjectId);
      out.log(`✓ Created ${ruleIds.length} rules`);
      return;
    }
    case 'prompt': {
      const promptId = await prompts.input('Prompt identifier:');
      const url = await migrator.migratePrompt(promptId);
      out.log(`✓ Prompt migrated: ${url}`);
      return;
    }
  }
}
