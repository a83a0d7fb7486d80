import { describe, expect, it, vi } from 'vitest';
import {
  buildProgram,
  parseDatasetMigrationMode,
  parseQueueMigrationMode,
  type Choice,
  type MigrationOperations,
  type Prompts,
} from '../cli.js';
import { InvalidMigrationModeError } from '../errors.js';
import type { DatasetMigrationMode, IdMapping, QueueMigrationMode } from '../types/mapping.js';

function fakeOperations() {
  return {
    migrateDataset: vi.fn(async (_datasetId: string, _check?: boolean, _mode?: DatasetMigrationMode) => 'new-ds-1'),
    migrateDatasetExamples: vi.fn(
      async (_originalDatasetId: string, _newDatasetId: string): Promise<IdMapping> => new Map([['old-ex-1', 'new-ex-1']])
    ),
    migrateDatasetExperiments: vi.fn(
      async (_originalDatasetId: string, _newDatasetId: string, _exampleIds: IdMapping): Promise<IdMapping> =>
        new Map([['old-exp-1', 'new-exp-1']])
    ),
    migrateAnnotationQueue: vi.fn(async (_queueId: string, _check?: boolean, _mode?: QueueMigrationMode) => 'new-aq-1'),
    migrateProjectRules: vi.fn(async (_oldProjectId: string, _newProjectId: string) => ['new-rule-1', 'new-rule-2']),
    migratePrompt: vi.fn(async (promptId: string) => `https://new.example.test/prompts/${promptId}`),
  } satisfies MigrationOperations;
}

// Answers are consumed in order by select and input
function scriptedPrompts(answers: string[], confirmed = true) {
  const pending = [...answers];
  const next = (): string => {
    const answer = pending.shift();
    if (answer === undefined) {
      throw new Error('No scripted answer left');
    }
    return answer;
  };
  const prompts = {
    confirm: vi.fn(async (_message: string) => confirmed),
    async select<T extends string>(_message: string, choices: Choice<T>[]): Promise<T> {
      const answer = next();
      const choice = choices.find(candidate => candidate.value === answer);
      if (!choice) {
        throw new Error(`"${answer}" is not one of the choices`);
      }
      return choice.value;
    },
    input: vi.fn(async (_message: string) => next()),
  } satisfies Prompts;
  return prompts;
}

function setup(answers: string[] = [], confirmed = true) {
  const operations = fakeOperations();
  const prompts = scriptedPrompts(answers, confirmed);
  const out = { log: vi.fn(), error: vi.fn() };
  const program = buildProgram(() => operations, prompts, out);
  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    command.configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
  }
  const run = (...args: string[]) => program.parseAsync(args, { from: 'user' });
  return { operations, prompts, out, run };
}

describe('langsmith-migrate', () => {
  it('migrates a dataset with the default mode and name check', async () => {
    const { operations, prompts, out, run } = setup();

    await run('dataset', 'old-ds-1', '--yes');

    expect(operations.migrateDataset).toHaveBeenCalledWith('old-ds-1', true, 'EXAMPLES');
    expect(prompts.confirm).not.toHaveBeenCalled();
    expect(out.log).toHaveBeenCalledWith('\nMigration completed! New dataset ID: new-ds-1');
  });

  it('passes the mode and --no-check through', async () => {
    const { operations, run } = setup();

    await run('dataset', 'old-ds-1', '--mode', 'DATASET_ONLY', '--no-check', '-y');

    expect(operations.migrateDataset).toHaveBeenCalledWith('old-ds-1', false, 'DATASET_ONLY');
  });

  it('rejects a mode outside the allowed choices', async () => {
    const { operations, run } = setup();

    await expect(run('dataset', 'old-ds-1', '-m', 'EVERYTHING', '-y')).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
    expect(operations.migrateDataset).not.toHaveBeenCalled();
  });

  it('asks for confirmation and stops when declined', async () => {
    const { operations, prompts, out, run } = setup([], false);

    await run('dataset', 'old-ds-1');

    expect(prompts.confirm).toHaveBeenCalledWith('Migrate dataset old-ds-1 (EXAMPLES)?');
    expect(operations.migrateDataset).not.toHaveBeenCalled();
    expect(out.log).toHaveBeenCalledWith('Migration cancelled.');
  });

  it('migrates experiments with the example mapping it just built', async () => {
    const { operations, out, run } = setup();

    await run('examples', 'old-ds-1', 'new-ds-1', '--with-experiments', '-y');

    expect(operations.migrateDatasetExamples).toHaveBeenCalledWith('old-ds-1', 'new-ds-1');
    expect(operations.migrateDatasetExperiments).toHaveBeenCalledWith(
      'old-ds-1',
      'new-ds-1',
      new Map([['old-ex-1', 'new-ex-1']])
    );
    expect(out.log).toHaveBeenCalledWith('\nMigrated 1 examples.');
    expect(out.log).toHaveBeenCalledWith('Migrated 1 experiments.');
  });

  it('copies only examples without --with-experiments', async () => {
    const { operations, run } = setup();

    await run('examples', 'old-ds-1', 'new-ds-1', '-y');

    expect(operations.migrateDatasetExperiments).not.toHaveBeenCalled();
  });

  it('migrates an annotation queue in the requested mode', async () => {
    const { operations, out, run } = setup();

    await run('queue', 'old-aq-1', '-m', 'QUEUE_ONLY', '-y');

    expect(operations.migrateAnnotationQueue).toHaveBeenCalledWith('old-aq-1', true, 'QUEUE_ONLY');
    expect(out.log).toHaveBeenCalledWith('\nMigration completed! New annotation queue ID: new-aq-1');
  });

  it('migrates project rules', async () => {
    const { operations, out, run } = setup();

    await run('rules', 'old-project', 'new-project', '-y');

    expect(operations.migrateProjectRules).toHaveBeenCalledWith('old-project', 'new-project');
    expect(out.log).toHaveBeenCalledWith('\nMigration completed! Created 2 rules.');
  });

  it('migrates a prompt', async () => {
    const { operations, out, run } = setup();

    await run('prompt', 'support-bot', '-y');

    expect(operations.migratePrompt).toHaveBeenCalledWith('support-bot');
    expect(out.log).toHaveBeenCalledWith('\nMigration completed! Prompt available at https://new.example.test/prompts/support-bot');
  });

  it('runs menu choices until exit', async () => {
    const { operations, out, run } = setup([
      'dataset',
      'old-ds-1',
      'EXAMPLES_AND_EXPERIMENTS',
      'prompt',
      'support-bot',
      'exit',
    ]);

    await run('interactive');

    expect(operations.migrateDataset).toHaveBeenCalledWith('old-ds-1', true, 'EXAMPLES_AND_EXPERIMENTS');
    expect(operations.migratePrompt).toHaveBeenCalledWith('support-bot');
    expect(out.log.mock.calls).toEqual([
      ['✓ Dataset migrated: new-ds-1'],
      ['✓ Prompt migrated: https://new.example.test/prompts/support-bot'],
      ['Goodbye!'],
    ]);
  });

  it('reports a failed menu migration and keeps the menu open', async () => {
    const { operations, out, run } = setup(['rules', 'old-project', 'new-project', 'exit']);
    operations.migrateProjectRules.mockRejectedValueOnce(new Error('Failed to create rule: 422 invalid filter'));

    await run('interactive');

    expect(out.error).toHaveBeenCalledWith('Error:', 'Failed to create rule: 422 invalid filter');
    expect(out.log).toHaveBeenLastCalledWith('Goodbye!');
  });
});

describe('mode parsing', () => {
  it('accepts known modes', () => {
    expect(parseDatasetMigrationMode('EXAMPLES_AND_EXPERIMENTS')).toBe('EXAMPLES_AND_EXPERIMENTS');
    expect(parseQueueMigrationMode('QUEUE_ONLY')).toBe('QUEUE_ONLY');
  });

  it('rejects unknown modes with the allowed values', () => {
    expect(() => parseDatasetMigrationMode('EVERYTHING')).toThrow(InvalidMigrationModeError);
    expect(() => parseDatasetMigrationMode('EVERYTHING')).toThrow(
      'Unknown migration mode "EVERYTHING". Expected one of: EXAMPLES, EXAMPLES_AND_EXPERIMENTS, DATASET_ONLY'
    );
    expect(() => parseQueueMigrationMode('DATASET_ONLY')).toThrow(
      'Unknown migration mode "DATASET_ONLY". Expected one of: QUEUE_AND_DATASET, QUEUE_ONLY'
    );
  });
});
