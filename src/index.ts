#!/usr/bin/env node
import { config } from 'dotenv';
import { buildProgram } from './cli.js';
import { loadConfig } from './config.js';
import { Migrator } from './services/migrator.js';

config();

const program = buildProgram(() => Migrator.fromConfig(loadConfig()));

program.parseAsync().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : 'An unknown error occurred');
  process.exitCode = 1;
});
