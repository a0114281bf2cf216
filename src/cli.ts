#!/usr/bin/env node

/**
 * Jira Config Sync CLI
 *
 * Declarative management of Jira projects, with lookups of workflow schemes,
 * statuses and screens
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import path from 'path';
import { config } from 'dotenv';
import { ChangeReviewer } from './lib/change-reviewer';
import { loadEnvSettings } from './lib/config';
import { DEFAULT_CONFIG_FILE, loadSyncConfig } from './lib/config-loader';
import { logger } from './lib/logger';
import { createHandlerRegistry, createProviderContext } from './lib/provider';
import { StateStore } from './lib/state-store';
import { SyncEngine } from './lib/sync-engine';
import { SyncConfig } from './lib/types';

// Load environment variables from the working directory
config({ path: path.join(process.cwd(), '.env.local') });
config({ path: path.join(process.cwd(), '.env') });

type ConfigOption = {
  config: string;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function fail(message: string): never {
  console.error(chalk.red(`\nError: ${message}`));
  process.exit(1);
}

/**
 * Load the config file and environment, and wire up the engine
 */
function initializeSync(configOption: string): { syncConfig: SyncConfig; engine: SyncEngine } {
  const configPath = path.resolve(process.cwd(), configOption);

  try {
    const syncConfig = loadSyncConfig(configPath);
    const settings = loadEnvSettings(process.env, syncConfig.provider.typeName);
    logger.setLevel(settings.logLevel);

    const context = createProviderContext(settings.provider);
    const store = StateStore.forConfig(configPath);
    const engine = new SyncEngine(createHandlerRegistry(context), store);

    logger.debug('Initialized sync', { config: configPath, state: store.filepath, typeName: context.typeName });

    return { syncConfig, engine };
  } catch (error) {
    fail(errorMessage(error));
  }
}

function openState(configOption: string): StateStore {
  return StateStore.forConfig(path.resolve(process.cwd(), configOption));
}

// Create CLI
const program = new Command();

program
  .name('jira-config-sync')
  .description('Keep Jira projects in line with a declarative configuration file')
  .version('1.0.0');

// Plan command
program
  .command('plan')
  .description('Show the changes apply would make, without making them')
  .option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_FILE)
  .action(async (options: ConfigOption) => {
    const { syncConfig, engine } = initializeSync(options.config);
    const reviewer = new ChangeReviewer();

    const spinner = ora('Refreshing state...').start();

    try {
      const result = await engine.plan(syncConfig);
      spinner.stop();

      reviewer.showPlan(result.changes, result.errors);

      if (result.errors.length > 0) {
        process.exit(1);
      }
    } catch (error) {
      spinner.fail('Plan failed');
      fail(errorMessage(error));
    }
  });

// Apply command
program
  .command('apply')
  .description('Create, update and delete Jira entities to match the configuration')
  .option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_FILE)
  .option('--auto-approve', 'Skip the confirmation prompt')
  .action(async (options: ConfigOption & { autoApprove?: boolean }) => {
    const { syncConfig, engine } = initializeSync(options.config);
    const reviewer = new ChangeReviewer();

    const spinner = ora('Refreshing state...').start();

    try {
      const planned = await engine.plan(syncConfig);
      spinner.stop();

      reviewer.showPlan(planned.changes, planned.errors);

      if (planned.errors.length > 0) {
        fail('Fix the errors above before applying');
      }

      const pending = planned.changes.filter((c) => c.action !== 'no-op');
      if (pending.length > 0 && !options.autoApprove) {
        const proceed = await reviewer.confirm(planned.changes);
        if (!proceed) {
          console.log(chalk.yellow('Apply cancelled'));
          return;
        }
      }

      spinner.start('Applying changes...');
      const result = await engine.apply(planned);

      if (result.errors.length > 0) {
        spinner.fail('Apply finished with errors');
      } else {
        spinner.succeed('Apply complete');
      }

      reviewer.showSummary(result);

      if (result.errors.length > 0) {
        process.exit(1);
      }
    } catch (error) {
      spinner.fail('Apply failed');
      fail(errorMessage(error));
    }
  });

// Import command
program
  .command('import')
  .description('Bring an existing Jira entity under management')
  .argument('<address>', 'Resource address, e.g. atlassian_jira_project.main')
  .argument('<id>', 'Jira id of the existing entity')
  .option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_FILE)
  .action(async (address: string, id: string, options: ConfigOption) => {
    const { engine } = initializeSync(options.config);

    const spinner = ora(`Importing ${address}...`).start();

    try {
      const attributes = await engine.importResource(address, id);
      spinner.succeed(`Imported ${address}`);

      for (const [name, value] of Object.entries(attributes)) {
        console.log(chalk.gray(`  ${name} = ${JSON.stringify(value)}`));
      }
      console.log();
    } catch (error) {
      spinner.fail('Import failed');
      fail(errorMessage(error));
    }
  });

// State command
const state = program
  .command('state')
  .description('List the resources recorded in the state file')
  .option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_FILE)
  .action((options: ConfigOption) => {
    try {
      const store = openState(options.config);
      const entries = Object.entries(store.load().resources);

      if (entries.length === 0) {
        console.log(chalk.gray(`No resources recorded in ${store.filepath}`));
        return;
      }

      for (const [address, stored] of entries) {
        console.log(`${address} ${chalk.gray(`(${stored.type})`)}`);
      }
    } catch (error) {
      fail(errorMessage(error));
    }
  });

state
  .command('show')
  .description('Print the stored attributes of one resource')
  .argument('<address>', 'Resource address')
  .action((address: string) => {
    try {
      const stored = openState(state.opts<ConfigOption>().config).load().resources[address];

      if (!stored) {
        fail(`${address} is not in the state file`);
      }

      console.log(chalk.bold(`${address} (${stored.type})`));
      for (const [name, value] of Object.entries(stored.attributes)) {
        console.log(`  ${name} = ${JSON.stringify(value)}`);
      }
    } catch (error) {
      fail(errorMessage(error));
    }
  });

// Parse and execute
program.parseAsync().catch((error: unknown) => fail(errorMessage(error)));
