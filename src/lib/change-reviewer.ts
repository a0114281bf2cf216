/**
 * Interactive review of planned changes with diff display
 */

import inquirer from 'inquirer';
import chalk from 'chalk';
import { diffLines } from 'diff';
import { formatDiagnostic } from './diagnostics';
import { ApplyResult, SyncError } from './sync-engine';
import { AttributeValue, PlannedChange } from './types';

const RULE = '━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━';
const CONTEXT_LINES = 2;

export function formatValue(value: AttributeValue | undefined): string {
  if (value === undefined) return '(known after apply)';
  if (value === null) return 'null';
  return typeof value === 'string' ? JSON.stringify(value) : String(value);
}

/**
 * Lines describing one planned change, uncoloured
 */
export function describeChange(change: PlannedChange): string[] {
  switch (change.action) {
    case 'create':
      return [
        `+ ${change.address} will be created`,
        ...Object.entries(change.plan).map(([name, value]) => `    ${name} = ${formatValue(value)}`),
      ];
    case 'update':
      return [
        `~ ${change.address} will be updated in-place`,
        ...change.changedAttributes.map(
          (name) => `    ${name}: ${formatValue(change.prior[name] ?? null)} → ${formatValue(change.plan[name])}`
        ),
      ];
    case 'delete':
      return [`- ${change.address} will be destroyed`];
    case 'no-op':
      return [`  ${change.address} is up to date`];
  }
}

export function countChanges(changes: PlannedChange[]): { create: number; update: number; delete: number } {
  return {
    create: changes.filter((c) => c.action === 'create').length,
    update: changes.filter((c) => c.action === 'update').length,
    delete: changes.filter((c) => c.action === 'delete').length,
  };
}

export class ChangeReviewer {
  /**
   * Print every planned change and the error list
   */
  showPlan(changes: PlannedChange[], errors: SyncError[] = []): void {
    console.log(chalk.bold(`\n${RULE}`));
    console.log(chalk.bold.cyan('Planned Changes'));
    console.log(chalk.bold(`${RULE}\n`));

    const pending = changes.filter((c) => c.action !== 'no-op');

    if (pending.length === 0 && errors.length === 0) {
      console.log(chalk.green('✓ No changes. Jira matches the configuration.'));
      console.log();
      return;
    }

    for (const change of pending) {
      this.showChange(change);
    }

    this.showErrors(errors);

    const counts = countChanges(changes);
    console.log(
      chalk.bold(`Plan: ${counts.create} to add, ${counts.update} to change, ${counts.delete} to destroy.`)
    );
    console.log();
  }

  private showChange(change: PlannedChange): void {
    const [header, ...details] = describeChange(change);
    const color = change.action === 'create' ? chalk.green : change.action === 'delete' ? chalk.red : chalk.yellow;

    console.log(color.bold(header));

    if (change.action === 'update') {
      for (const name of change.changedAttributes) {
        const before = change.prior[name] ?? null;
        const after = change.plan[name];
        if (typeof before === 'string' && typeof after === 'string' && (before.includes('\n') || after.includes('\n'))) {
          console.log(chalk.yellow(`    ${name}:`));
          this.showTextDiff(before, after);
        } else {
          console.log(chalk.yellow(`    ${name}: `) + chalk.red(formatValue(before)) + ' → ' + chalk.green(formatValue(after)));
        }
      }
    } else {
      details.forEach((line) => console.log(color(line)));
    }

    console.log();
  }

  /**
   * Line-by-line diff of a multi-line value with a little context
   */
  private showTextDiff(before: string, after: string): void {
    const diff = diffLines(before, after);

    for (let i = 0; i < diff.length; i++) {
      const part = diff[i];
      if (!part.added && !part.removed) continue;

      const previous = diff[i - 1];
      if (previous && !previous.added && !previous.removed) {
        const lines = previous.value.split('\n').slice(-CONTEXT_LINES - 1, -1);
        lines.forEach((line) => console.log(chalk.gray('        ' + line)));
      }

      const sign = part.added ? '+' : '-';
      const paint = part.added ? chalk.green : chalk.red;
      part.value
        .split('\n')
        .filter((line) => line)
        .forEach((line) => console.log(paint(`      ${sign} ${line}`)));

      const next = diff[i + 1];
      if (next && !next.added && !next.removed) {
        const lines = next.value.split('\n').slice(0, CONTEXT_LINES);
        lines.forEach((line) => line && console.log(chalk.gray('        ' + line)));
      }
    }
  }

  private showErrors(errors: SyncError[]): void {
    if (errors.length === 0) return;

    console.log(chalk.bold.red(`✗ ${errors.length} address(es) could not be planned:`));
    for (const error of errors) {
      console.log(chalk.red(`  ${error.address}`));
      error.diagnostics.forEach((d) => console.log(chalk.red(`    ${formatDiagnostic(d)}`)));
    }
    console.log();
  }

  /**
   * Ask whether the planned changes should be applied
   */
  async confirm(changes: PlannedChange[]): Promise<boolean> {
    const counts = countChanges(changes);
    const answer = await inquirer.prompt<{ proceed: boolean }>([
      {
        type: 'confirm',
        name: 'proceed',
        message: `Apply ${counts.create + counts.update + counts.delete} change(s) to Jira?`,
        default: false,
      },
    ]);

    return answer.proceed;
  }

  /**
   * Show summary of an apply run
   */
  showSummary(result: ApplyResult): void {
    console.log(chalk.bold(`\n${RULE}`));
    console.log(chalk.bold.cyan('Apply Results'));
    console.log(chalk.bold(`${RULE}\n`));

    if (result.created.length > 0) {
      console.log(chalk.green(`✓ Created: ${result.created.join(', ')}`));
    }

    if (result.updated.length > 0) {
      console.log(chalk.yellow(`✓ Updated: ${result.updated.join(', ')}`));
    }

    if (result.deleted.length > 0) {
      console.log(chalk.red(`✓ Destroyed: ${result.deleted.join(', ')}`));
    }

    if (result.unchanged.length > 0) {
      console.log(chalk.gray(`⊘ Unchanged: ${result.unchanged.length} resource(s)`));
    }

    if (result.errors.length > 0) {
      console.log(chalk.red(`✗ Errors: ${result.errors.length} resource(s)`));
      for (const error of result.errors) {
        error.diagnostics.forEach((d) => console.log(chalk.red(`  ${error.address}: ${formatDiagnostic(d)}`)));
      }
    }

    console.log();
  }
}
