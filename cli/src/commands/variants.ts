import { Command } from 'commander';
import chalk from 'chalk';
import { generateVariants, planHasChanges } from '@tessera/shared';
import { positiveInt } from '../args.js';
import { loadCatalogFile } from '../catalogFile.js';
import { fail, heading, json, success, table, warn } from '../format.js';
import { variantPlanRows, type VariantPlanRow } from '../views.js';

const ACTION_COLORS: Record<VariantPlanRow['Action'], (text: string) => string> = {
  keep: chalk.dim,
  create: chalk.green,
  reactivate: chalk.cyan,
  deactivate: chalk.yellow,
  failed: chalk.red,
};

export function registerVariantCommands(program: Command): void {
  program
    .command('variants <catalog>')
    .description('Show the variant plan: combinations to create, keep, reactivate or deactivate')
    .option('--abbrev <n>', 'Characters kept from option values in SKUs', positiveInt)
    .option('--max-suffix <n>', 'Highest numeric suffix tried on SKU collision', positiveInt)
    .option('--json', 'Print the plan as JSON')
    .action((catalog: string, opts: { abbrev?: number; maxSuffix?: number; json?: boolean }) => {
      try {
        const file = loadCatalogFile(catalog);
        const plan = generateVariants(file.snapshot, file.variants, {
          abbreviationLength: opts.abbrev,
          maxSkuSuffix: opts.maxSuffix,
        });

        if (opts.json) {
          json(plan);
          return;
        }

        heading(`Variants: ${file.snapshot.product.name} (${plan.target.length} combinations)`);
        table(variantPlanRows(file, plan).map((row) => ({ ...row, Action: ACTION_COLORS[row.Action](row.Action) })));
        console.log();

        if (plan.failures.length > 0) {
          warn(`${plan.failures.length} combination(s) could not get a SKU`);
        }
        if (!planHasChanges(plan)) {
          success('Variants are up to date');
        }
      } catch (err) {
        fail(err);
      }
    });
}
