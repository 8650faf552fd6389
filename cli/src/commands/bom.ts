import { Command } from 'commander';
import { bomToRecord, resolveVariantBom } from '@tessera/shared';
import { findVariant, loadCatalogFile } from '../catalogFile.js';
import { fail, field, heading, json, table, warn } from '../format.js';
import { bomView } from '../views.js';

export function registerBomCommands(program: Command): void {
  program
    .command('bom <catalog> <variant>')
    .description('Resolved bill of materials and unit material cost of a variant')
    .option('--json', 'Print material → quantity as JSON')
    .action((catalog: string, ref: string, opts: { json?: boolean }) => {
      try {
        const file = loadCatalogFile(catalog);
        const variant = findVariant(file, ref);

        if (opts.json) {
          json(bomToRecord(resolveVariantBom(file.snapshot, variant).quantities));
          return;
        }

        const view = bomView(file, variant);
        heading(`BOM: ${variant.sku}`);
        table(view.rows);
        console.log();
        field('Unit material cost', view.total);
        for (const anomaly of view.anomalies) {
          warn(anomaly);
        }
        console.log();
      } catch (err) {
        fail(err);
      }
    });
}
