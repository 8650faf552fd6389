import { Command } from 'commander';
import chalk from 'chalk';
import { computeProducibility, planBatchMaterials, resolveVariantBom } from '@tessera/shared';
import { positiveInt } from '../args.js';
import { findVariant, loadCatalogFile, loadStockFile, stockFor } from '../catalogFile.js';
import { error, fail, field, heading, json, producibilityColor, success, table, warn } from '../format.js';
import { batchRows, capacityRows, reportView } from '../views.js';

interface StockOption {
  stock?: string;
  json?: boolean;
}

export function registerProductionCommands(program: Command): void {
  program
    .command('producible <catalog> <variant>')
    .description('How many units current raw-material stock allows')
    .option('-s, --stock <file>', 'JSON stock overrides { materialId: quantity }')
    .option('--json', 'Print as JSON')
    .action((catalog: string, ref: string, opts: StockOption) => {
      try {
        const file = loadCatalogFile(catalog);
        const variant = findVariant(file, ref);
        const stock = stockFor(file, opts.stock ? loadStockFile(opts.stock) : undefined);
        const producibility = computeProducibility(resolveVariantBom(file.snapshot, variant).quantities, stock);

        if (opts.json) {
          json(
            producibility.kind === 'unlimited'
              ? { sku: variant.sku, producible: 'unlimited' }
              : { sku: variant.sku, producible: producibility.units, limitingMaterials: producibility.limitingMaterials }
          );
          return;
        }

        heading(`Producibility: ${variant.sku}`);
        field('Producible units', producibilityColor(producibility));
        if (producibility.kind === 'limited') {
          field('Limited by', producibility.limitingMaterials.join(', '));
          console.log();
          table(capacityRows(file, producibility));
        }
        console.log();
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('report <catalog>')
    .description('Price, unit cost and producibility of every active variant')
    .option('-s, --stock <file>', 'JSON stock overrides { materialId: quantity }')
    .option('--json', 'Print as JSON')
    .action((catalog: string, opts: StockOption) => {
      try {
        const file = loadCatalogFile(catalog);
        const stock = stockFor(file, opts.stock ? loadStockFile(opts.stock) : undefined);
        const view = reportView(file, stock);

        if (opts.json) {
          json(view);
          return;
        }

        heading(`Report: ${file.snapshot.product.name}`);
        table(
          view.rows.map((row) => ({
            ...row,
            Producible: row.Producible === '0' ? chalk.red(row.Producible) : row.Producible,
          }))
        );
        console.log();
        for (const failure of view.errors) {
          error(`${failure.sku}: ${failure.message}`);
        }
      } catch (err) {
        fail(err);
      }
    });

  program
    .command('plan-batch')
    .description('Materials, shortfalls and material cost of a production batch')
    .argument('<catalog>', 'Catalog snapshot JSON file')
    .argument('<variant>', 'Variant id or SKU')
    .argument('<units>', 'Units to produce', positiveInt)
    .option('-s, --stock <file>', 'JSON stock overrides { materialId: quantity }')
    .option('--json', 'Print as JSON')
    .action((catalog: string, ref: string, units: number, opts: StockOption) => {
      try {
        const file = loadCatalogFile(catalog);
        const variant = findVariant(file, ref);
        const stock = stockFor(file, opts.stock ? loadStockFile(opts.stock) : undefined);
        const materials = new Map(
          file.snapshot.materials.map((m) => [
            m.id,
            { costPerUnit: m.costPerUnit, stockQuantity: stock.get(m.id) ?? m.stockQuantity },
          ])
        );
        const plan = planBatchMaterials(resolveVariantBom(file.snapshot, variant).quantities, units, materials);
        const rows = batchRows(file, plan);

        if (opts.json) {
          json({
            sku: variant.sku,
            plannedUnits: plan.plannedUnits,
            canProduce: plan.canProduce,
            totalCost: plan.totalCost.toFixed(2),
            lines: rows,
          });
          return;
        }

        heading(`Batch: ${plan.plannedUnits} × ${variant.sku}`);
        table(rows);
        console.log();
        field('Material cost', plan.totalCost.toFixed(2));
        if (plan.canProduce) {
          success('Stock covers this batch');
        } else {
          warn('Stock does not cover this batch');
        }
        console.log();
      } catch (err) {
        fail(err);
      }
    });
}
