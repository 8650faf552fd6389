import { Command } from 'commander';
import { formatCurrencyAmount, resolveVariantPricing } from '@tessera/shared';
import { findVariant, loadCatalogFile } from '../catalogFile.js';
import { fail, field, heading, json, warn } from '../format.js';

export function registerPricingCommands(program: Command): void {
  program
    .command('price <catalog> <variant>')
    .description('Effective price and weight of a variant (id or SKU)')
    .option('--json', 'Print as JSON')
    .action((catalog: string, ref: string, opts: { json?: boolean }) => {
      try {
        const file = loadCatalogFile(catalog);
        const variant = findVariant(file, ref);
        const { price, weight } = resolveVariantPricing(variant, file.snapshot);

        if (opts.json) {
          json({
            variantId: variant.id,
            sku: variant.sku,
            price: price.display,
            priceSource: price.source,
            weightGrams: weight.grams,
            weightSource: weight.source,
          });
          return;
        }

        heading(`Price: ${variant.sku}`);
        field('Price', `${price.display} (${price.source})`);
        if (price.source === 'computed') {
          field('Base price', formatCurrencyAmount(price.base));
          for (const modifier of price.modifiers) {
            field(`  ${modifier.optionId}`, `+${modifier.amount.toString()}`);
          }
        }
        field('Weight', `${weight.grams} g (${weight.source})`);
        console.log();

        if (price.unresolvedOptionIds.length > 0) {
          warn(`Options no longer in the catalog: ${price.unresolvedOptionIds.join(', ')}`);
        }
      } catch (err) {
        fail(err);
      }
    });
}
