#!/usr/bin/env tsx

import { Command } from 'commander';
import { registerVariantCommands } from './commands/variants.js';
import { registerPricingCommands } from './commands/pricing.js';
import { registerBomCommands } from './commands/bom.js';
import { registerProductionCommands } from './commands/production.js';

const program = new Command();

program
  .name('tessera')
  .description('Variant and BOM engine CLI: offline checks on a catalog snapshot file')
  .version('1.0.0');

// Catalog
registerVariantCommands(program);
registerPricingCommands(program);

// Materials
registerBomCommands(program);
registerProductionCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');
program.parse(args);
