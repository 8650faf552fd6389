/**
 * Catalog file access for the CLI
 *
 * Commands work offline on a snapshot file: the product catalog plus its
 * variants, as exported from the database or written by hand.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ZodError } from 'zod';
import { parseCatalogFile, parseStockMap, type CatalogFile, type CatalogVariant, type Decimal } from '@tessera/shared';

export class CatalogFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogFileError';
  }
}

function readJson(path: string): unknown {
  const fullPath = resolve(path);
  let text: string;
  try {
    text = readFileSync(fullPath, 'utf-8');
  } catch (err) {
    throw new CatalogFileError(`Cannot read ${fullPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new CatalogFileError(`Invalid JSON in ${fullPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function describeZodError(path: string, err: ZodError): CatalogFileError {
  const issues = err.issues.map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return new CatalogFileError(`Invalid catalog in ${path}:\n${issues.join('\n')}`);
}

export function loadCatalogFile(path: string): CatalogFile {
  try {
    return parseCatalogFile(readJson(path));
  } catch (err) {
    if (err instanceof ZodError) throw describeZodError(path, err);
    throw err;
  }
}

/**
 * Stock override file: { "<rawMaterialId>": <quantity>, ... }
 */
export function loadStockFile(path: string): Map<string, Decimal> {
  try {
    return parseStockMap(readJson(path));
  } catch (err) {
    if (err instanceof ZodError) throw describeZodError(path, err);
    throw err;
  }
}

/**
 * Find a variant by id or by SKU (case-insensitive)
 */
export function findVariant(file: CatalogFile, ref: string): CatalogVariant {
  const wanted = ref.toUpperCase();
  const variant = file.variants.find((v) => v.id === ref || v.sku.toUpperCase() === wanted);
  if (!variant) {
    throw new CatalogFileError(`No variant "${ref}" in ${file.snapshot.product.name}`);
  }
  return variant;
}

/**
 * Stock on hand from the file's materials, with overrides applied on top
 */
export function stockFor(file: CatalogFile, overrides?: ReadonlyMap<string, Decimal>): Map<string, Decimal> {
  const stock = new Map(file.snapshot.materials.map((m) => [m.id, m.stockQuantity]));
  for (const [id, quantity] of overrides ?? []) {
    stock.set(id, quantity);
  }
  return stock;
}
