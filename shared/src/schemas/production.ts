/**
 * Production Schemas
 *
 * Zod schemas for the production-side catalog operations: recording a
 * production run against raw-material stock, and batch planning.
 */

import { z } from 'zod';

// ============================================
// CONSUME PRODUCTION MATERIALS
// ============================================

/**
 * Schema for recording a production run of one variant
 */
export const ConsumeProductionMaterialsSchema = z.object({
    variantId: z.string().uuid('Invalid variant ID'),
    units: z.number().int('Units must be a whole number').positive('Units must be positive'),
    /** Production batch the movements reference */
    batchId: z.string().uuid('Invalid batch ID').optional().nullable(),
    /** Also add the produced units to the variant's stock */
    recordOutput: z.boolean().default(false),
    createdBy: z.string().uuid().optional().nullable(),
    notes: z.string().max(500, 'Notes cannot exceed 500 characters').optional().nullable(),
});

export type ConsumeProductionMaterialsInput = z.input<typeof ConsumeProductionMaterialsSchema>;
export type ConsumeProductionMaterialsParams = z.output<typeof ConsumeProductionMaterialsSchema>;

// ============================================
// BATCH PLANNING
// ============================================

/**
 * Schema for planning the materials of a production batch
 */
export const PlanProductionBatchSchema = z.object({
    variantId: z.string().uuid('Invalid variant ID'),
    plannedUnits: z.number().int('Units must be a whole number').positive('Units must be positive'),
});

export type PlanProductionBatchInput = z.infer<typeof PlanProductionBatchSchema>;

// ============================================
// VARIANT REGENERATION
// ============================================

export const RegenerateVariantsSchema = z.object({
    productId: z.string().uuid('Invalid product ID'),
    /** Compute the plan without writing it */
    dryRun: z.boolean().default(false),
});

export type RegenerateVariantsInput = z.input<typeof RegenerateVariantsSchema>;
export type RegenerateVariantsParams = z.output<typeof RegenerateVariantsSchema>;
