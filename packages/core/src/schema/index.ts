/**
 * Data set and configuration schemas
 * Runtime validation with Zod + TypeScript types
 */

import { z } from 'zod';
import { DATA_DIRECTIONS, DEFINITION_VARIANTS, type DataDefinition, type TreeVariant } from '@tensortree/shared';

// ============================================================================
// Format Schemas
// ============================================================================

/** Tree variant schema */
export const TreeVariantSchema = z.enum(['3', '4']);

/** Incident data structure (container metadata) schema */
export const DataDefinitionSchema = z.enum(['TensorTree3', 'TensorTree4']);

/** Wavelength data direction schema */
export const DataDirectionSchema = z.enum(DATA_DIRECTIONS);

// ============================================================================
// Query Schemas
// ============================================================================

/**
 * Incident position in normalized coordinates.
 * Values outside [-1, 1] are accepted and not clamped; `y` is ignored by the
 * isotropic variant.
 */
export const IncidentPositionSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite().default(0),
});

// ============================================================================
// Data Set Schemas
// ============================================================================

/** One scattering data block, already extracted from its container */
export const DataBlockSchema = z.object({
  direction: DataDirectionSchema,
  data: z.string().min(1),
});

/** A BSDF data set: one variant shared by every block */
export const BsdfDataSetSchema = z.object({
  definition: DataDefinitionSchema,
  name: z.string().default('Untitled BSDF'),
  blocks: z.array(DataBlockSchema).min(1),
});

// ============================================================================
// Engine Configuration
// ============================================================================

/** Tokenizer configuration */
export const TokenizerConfigSchema = z.object({
  /**
   * Raise on unrecognized characters and on content after the root group.
   * Lenient mode skips both, as the legacy scanner did.
   */
  strict: z.boolean().default(true),
});

/** Lookup configuration */
export const LookupConfigSchema = z.object({
  warnOutOfRange: z.boolean().default(true),
});

/** Engine configuration schema */
export const EngineConfigSchema = z.object({
  tokenizer: TokenizerConfigSchema.optional(),
  lookup: LookupConfigSchema.optional(),
});

// ============================================================================
// TypeScript Type Exports
// ============================================================================

export type IncidentPosition = z.infer<typeof IncidentPositionSchema>;
export type IncidentPositionInput = z.input<typeof IncidentPositionSchema>;
export type DataBlock = z.infer<typeof DataBlockSchema>;
export type BsdfDataSet = z.infer<typeof BsdfDataSetSchema>;
export type BsdfDataSetInput = z.input<typeof BsdfDataSetSchema>;
export type TokenizerConfig = z.infer<typeof TokenizerConfigSchema>;
export type LookupConfig = z.infer<typeof LookupConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate a data set object against the schema
 */
export function validateDataSet(
  data: unknown
): { success: true; data: BsdfDataSet } | { success: false; errors: z.ZodError } {
  const result = BsdfDataSetSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error };
}

/**
 * Parse and validate a data set, throwing on error
 */
export function parseDataSet(data: unknown): BsdfDataSet {
  return BsdfDataSetSchema.parse(data);
}

/**
 * Parse and validate an incident position, throwing on error
 */
export function parseIncidentPosition(data: unknown): IncidentPosition {
  return IncidentPositionSchema.parse(data);
}

/**
 * Tree variant named by a container's incident data structure
 */
export function variantFromDefinition(definition: DataDefinition): TreeVariant {
  return DEFINITION_VARIANTS[definition];
}
