/**
 * Shared type definitions
 */

// ============================================================================
// Format Variants
// ============================================================================

/** Tensor tree variant: '3' = isotropic (8-way), '4' = anisotropic (16-way) */
export type TreeVariant = '3' | '4';

/** Incident data structure names as found in BSDF container metadata */
export type DataDefinition = 'TensorTree3' | 'TensorTree4';

/** Wavelength data direction of a scattering data block */
export type DataDirection =
  | 'Transmission Front'
  | 'Transmission Back'
  | 'Reflection Front'
  | 'Reflection Back';

/** Index table family: 'branch' while the tree continues, 'leaf' at the final level */
export type TableKind = 'branch' | 'leaf';

// ============================================================================
// Lookup Results
// ============================================================================

/**
 * Matched values of a lookup. Either a flat list of leaf values, or a group of
 * nested matches (one per selected child slot).
 */
export type MatchedValues = readonly number[] | readonly MatchedValues[];

// ============================================================================
// Diagnostics
// ============================================================================

/** Warning severity levels */
export type WarningSeverity = 'info' | 'warning' | 'error';

/** Non-fatal diagnostic attached to engine responses */
export interface LookupWarning {
  code: string;
  message: string;
  severity: WarningSeverity;
  context?: Record<string, unknown>;
}

/** Timing information for performance diagnostics */
export interface LookupTimings {
  totalMs: number;
  parseMs?: number;
  lookupMs?: number;
  blockCount?: number;
}
