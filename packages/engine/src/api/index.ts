/**
 * Lookup API - request/response shapes and engine configuration
 */

import type {
  DataDirection,
  LookupTimings,
  LookupWarning,
  MatchedValues,
  TreeVariant,
} from '@tensortree/shared';
import type {
  EngineConfig,
  IncidentPositionInput,
  LookupConfig,
  TokenizerConfig,
  Tree,
} from '@tensortree/core';

// ============================================================================
// Request Types
// ============================================================================

/** Lookup against one loaded data block */
export interface LookupRequest {
  direction: DataDirection;
  position: IncidentPositionInput;
}

// ============================================================================
// Response Types
// ============================================================================

/** Matched values for one data block */
export interface LookupResponse {
  direction: DataDirection;
  variant: TreeVariant;
  depth: number;
  /** One entry per slot selected at the root */
  matches: MatchedValues[];
  timings: LookupTimings;
  warnings: LookupWarning[];
}

/** Summary of a loaded data set */
export interface LoadResult {
  name: string;
  variant: TreeVariant;
  /** Loaded directions, in the order they first appear */
  directions: DataDirection[];
  depths: Partial<Record<DataDirection, number>>;
  timings: LookupTimings;
  warnings: LookupWarning[];
}

// ============================================================================
// Engine Interface
// ============================================================================

/** Fully resolved engine configuration */
export type ResolvedEngineConfig = Required<EngineConfig>;

/** Partial override accepted by engines and mergeEngineConfig */
export interface EngineConfigOverride {
  tokenizer?: Partial<TokenizerConfig>;
  lookup?: Partial<LookupConfig>;
}

export interface LookupEngine {
  /** Validate and parse a data set, replacing any loaded one */
  load(input: unknown): LoadResult;

  /** Look up one data block */
  lookup(request: LookupRequest): LookupResponse;

  /** Look up every loaded data block, in load order */
  lookupAll(position: IncidentPositionInput): LookupResponse[];

  /** Directions currently loaded */
  directions(): DataDirection[];

  /** Parsed tree of a loaded direction */
  getTree(direction: DataDirection): Tree;

  /** Effective configuration */
  getConfig(): ResolvedEngineConfig;
}

// ============================================================================
// Configuration Helpers
// ============================================================================

/**
 * Default engine config: strict tokenizing, out-of-range warnings on
 */
export function getDefaultEngineConfig(): ResolvedEngineConfig {
  return {
    tokenizer: { strict: true },
    lookup: { warnOutOfRange: true },
  };
}

/**
 * Merge default engine config with user config
 */
export function mergeEngineConfig(
  defaults: ResolvedEngineConfig,
  override?: EngineConfigOverride
): ResolvedEngineConfig {
  if (!override) return defaults;

  return {
    tokenizer: {
      ...defaults.tokenizer,
      ...override.tokenizer,
    },
    lookup: {
      ...defaults.lookup,
      ...override.lookup,
    },
  };
}
