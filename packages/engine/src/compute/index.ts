/**
 * Tensor tree engine - loads a BSDF data set and answers lookups per data block
 */

import {
  UnknownDirectionError,
  elapsedMs,
  isWithinQueryDomain,
  type DataDirection,
  type LookupWarning,
  type TreeVariant,
} from '@tensortree/shared';
import {
  parseDataSet,
  parseIncidentPosition,
  parseTree,
  variantFromDefinition,
  type IncidentPosition,
  type IncidentPositionInput,
  type Tree,
} from '@tensortree/core';
import type {
  EngineConfigOverride,
  LoadResult,
  LookupEngine,
  LookupRequest,
  LookupResponse,
  ResolvedEngineConfig,
} from '../api/index.js';
import { getDefaultEngineConfig, mergeEngineConfig } from '../api/index.js';
import { lookupTree } from '../traversal/index.js';

export class TensorTreeEngine implements LookupEngine {
  private readonly config: ResolvedEngineConfig;
  private trees = new Map<DataDirection, Tree>();
  private loadedVariant: TreeVariant | null = null;

  constructor(config?: EngineConfigOverride) {
    this.config = mergeEngineConfig(getDefaultEngineConfig(), config);
  }

  /** Variant of the loaded data set, or null before the first load */
  get variant(): TreeVariant | null {
    return this.loadedVariant;
  }

  getConfig(): ResolvedEngineConfig {
    return this.config;
  }

  /**
   * Validate a data set and parse every block. A failing block aborts the load
   * and keeps the previously loaded trees.
   *
   * @throws ZodError on an invalid data set, or any parse/depth error of a block
   */
  load(input: unknown): LoadResult {
    const start = performance.now();
    const dataSet = parseDataSet(input);
    const variant = variantFromDefinition(dataSet.definition);
    const warnings: LookupWarning[] = [];
    const trees = new Map<DataDirection, Tree>();

    const parseStart = performance.now();
    for (const block of dataSet.blocks) {
      if (trees.has(block.direction)) {
        warnings.push({
          code: 'DUPLICATE_BLOCK',
          message: `data set lists '${block.direction}' more than once; the last block is used`,
          severity: 'warning',
          context: { direction: block.direction },
        });
      }
      trees.set(block.direction, parseTree(block.data, variant, this.config.tokenizer));
    }
    const parseMs = elapsedMs(parseStart);

    this.trees = trees;
    this.loadedVariant = variant;

    const depths: Partial<Record<DataDirection, number>> = {};
    for (const [direction, tree] of trees) {
      depths[direction] = tree.depth;
    }

    return {
      name: dataSet.name,
      variant,
      directions: this.directions(),
      depths,
      timings: { totalMs: elapsedMs(start), parseMs, blockCount: dataSet.blocks.length },
      warnings,
    };
  }

  directions(): DataDirection[] {
    return [...this.trees.keys()];
  }

  getTree(direction: DataDirection): Tree {
    const tree = this.trees.get(direction);
    if (!tree) throw new UnknownDirectionError(direction);
    return tree;
  }

  /**
   * @throws UnknownDirectionError if the direction was not loaded
   * @throws ZodError on a non-finite position
   * @throws StructuralMismatchError if the tree cannot satisfy an index table
   */
  lookup(request: LookupRequest): LookupResponse {
    const start = performance.now();
    const tree = this.getTree(request.direction);
    const position = parseIncidentPosition(request.position);
    const warnings = this.config.lookup.warnOutOfRange ? rangeWarnings(position, tree.variant) : [];

    const lookupStart = performance.now();
    const matches = lookupTree(tree, position.x, position.y);
    const lookupMs = elapsedMs(lookupStart);

    return {
      direction: request.direction,
      variant: tree.variant,
      depth: tree.depth,
      matches,
      timings: { totalMs: elapsedMs(start), lookupMs },
      warnings,
    };
  }

  lookupAll(position: IncidentPositionInput): LookupResponse[] {
    return this.directions().map((direction) => this.lookup({ direction, position }));
  }
}

/** One warning per coordinate outside [-1, 1]; y only counts for the anisotropic variant */
function rangeWarnings(position: IncidentPosition, variant: TreeVariant): LookupWarning[] {
  const axes: Array<[string, number]> = [['x', position.x]];
  if (variant === '4') axes.push(['y', position.y]);
  const warnings: LookupWarning[] = [];
  for (const [axis, value] of axes) {
    if (isWithinQueryDomain(value)) continue;
    warnings.push({
      code: 'QUERY_OUT_OF_RANGE',
      message: `${axis} = ${value} lies outside [-1, 1]; the result is not clamped`,
      severity: 'warning',
      context: { axis, value },
    });
  }
  return warnings;
}
