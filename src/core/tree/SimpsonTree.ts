/**
 * Simpson tree generator
 *
 * The tree is conceptually infinite. It is stored as an array of layers
 * indexed by depth and grown on demand: asking for layer k builds every
 * missing layer up to k and nothing deeper. Pair i of layer k is the
 * parent of pairs 2i and 2i + 1 of layer k + 1.
 */

import { SiblingPair, assertRootPair } from '../column';
import { DomainError, ErrorCode, ParameterError, SimpsonError } from '../errors';
import {
  DEFAULT_PARAMETERS,
  ParameterPolicy,
  SplitParameters,
  TreePosition,
  fixedPolicy,
  positionOf,
} from '../policy';
import { SplitResult, splitPair } from '../split';

export type Layer = readonly SiblingPair[];

export interface SimpsonTreeOptions {
  /** Parameters for each split (default: DEFAULT_PARAMETERS everywhere) */
  policy?: ParameterPolicy;
  /** Log each layer as it is built */
  verbose?: boolean;
  /** Deepest layer that may be requested; layer k holds 2^k pairs */
  maxDepth?: number;
}

const DEFAULT_MAX_DEPTH = 20;
const LARGE_DEPTH_WARNING = 16;

export class SimpsonTree {
  private readonly cache: Layer[];
  private readonly policy: ParameterPolicy;
  private readonly verbose: boolean;
  private readonly maxDepth: number;
  private warnedLargeDepth = false;

  /**
   * @throws DomainError unless the root pair's widths sum to 1
   */
  constructor(rootPair: SiblingPair, options: SimpsonTreeOptions = {}) {
    this.policy = options.policy ?? fixedPolicy(DEFAULT_PARAMETERS);
    this.verbose = options.verbose ?? false;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

    if (!Number.isInteger(this.maxDepth) || this.maxDepth < 0) {
      throw new SimpsonError(
        ErrorCode.INVALID_DEPTH,
        `maxDepth must be a non-negative integer, got ${this.maxDepth}`,
        { maxDepth: this.maxDepth }
      );
    }

    assertRootPair(rootPair);
    this.cache = [Object.freeze([rootPair])];
  }

  /**
   * Deepest layer built so far
   */
  get cachedDepth(): number {
    return this.cache.length - 1;
  }

  /**
   * Layer `depth`, building any missing shallower layers first
   */
  layer(depth: number): Layer {
    this.checkDepth(depth);

    while (this.cache.length <= depth) {
      const next = this.buildNext(this.cache[this.cache.length - 1], this.cache.length - 1);
      this.cache.push(next);

      if (this.verbose) {
        console.log(`SimpsonTree: built layer ${this.cachedDepth} (${next.length} pairs)`);
      }
    }

    return this.cache[depth];
  }

  /**
   * Layers 0 through `depth`
   */
  layers(depth: number): Layer[] {
    this.layer(depth);
    return this.cache.slice(0, depth + 1);
  }

  private checkDepth(depth: number): void {
    if (!Number.isInteger(depth) || depth < 0 || depth > this.maxDepth) {
      throw new SimpsonError(
        ErrorCode.INVALID_DEPTH,
        `Depth must be an integer in [0, ${this.maxDepth}], got ${depth}`,
        { depth, maxDepth: this.maxDepth }
      );
    }

    if (depth > LARGE_DEPTH_WARNING && depth > this.cachedDepth && !this.warnedLargeDepth) {
      this.warnedLargeDepth = true;
      console.warn(`SimpsonTree: layer ${depth} holds ${2 ** depth} pairs`);
    }
  }

  /**
   * Split every pair of `parent`. The new layer is only published once
   * every split has succeeded, so the cache never holds a partial layer.
   */
  private buildNext(parent: Layer, depth: number): Layer {
    const next: SiblingPair[] = [];

    parent.forEach((pair, index) => {
      const position = positionOf(depth, index);
      const context = { layer: depth, pairIndex: index, path: position.path };
      const { left, right } = this.split(pair, this.parametersAt(position, context), context);
      next.push(left, right);
    });

    return Object.freeze(next);
  }

  /**
   * Infeasible splits already carry the context; a child column that
   * underflows out of its domain does not.
   */
  private split(
    pair: SiblingPair,
    parameters: SplitParameters,
    context: { layer: number; pairIndex: number; path: string }
  ): SplitResult {
    try {
      return splitPair(pair, parameters, context);
    } catch (error) {
      if (error instanceof DomainError) {
        throw new DomainError(
          `${error.message} (layer ${context.layer}, pair ${context.pairIndex})`,
          { ...error.context, ...context }
        );
      }
      throw error;
    }
  }

  private parametersAt(position: TreePosition, context: Record<string, unknown>): SplitParameters {
    try {
      return this.policy(position);
    } catch (error) {
      if (error instanceof ParameterError) {
        throw new ParameterError(
          `${error.message} (layer ${position.depth}, pair ${position.index})`,
          { ...error.context, ...context }
        );
      }
      throw error;
    }
  }
}

/**
 * Build layers 0 through `depth` from a root pair
 */
export function buildSimpsonTree(
  rootPair: SiblingPair,
  depth: number,
  policy?: ParameterPolicy
): Layer[] {
  return new SimpsonTree(rootPair, { policy }).layers(depth);
}
