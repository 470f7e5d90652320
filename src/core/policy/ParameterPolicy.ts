/**
 * Parameter policies
 *
 * Every split takes four free parameters (a, b, c, d). a and b place the
 * two new heights above the taller column's height, as fractions of the
 * headroom left below 1; c and d place the two new heights below the
 * shorter column's height, as fractions of that height. A policy decides
 * which four values each split in the tree gets.
 */

import { ParameterError } from '../errors';
import { RNG } from '../math/random';

export interface SplitParameters {
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
}

/**
 * Where a split happens in the tree
 */
export interface TreePosition {
  /** Layer index of the pair being split (0 for the root pair) */
  depth: number;
  /** Index of the pair within its layer */
  index: number;
  /** Binary path from the root, most significant step first ('' for the root) */
  path: string;
}

export type ParameterPolicy = (position: TreePosition) => SplitParameters;

/**
 * Chosen to give easily read charts: the new heights sit just either
 * side of the midpoint of each gap.
 */
export const DEFAULT_PARAMETERS: SplitParameters = Object.freeze({
  a: 9 / 20,
  b: 11 / 20,
  c: 9 / 20,
  d: 11 / 20,
});

function inOpenUnit(value: number): boolean {
  return Number.isFinite(value) && value > 0 && value < 1;
}

/**
 * Enforce 0 < a < b < 1 and 0 < c < d < 1
 *
 * @returns a frozen copy of the parameters
 */
export function validateParameters(
  parameters: SplitParameters,
  context: Record<string, unknown> = {}
): SplitParameters {
  const { a, b, c, d } = parameters;
  const details = { ...context, a, b, c, d };

  for (const [name, value] of Object.entries({ a, b, c, d })) {
    if (!inOpenUnit(value)) {
      throw new ParameterError(`Split parameter ${name} must lie in (0, 1), got ${value}`, details);
    }
  }

  if (a >= b) {
    throw new ParameterError(`Split parameters must satisfy a < b, got a=${a}, b=${b}`, details);
  }

  if (c >= d) {
    throw new ParameterError(`Split parameters must satisfy c < d, got c=${c}, d=${d}`, details);
  }

  return Object.freeze({ a, b, c, d });
}

/**
 * The binary path of pair `index` in layer `depth`
 */
export function pathOf(depth: number, index: number): string {
  return depth === 0 ? '' : index.toString(2).padStart(depth, '0');
}

export function positionOf(depth: number, index: number): TreePosition {
  return { depth, index, path: pathOf(depth, index) };
}

/**
 * Same parameters for every split
 */
export function fixedPolicy(parameters: SplitParameters = DEFAULT_PARAMETERS): ParameterPolicy {
  const validated = validateParameters(parameters);
  return () => validated;
}

/**
 * Parameters computed from the split's position; every result is validated
 */
export function positionalPolicy(
  choose: (position: TreePosition) => SplitParameters
): ParameterPolicy {
  return (position) =>
    validateParameters(choose(position), {
      depth: position.depth,
      index: position.index,
      path: position.path,
    });
}

export interface JitterOptions {
  seed: number;
  /** Maximum absolute offset applied to each parameter */
  spread: number;
  base?: SplitParameters;
}

/**
 * Perturb the base parameters independently at every position.
 *
 * Each position draws from its own generator seeded with
 * (seed, depth, index), so a split's parameters depend only on where it
 * is, not on the order splits are made in. Offsets that push a value out
 * of its domain raise ParameterError.
 */
export function jitteredPolicy(options: JitterOptions): ParameterPolicy {
  const { seed, spread } = options;
  const base = validateParameters(options.base ?? DEFAULT_PARAMETERS);

  if (!Number.isFinite(spread) || spread < 0) {
    throw new ParameterError(`Jitter spread must be a non-negative number, got ${spread}`, {
      spread,
    });
  }

  return positionalPolicy((position) => {
    const rng = new RNG([seed, position.depth, position.index]);
    const offset = () => rng.real(-spread, spread);
    return {
      a: base.a + offset(),
      b: base.b + offset(),
      c: base.c + offset(),
      d: base.d + offset(),
    };
  });
}
