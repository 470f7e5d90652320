/**
 * Split Algorithm
 *
 * Divides each column of a sibling pair in two. The taller parent T and
 * shorter parent C are each replaced by a left and a right child, with
 * child widths summing to the parent's width and child areas summing to
 * the parent's area. The new heights are placed so that in each new
 * pair T's child is the shorter one:
 *
 *   left pair:   T.h < h_tl = T.h + a(1 - T.h) < h_sl = T.h + b(1 - T.h)
 *   right pair:  h_tr = c·C.h < h_sr = d·C.h < C.h
 *
 * The break point z of each parent (the fraction of its width given to
 * the left child) is the unique value that conserves its area.
 */

import {
  Column,
  Role,
  SiblingPair,
  createColumn,
  createPair,
  flipPair,
} from '../column';
import { InfeasibleSplitError } from '../errors';
import { SplitParameters, validateParameters } from '../policy';

export interface SplitResult {
  /** Pair of left children: the next layer's pair at index 2i */
  readonly left: SiblingPair;
  /** Pair of right children: the next layer's pair at index 2i + 1 */
  readonly right: SiblingPair;
  /** Which input column was treated as the taller parent; ties go to treatment */
  readonly taller: Role;
}

/**
 * Break point z = (h - hRight) / (hLeft - hRight), which must lie strictly
 * inside (0, 1) for both children to keep a positive width
 */
function breakPoint(
  name: 'z_t' | 'z_s',
  numerator: number,
  denominator: number,
  details: Record<string, unknown>
): number {
  if (denominator === 0 || !Number.isFinite(denominator)) {
    throw new InfeasibleSplitError(`Split is infeasible: ${name} has a zero denominator`, {
      ...details,
      [name]: { numerator, denominator },
    });
  }

  const z = numerator / denominator;
  if (!Number.isFinite(z) || z <= 0 || z >= 1) {
    throw new InfeasibleSplitError(`Split is infeasible: ${name} = ${z} lies outside (0, 1)`, {
      ...details,
      [name]: z,
    });
  }

  return z;
}

function splitOriented(
  tall: Column,
  short: Column,
  parameters: SplitParameters,
  details: Record<string, unknown>
): { tallLeft: Column; tallRight: Column; shortLeft: Column; shortRight: Column } {
  const { a, b, c, d } = parameters;
  const hT = tall.height;
  const hC = short.height;

  const hTallLeft = hT + a * (1 - hT);
  const hShortLeft = hT + b * (1 - hT);
  const hTallRight = c * hC;
  const hShortRight = d * hC;

  const zT = breakPoint('z_t', hT - c * hC, (1 - a) * hT + a - c * hC, details);
  const zS = breakPoint('z_s', hC - d * hC, (1 - b) * hT + b - d * hC, details);

  return {
    tallLeft: createColumn(hTallLeft, zT * tall.width),
    tallRight: createColumn(hTallRight, (1 - zT) * tall.width),
    shortLeft: createColumn(hShortLeft, zS * short.width),
    shortRight: createColumn(hShortRight, (1 - zS) * short.width),
  };
}

/**
 * Split one sibling pair into two child pairs.
 *
 * If control is taller than treatment the roles are swapped for the
 * computation and swapped back in the result, so the returned pairs
 * always keep treatment as treatment.
 *
 * @param context - Extra fields (layer, pair index, path) attached to any error raised
 * @throws ParameterError if the parameters are out of their domain
 * @throws InfeasibleSplitError if a break point falls outside (0, 1)
 */
export function splitPair(
  pair: SiblingPair,
  parameters: SplitParameters,
  context: Record<string, unknown> = {}
): SplitResult {
  const validated = validateParameters(parameters, context);
  const taller: Role = pair.treatment.height >= pair.control.height ? 'treatment' : 'control';
  const oriented = taller === 'treatment' ? pair : flipPair(pair);

  const details = {
    ...context,
    pair: { treatment: pair.treatment, control: pair.control },
    parameters: validated,
    taller,
  };

  const { tallLeft, tallRight, shortLeft, shortRight } = splitOriented(
    oriented.treatment,
    oriented.control,
    validated,
    details
  );

  const left = createPair(tallLeft, shortLeft);
  const right = createPair(tallRight, shortRight);

  return Object.freeze({
    left: taller === 'treatment' ? left : flipPair(left),
    right: taller === 'treatment' ? right : flipPair(right),
    taller,
  });
}
