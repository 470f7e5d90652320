/**
 * Read-only views over layers, and the checks built on them
 */

import { SiblingPair, area, createPair, merge } from '../column';
import { ErrorCode, SimpsonError } from '../errors';
import { Layer, SimpsonTree } from './SimpsonTree';

/** [treatmentHeight, treatmentWidth, controlHeight, controlWidth] */
export type PairTuple = readonly [number, number, number, number];

/** Which side has the higher recovery rate */
export type Ordering = 'treatment' | 'control' | 'tie';

export interface SideTotals {
  width: number;
  /** Share of the whole population that is on this side and recovered */
  area: number;
}

export function layerTuples(layer: Layer): readonly PairTuple[] {
  return layer.map(
    ({ treatment, control }) =>
      [treatment.height, treatment.width, control.height, control.width] as const
  );
}

export function sideTotals(layer: Layer): { treatment: SideTotals; control: SideTotals } {
  const totals = {
    treatment: { width: 0, area: 0 },
    control: { width: 0, area: 0 },
  };

  for (const pair of layer) {
    totals.treatment.width += pair.treatment.width;
    totals.treatment.area += area(pair.treatment);
    totals.control.width += pair.control.width;
    totals.control.area += area(pair.control);
  }

  return totals;
}

/**
 * Rebuild the parent layer by merging pairs 2i and 2i + 1 side by side
 */
export function mergeLayer(layer: Layer): Layer {
  if (layer.length === 0 || layer.length % 2 !== 0) {
    throw new SimpsonError(
      ErrorCode.INVALID_INPUT,
      `Only a layer with an even, non-zero number of pairs can be merged, got ${layer.length}`,
      { pairs: layer.length }
    );
  }

  const parent: SiblingPair[] = [];
  for (let i = 0; i < layer.length; i += 2) {
    const left = layer[i];
    const right = layer[i + 1];
    parent.push(
      createPair(merge(left.treatment, right.treatment), merge(left.control, right.control))
    );
  }

  return Object.freeze(parent);
}

function compareRates(treatmentRate: number, controlRate: number): Ordering {
  if (treatmentRate > controlRate) return 'treatment';
  if (controlRate > treatmentRate) return 'control';
  return 'tie';
}

export function pairOrdering(pair: SiblingPair): Ordering {
  return compareRates(pair.treatment.height, pair.control.height);
}

export interface LayerReversal {
  depth: number;
  pairOrderings: Ordering[];
  /** Ordering shared by every pair in the layer, or 'mixed' */
  ordering: Ordering | 'mixed';
  /** Ordering of the two sides pooled over the whole layer */
  pooled: Ordering;
  /** Every pair flips the ordering of the layer above (null at layer 0) */
  reversesParent: boolean | null;
}

export interface ReversalReport {
  layers: LayerReversal[];
  /** Every layer below the root reverses its parent */
  reversesEveryLayer: boolean;
}

function isStrict(ordering: Ordering | 'mixed'): ordering is 'treatment' | 'control' {
  return ordering === 'treatment' || ordering === 'control';
}

/**
 * Check layer by layer whether the ordering really flips. Conservation is
 * guaranteed for any valid parameters; the reversal is not, so it has to
 * be checked for the parameters in use.
 */
export function reversalReport(tree: SimpsonTree, depth: number): ReversalReport {
  const layers: LayerReversal[] = [];

  tree.layers(depth).forEach((layer, k) => {
    const pairOrderings = layer.map(pairOrdering);
    const ordering = pairOrderings.every((o) => o === pairOrderings[0])
      ? pairOrderings[0]
      : 'mixed';

    const totals = sideTotals(layer);
    const pooled = compareRates(
      totals.treatment.area / totals.treatment.width,
      totals.control.area / totals.control.width
    );

    let reversesParent: boolean | null = null;
    if (k > 0) {
      const above = layers[k - 1].ordering;
      reversesParent = isStrict(ordering) && isStrict(above) && ordering !== above;
    }

    layers.push({ depth: k, pairOrderings, ordering, pooled, reversesParent });
  });

  return {
    layers,
    reversesEveryLayer: layers.every((layer) => layer.reversesParent !== false),
  };
}
