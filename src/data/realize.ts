/**
 * Data realization
 *
 * Turns the proportions of one layer into integer patient counts for a
 * population of a given size. Each column contributes two cells,
 * recovered (h·w·N) and not recovered ((1 - h)·w·N). Counts are
 * allocated with the largest-remainder method over every cell of the
 * layer: each cell gets the floor of its ideal value, and the people
 * left over go one each to the cells with the largest fractional parts.
 * The counts therefore always add up to exactly N, which requires the
 * layer's widths to account for the whole population.
 */

import { Column, approxEqual } from '../core/column';
import { ErrorCode, SimpsonError } from '../core/errors';
import { pathOf } from '../core/policy';
import { Layer, sideTotals } from '../core/tree';

export interface GroupCounts {
  recovered: number;
  notRecovered: number;
}

export interface PairCounts {
  /** Sub-population label: the pair's binary path from the root */
  label: string;
  treatment: GroupCounts;
  control: GroupCounts;
}

function cellsOf(column: Column, sampleSize: number): [number, number] {
  const people = column.width * sampleSize;
  return [column.height * people, (1 - column.height) * people];
}

/**
 * Integer counts for every pair of `layer`, summing to `sampleSize`
 */
export function realizeLayer(layer: Layer, sampleSize: number): PairCounts[] {
  if (!Number.isSafeInteger(sampleSize) || sampleSize <= 0) {
    throw new SimpsonError(
      ErrorCode.INVALID_INPUT,
      `Sample size must be a positive integer, got ${sampleSize}`,
      { sampleSize }
    );
  }

  const totals = sideTotals(layer);
  const width = totals.treatment.width + totals.control.width;
  if (!approxEqual(width, 1)) {
    throw new SimpsonError(
      ErrorCode.INVALID_INPUT,
      `Layer widths must sum to 1 to be realized, got ${width}`,
      { width, pairs: layer.length }
    );
  }

  // Four cells per pair: treatment recovered/not, control recovered/not
  const ideal = layer.flatMap((pair) => [
    ...cellsOf(pair.treatment, sampleSize),
    ...cellsOf(pair.control, sampleSize),
  ]);
  const counts = ideal.map(Math.floor);

  const assigned = counts.reduce((sum, count) => sum + count, 0);
  const leftover = sampleSize - assigned;

  // Only reachable when N is large enough to magnify the width tolerance
  if (leftover < 0 || leftover > ideal.length) {
    throw new SimpsonError(
      ErrorCode.INVALID_INPUT,
      `Layer widths sum to ${width}, too far from 1 to realize ${sampleSize} people exactly`,
      { width, sampleSize, assigned }
    );
  }

  const byRemainder = ideal
    .map((value, index) => ({ index, remainder: value - counts[index] }))
    .sort((x, y) => y.remainder - x.remainder || x.index - y.index);

  for (let i = 0; i < leftover; i++) {
    counts[byRemainder[i].index] += 1;
  }

  const depth = Math.ceil(Math.log2(layer.length));
  return layer.map((_, i) => ({
    label: pathOf(depth, i),
    treatment: { recovered: counts[4 * i], notRecovered: counts[4 * i + 1] },
    control: { recovered: counts[4 * i + 2], notRecovered: counts[4 * i + 3] },
  }));
}

function describeGroup(label: string, group: GroupCounts): string {
  const total = group.recovered + group.notRecovered;
  const sentence = `${group.recovered} out of ${total} people recovered.`;
  return label === '' ? sentence : `In sub-population ${label}, ${sentence}`;
}

/**
 * Plain-text report of a realized layer
 */
export function formatRealization(counts: PairCounts[], layerIndex: number): string {
  return [
    `***LAYER ${layerIndex}***`,
    '',
    'TREATMENT GROUP',
    ...counts.map((pair) => describeGroup(pair.label, pair.treatment)),
    '',
    'CONTROL GROUP',
    ...counts.map((pair) => describeGroup(pair.label, pair.control)),
  ].join('\n');
}
