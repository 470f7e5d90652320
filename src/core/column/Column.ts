/**
 * Columns and sibling pairs
 *
 * A column is one sub-population drawn as a bar: its height is the
 * recovery rate and its width the sub-population's share of everyone.
 * Its area, height times width, is the share of everyone who is in the
 * sub-population and recovered.
 */

import { DomainError } from '../errors';

export interface Column {
  readonly height: number;
  readonly width: number;
}

/**
 * The treatment and control columns compared at one tree position
 */
export interface SiblingPair {
  readonly treatment: Column;
  readonly control: Column;
}

export type Role = keyof SiblingPair;

/** Relative tolerance used by the conservation checks */
export const DEFAULT_TOLERANCE = 1e-9;

function checkUnitInterval(value: number, field: 'height' | 'width'): void {
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    throw new DomainError(`Column ${field} must lie in (0, 1], got ${value}`, {
      field,
      value,
    });
  }
}

/**
 * Create a frozen column, rejecting heights and widths outside (0, 1]
 */
export function createColumn(height: number, width: number): Column {
  checkUnitInterval(height, 'height');
  checkUnitInterval(width, 'width');
  return Object.freeze({ height, width });
}

export function createPair(treatment: Column, control: Column): SiblingPair {
  return Object.freeze({ treatment, control });
}

/**
 * Create the layer-0 pair. Its two widths must account for the whole
 * population.
 */
export function createRootPair(
  treatment: { height: number; width: number },
  control: { height: number; width: number },
  tolerance: number = DEFAULT_TOLERANCE
): SiblingPair {
  const pair = createPair(
    createColumn(treatment.height, treatment.width),
    createColumn(control.height, control.width)
  );

  assertRootPair(pair, tolerance);
  return pair;
}

/**
 * @throws DomainError unless the pair's widths sum to 1
 */
export function assertRootPair(pair: SiblingPair, tolerance: number = DEFAULT_TOLERANCE): void {
  const total = pair.treatment.width + pair.control.width;
  if (!approxEqual(total, 1, tolerance)) {
    throw new DomainError(`Root widths must sum to 1, got ${total}`, {
      treatmentWidth: pair.treatment.width,
      controlWidth: pair.control.width,
    });
  }
}

export function area(column: Column): number {
  return column.height * column.width;
}

/**
 * Recombine two sibling columns into their parent: widths add and the
 * height is the width-weighted mean of the two heights.
 */
export function merge(x: Column, y: Column): Column {
  const width = x.width + y.width;
  return createColumn((area(x) + area(y)) / width, width);
}

export function approxEqual(
  actual: number,
  expected: number,
  tolerance: number = DEFAULT_TOLERANCE
): boolean {
  const scale = Math.max(Math.abs(actual), Math.abs(expected), 1);
  return Math.abs(actual - expected) <= tolerance * scale;
}

export function columnsClose(
  x: Column,
  y: Column,
  tolerance: number = DEFAULT_TOLERANCE
): boolean {
  return approxEqual(x.height, y.height, tolerance) && approxEqual(x.width, y.width, tolerance);
}

/**
 * Swap treatment and control
 */
export function flipPair(pair: SiblingPair): SiblingPair {
  return createPair(pair.control, pair.treatment);
}
