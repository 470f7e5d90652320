import * as d3 from 'd3';
import { Role } from '../core/column';
import { pathOf } from '../core/policy';
import { Layer } from '../core/tree';

/**
 * Bar chart geometry for one layer.
 *
 * All treatment columns are laid out left to right, followed by all
 * control columns, each as wide as its share of the population, so the
 * x axis spans [0, 1]. The two columns of a pair share a color and the
 * control columns are hatched. Drawing is left to the caller.
 */
export interface BarSegment {
  x0: number;
  x1: number;
  height: number;
  group: Role;
  /** Binary path of the pair the column belongs to */
  label: string;
  hatched: boolean;
  color: string;
}

export interface LayoutOptions {
  /** Colors cycled over pair indices (default: d3.schemeTableau10) */
  palette?: readonly string[];
}

export function layoutLayer(layer: Layer, options: LayoutOptions = {}): BarSegment[] {
  const palette = options.palette ?? d3.schemeTableau10;
  const depth = Math.ceil(Math.log2(layer.length));

  const columns = [
    ...layer.map((pair, i) => ({ column: pair.treatment, group: 'treatment' as const, i })),
    ...layer.map((pair, i) => ({ column: pair.control, group: 'control' as const, i })),
  ];
  const edges = [0, ...d3.cumsum(columns, (c) => c.column.width)];

  return columns.map(({ column, group, i }, k) => ({
    x0: edges[k],
    x1: edges[k + 1],
    height: column.height,
    group,
    label: pathOf(depth, i),
    hatched: group === 'control',
    color: palette[i % palette.length],
  }));
}

export interface PixelRect {
  x: number;
  y: number;
  width: number;
  height: number;
  segment: BarSegment;
}

/**
 * Map segments onto a chart area of the given pixel size, with the
 * recovery rate axis fixed to [0, 1] and pointing up
 */
export function scaleSegments(
  segments: BarSegment[],
  size: { width: number; height: number }
): PixelRect[] {
  const extent = d3.max(segments, (s) => s.x1) ?? 1;
  const xScale = d3.scaleLinear().domain([0, extent]).range([0, size.width]);
  const yScale = d3.scaleLinear().domain([0, 1]).range([size.height, 0]);

  return segments.map((segment) => ({
    x: xScale(segment.x0),
    y: yScale(segment.height),
    width: xScale(segment.x1) - xScale(segment.x0),
    height: size.height - yScale(segment.height),
    segment,
  }));
}
