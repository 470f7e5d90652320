import { describe, it, expect } from 'vitest';
import * as d3 from 'd3';
import { layoutLayer, scaleSegments } from '../../chart';
import { createRootPair } from '../../core/column';
import { SimpsonTree } from '../../core/tree';

const layer1 = () =>
  new SimpsonTree(
    createRootPair({ height: 0.6, width: 0.5 }, { height: 0.4, width: 0.5 })
  ).layer(1);

describe('layoutLayer', () => {
  it('should place treatment columns before control columns', () => {
    const segments = layoutLayer(layer1(), { palette: ['red', 'blue'] });

    expect(segments.map((s) => [s.group, s.label, s.hatched, s.color])).toEqual([
      ['treatment', '0', false, 'red'],
      ['treatment', '1', false, 'blue'],
      ['control', '0', true, 'red'],
      ['control', '1', true, 'blue'],
    ]);
  });

  it('should lay columns edge to edge across the population', () => {
    const segments = layoutLayer(layer1());
    const expectedEdges = [
      [0, 0.35],
      [0.35, 0.5],
      [0.5, 0.65],
      [0.65, 1],
    ];

    segments.forEach((segment, i) => {
      expect(segment.x0).toBeCloseTo(expectedEdges[i][0], 12);
      expect(segment.x1).toBeCloseTo(expectedEdges[i][1], 12);
    });
    expect(segments.map((s) => Number(s.height.toFixed(12)))).toEqual([0.78, 0.18, 0.82, 0.22]);
  });

  it('should use the Tableau palette by default', () => {
    const [first, second] = layoutLayer(layer1());

    expect(first.color).toBe(d3.schemeTableau10[0]);
    expect(second.color).toBe(d3.schemeTableau10[1]);
  });
});

describe('scaleSegments', () => {
  it('should map segments onto pixels with the rate axis pointing up', () => {
    const [rect] = scaleSegments(layoutLayer(layer1()), { width: 200, height: 100 });

    expect(rect.x).toBeCloseTo(0, 9);
    expect(rect.width).toBeCloseTo(70, 9);
    expect(rect.y).toBeCloseTo(22, 9);
    expect(rect.height).toBeCloseTo(78, 9);
    expect(rect.segment.group).toBe('treatment');
  });

  it('should return nothing for no segments', () => {
    expect(scaleSegments([], { width: 200, height: 100 })).toEqual([]);
  });
});
