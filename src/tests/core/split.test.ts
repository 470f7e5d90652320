import { describe, it, expect } from 'vitest';
import {
  SiblingPair,
  area,
  columnsClose,
  createColumn,
  createPair,
  flipPair,
  merge,
} from '../../core/column';
import { InfeasibleSplitError, ParameterError, SimpsonError } from '../../core/errors';
import { DEFAULT_PARAMETERS, SplitParameters } from '../../core/policy';
import { splitPair } from '../../core/split';

const pair = (th: number, tw: number, ch: number, cw: number): SiblingPair =>
  createPair(createColumn(th, tw), createColumn(ch, cw));

const DYADIC: SplitParameters = { a: 0.5, b: 0.75, c: 0.5, d: 0.75 };

describe('splitPair', () => {
  describe('known values', () => {
    it('should split the default root pair', () => {
      const { left, right, taller } = splitPair(pair(0.6, 0.5, 0.4, 0.5), DEFAULT_PARAMETERS);

      expect(taller).toBe('treatment');

      // z_t = 0.42 / 0.6 = 0.7, z_s = 0.18 / 0.6 = 0.3
      expect(left.treatment.height).toBeCloseTo(0.78, 12);
      expect(left.treatment.width).toBeCloseTo(0.35, 12);
      expect(right.treatment.height).toBeCloseTo(0.18, 12);
      expect(right.treatment.width).toBeCloseTo(0.15, 12);

      expect(left.control.height).toBeCloseTo(0.82, 12);
      expect(left.control.width).toBeCloseTo(0.15, 12);
      expect(right.control.height).toBeCloseTo(0.22, 12);
      expect(right.control.width).toBeCloseTo(0.35, 12);
    });

    it('should make the taller parent the shorter child in both new pairs', () => {
      const { left, right } = splitPair(pair(0.6, 0.5, 0.4, 0.5), DEFAULT_PARAMETERS);

      expect(left.treatment.height).toBeLessThan(left.control.height);
      expect(right.treatment.height).toBeLessThan(right.control.height);
    });
  });

  describe('conservation', () => {
    const cases: Array<[string, SiblingPair, SplitParameters]> = [
      ['default root', pair(0.6, 0.5, 0.4, 0.5), DEFAULT_PARAMETERS],
      ['uneven widths', pair(0.9, 0.2, 0.1, 0.8), DEFAULT_PARAMETERS],
      ['close heights', pair(0.51, 0.3, 0.5, 0.7), { a: 0.1, b: 0.9, c: 0.2, d: 0.3 }],
      ['control taller', pair(0.25, 0.6, 0.75, 0.4), { a: 0.3, b: 0.4, c: 0.6, d: 0.7 }],
      ['tiny columns', pair(0.02, 1e-4, 0.01, 3e-4), DEFAULT_PARAMETERS],
    ];

    it.each(cases)('should conserve width and area (%s)', (_, input, parameters) => {
      const { left, right } = splitPair(input, parameters);

      for (const role of ['treatment', 'control'] as const) {
        const parent = input[role];
        const width = left[role].width + right[role].width;
        const recovered = area(left[role]) + area(right[role]);

        expect(Math.abs(width - parent.width)).toBeLessThanOrEqual(1e-9 * parent.width);
        expect(Math.abs(recovered - area(parent))).toBeLessThanOrEqual(1e-9 * area(parent));
      }
    });

    it.each(cases)('should be undone by merging the children (%s)', (_, input, parameters) => {
      const { left, right } = splitPair(input, parameters);

      expect(columnsClose(merge(left.treatment, right.treatment), input.treatment)).toBe(true);
      expect(columnsClose(merge(left.control, right.control), input.control)).toBe(true);
    });
  });

  describe('orientation', () => {
    it('should give the same split up to labels when the pair is reversed', () => {
      const input = pair(0.3, 0.55, 0.7, 0.45);
      const direct = splitPair(input, DEFAULT_PARAMETERS);
      const reversed = splitPair(flipPair(input), DEFAULT_PARAMETERS);

      expect(direct.taller).toBe('control');
      expect(reversed.taller).toBe('treatment');
      expect(direct.left).toEqual(flipPair(reversed.left));
      expect(direct.right).toEqual(flipPair(reversed.right));
    });

    it('should keep each side descended from its own parent', () => {
      const input = pair(0.3, 0.55, 0.7, 0.45);
      const { left, right } = splitPair(input, DEFAULT_PARAMETERS);

      expect(left.treatment.width + right.treatment.width).toBeCloseTo(0.55, 12);
      expect(left.control.width + right.control.width).toBeCloseTo(0.45, 12);
    });

    it('should prefer treatment as taller on a tie', () => {
      expect(splitPair(pair(0.5, 0.5, 0.5, 0.5), DEFAULT_PARAMETERS).taller).toBe('treatment');
    });
  });

  describe('failures', () => {
    it('should reject a break point at the edge of (0, 1)', () => {
      // h_t = 1: z_t = (1 - 0.25) / (0.5 + 0.5 - 0.25) = 1
      const input = pair(1, 0.5, 0.5, 0.5);

      expect(() => splitPair(input, DYADIC)).toThrow(InfeasibleSplitError);

      try {
        splitPair(input, DYADIC, { layer: 3, pairIndex: 5 });
        expect.fail('expected an InfeasibleSplitError');
      } catch (error) {
        const splitError = error as SimpsonError;
        expect(splitError.context?.z_t).toBe(1);
        expect(splitError.context?.layer).toBe(3);
        expect(splitError.context?.pairIndex).toBe(5);
        expect(splitError.context?.pair).toEqual({
          treatment: { height: 1, width: 0.5 },
          control: { height: 0.5, width: 0.5 },
        });
      }
    });

    it('should reject invalid parameters before splitting', () => {
      const input = pair(0.6, 0.5, 0.4, 0.5);

      expect(() => splitPair(input, { a: 0.6, b: 0.5, c: 0.2, d: 0.3 })).toThrow(ParameterError);
      expect(() => splitPair(input, { a: 0.1, b: 0.5, c: 0.2, d: 1 })).toThrow(ParameterError);
    });

    it('should be deterministic', () => {
      const input = pair(0.9, 0.2, 0.1, 0.8);
      expect(splitPair(input, DEFAULT_PARAMETERS)).toEqual(splitPair(input, DEFAULT_PARAMETERS));
    });
  });
});
