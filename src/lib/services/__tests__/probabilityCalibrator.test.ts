import { describe, it, expect } from 'vitest';
import {
    defaultCalibrator,
    getCalibrationInfo,
    PiecewiseSigmoidCalibrator,
    scoreToProbability,
    validateCalibration,
    type ProbabilityCalibrator,
} from '../probabilityCalibrator';

describe('PiecewiseSigmoidCalibrator', () => {
    const calibrator = new PiecewiseSigmoidCalibrator();

    it('meets the knees of the curve', () => {
        expect(calibrator.toProbability(0)).toBe(0.35);
        expect(calibrator.toProbability(20)).toBeCloseTo(0.45, 10);
        expect(calibrator.toProbability(60)).toBeCloseTo(0.58, 10);
        expect(calibrator.toProbability(100)).toBeCloseTo(0.72, 10);
    });

    it('interpolates inside each segment', () => {
        expect(calibrator.toProbability(10)).toBeCloseTo(0.4, 10);
        expect(calibrator.toProbability(40)).toBeCloseTo(0.515, 10);
        expect(calibrator.toProbability(80)).toBeCloseTo(0.65, 10);
    });

    it('clamps out-of-range and NaN scores', () => {
        expect(calibrator.toProbability(-50)).toBe(calibrator.toProbability(0));
        expect(calibrator.toProbability(150)).toBe(calibrator.toProbability(100));
        expect(calibrator.toProbability(Number.NaN)).toBe(0.35);
    });

    it('is monotonic and bounded over a fine sweep', () => {
        let previous = 0;
        for (let score = 0; score <= 100; score += 0.1) {
            const p = calibrator.toProbability(score);
            expect(p).toBeGreaterThanOrEqual(previous);
            expect(p).toBeGreaterThanOrEqual(0.35);
            expect(p).toBeLessThanOrEqual(0.72);
            previous = p;
        }
    });
});

describe('validateCalibration', () => {
    it('accepts the default curve', () => {
        expect(validateCalibration()).toEqual({ valid: true, monotonic: true, inRange: true, violations: [] });
    });

    it('reports a decreasing calibrator', () => {
        const inverted: ProbabilityCalibrator = { name: 'inverted', toProbability: s => 0.72 - s / 1000 };
        const result = validateCalibration(inverted, 50);
        expect(result.monotonic).toBe(false);
        expect(result.inRange).toBe(true);
        expect(result.violations).toHaveLength(2);
        expect(result.violations[0]).toMatch(/^Non-monotonic at score 50: /);
    });

    it('reports values outside the bounds', () => {
        const flat: ProbabilityCalibrator = { name: 'flat', toProbability: () => 0.9 };
        const result = validateCalibration(flat, 100);
        expect(result.valid).toBe(false);
        expect(result.inRange).toBe(false);
        expect(result.violations).toHaveLength(2);
    });
});

describe('getCalibrationInfo', () => {
    it('describes the default calibrator', () => {
        const info = getCalibrationInfo();
        expect(info.type).toBe('piecewise_sigmoid');
        expect(info.monotonic).toBe(true);
        expect(info.samples.map(s => s.score)).toEqual([0, 20, 40, 60, 80, 100]);
        expect(info.samples.map(s => s.probability)).toEqual([0.35, 0.45, 0.515, 0.58, 0.65, 0.72]);
    });
});

describe('scoreToProbability', () => {
    it('delegates to the default calibrator', () => {
        expect(scoreToProbability(40)).toBe(defaultCalibrator.toProbability(40));
    });
});
