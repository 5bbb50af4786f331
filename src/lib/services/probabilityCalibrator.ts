// src/lib/services/probabilityCalibrator.ts
// =============================================================================
// SCORE → PROBABILITY CALIBRATION
// Maps an overall 0–100 score to P(target before stop).
// The piecewise curve is the default; an empirically fitted calibrator can be
// dropped in behind the same interface.
// =============================================================================

export interface ProbabilityCalibrator {
    readonly name: string;
    /** Never throws; out-of-range input is clamped */
    toProbability(score: number): number;
}

export interface CalibrationValidation {
    valid: boolean;
    monotonic: boolean;
    inRange: boolean;
    violations: string[];
}

export interface CalibrationInfo {
    type: string;
    monotonic: boolean;
    scoreRange: readonly [number, number];
    probabilityRange: readonly [number, number];
    samples: Array<{ score: number; probability: number }>;
}

const P_MIN = 0.35;
const P_LOW_KNEE = 0.45;
const P_HIGH_KNEE = 0.58;
const P_MAX = 0.72;
const LOW_KNEE_SCORE = 20;
const HIGH_KNEE_SCORE = 60;
const SIGMOID_STEEPNESS = 5;

const sigmoid = (x: number): number => 1 / (1 + Math.exp(-SIGMOID_STEEPNESS * (x - 0.5)));
const SIGMOID_AT_0 = sigmoid(0);
const SIGMOID_AT_1 = sigmoid(1);

/**
 * Default curve:
 *   [0, 20]   linear 0.35 → 0.45
 *   (20, 60]  linear 0.45 → 0.58
 *   (60, 100] logistic 0.58 → 0.72, rescaled so both ends meet the knees
 */
export class PiecewiseSigmoidCalibrator implements ProbabilityCalibrator {
    public readonly name = 'piecewise_sigmoid';

    public toProbability(score: number): number {
        const s = Number.isNaN(score) ? 0 : Math.min(100, Math.max(0, score));

        if (s <= LOW_KNEE_SCORE) {
            return P_MIN + (P_LOW_KNEE - P_MIN) * (s / LOW_KNEE_SCORE);
        }
        if (s <= HIGH_KNEE_SCORE) {
            const x = (s - LOW_KNEE_SCORE) / (HIGH_KNEE_SCORE - LOW_KNEE_SCORE);
            return P_LOW_KNEE + (P_HIGH_KNEE - P_LOW_KNEE) * x;
        }
        const x = (s - HIGH_KNEE_SCORE) / (100 - HIGH_KNEE_SCORE);
        const normalized = (sigmoid(x) - SIGMOID_AT_0) / (SIGMOID_AT_1 - SIGMOID_AT_0);
        return Math.min(P_MAX, P_HIGH_KNEE + (P_MAX - P_HIGH_KNEE) * normalized);
    }
}

export const defaultCalibrator: ProbabilityCalibrator = new PiecewiseSigmoidCalibrator();

export function scoreToProbability(score: number): number {
    return defaultCalibrator.toProbability(score);
}

/**
 * Sweeps 0..100 in `step` increments and checks monotonicity and that every
 * output lies within [minP, maxP].
 */
export function validateCalibration(
    calibrator: ProbabilityCalibrator = defaultCalibrator,
    step = 0.5,
    bounds: readonly [number, number] = [P_MIN, P_MAX]
): CalibrationValidation {
    const violations: string[] = [];
    let monotonic = true;
    let inRange = true;
    let previous = -Infinity;

    for (let score = 0; score <= 100; score += step) {
        const p = calibrator.toProbability(score);
        if (p < previous) {
            monotonic = false;
            violations.push(`Non-monotonic at score ${score}: ${p} < ${previous}`);
        }
        if (p < bounds[0] || p > bounds[1]) {
            inRange = false;
            violations.push(`Out of range at score ${score}: ${p}`);
        }
        previous = p;
    }

    return { valid: monotonic && inRange, monotonic, inRange, violations };
}

export function getCalibrationInfo(calibrator: ProbabilityCalibrator = defaultCalibrator): CalibrationInfo {
    const samples = [0, 20, 40, 60, 80, 100].map(score => ({
        score,
        probability: Number(calibrator.toProbability(score).toFixed(4)),
    }));
    return {
        type: calibrator.name,
        monotonic: validateCalibration(calibrator).monotonic,
        scoreRange: [0, 100],
        probabilityRange: [calibrator.toProbability(0), calibrator.toProbability(100)],
        samples,
    };
}
