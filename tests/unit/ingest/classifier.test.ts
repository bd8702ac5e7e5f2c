import { classify, escalate } from '../../../src/ingest/classifier.js';
import type { Thresholds } from '../../../src/config/env.js';

describe('classify', () => {
    const thresholds: Thresholds = {
        low: 40,
        high: 180,
        elevatedBand: { low: 45, high: 120 },
    };

    describe('rule-based thresholds', () => {
        it('tags values inside the band as normal', () => {
            expect(classify(45, undefined, thresholds)).toBe('normal');
            expect(classify(72, undefined, thresholds)).toBe('normal');
            expect(classify(120, undefined, thresholds)).toBe('normal');
        });

        it('tags values between the band and the thresholds as abnormal', () => {
            expect(classify(44, undefined, thresholds)).toBe('abnormal');
            expect(classify(40, undefined, thresholds)).toBe('abnormal');
            expect(classify(121, undefined, thresholds)).toBe('abnormal');
            expect(classify(180, undefined, thresholds)).toBe('abnormal');
        });

        it('tags values beyond the thresholds as critical', () => {
            expect(classify(39, undefined, thresholds)).toBe('critical');
            expect(classify(181, undefined, thresholds)).toBe('critical');
            expect(classify(210, undefined, thresholds)).toBe('critical');
        });

        it('never throws and always returns the same tag', () => {
            for (const bpm of [-1, 0, 1, 59.5, 299, 1e9, Number.NaN]) {
                const first = classify(bpm, undefined, thresholds);
                expect(['normal', 'abnormal', 'critical']).toContain(first);
                expect(classify(bpm, undefined, thresholds)).toBe(first);
            }
        });
    });

    describe('explicit labels', () => {
        it('lets numeric labels override the rules', () => {
            expect(classify(999, 0, thresholds)).toBe('normal');
            expect(classify(72, 1, thresholds)).toBe('abnormal');
            expect(classify(72, 2, thresholds)).toBe('critical');
        });

        it('accepts label names', () => {
            expect(classify(210, 'normal', thresholds)).toBe('normal');
            expect(classify(72, 'simulated_spike', thresholds)).toBe('critical');
        });

        it('falls back to the rules for unknown codes', () => {
            expect(classify(72, 5, thresholds)).toBe('normal');
            expect(classify(210, 5, thresholds)).toBe('critical');
        });
    });
});

describe('escalate', () => {
    const thresholds: Thresholds = {
        low: 40,
        high: 150,
        elevatedBand: { low: 45, high: 120 },
    };

    it('upgrades abnormal when the whole window was out of band', () => {
        expect(escalate('abnormal', [70, 130, 125], thresholds, 2)).toBe('critical');
    });

    it('keeps abnormal when any reading in the window was in band', () => {
        expect(escalate('abnormal', [130, 70], thresholds, 2)).toBe('abnormal');
    });

    it('keeps abnormal when there is not enough history', () => {
        expect(escalate('abnormal', [130], thresholds, 2)).toBe('abnormal');
    });

    it('does nothing with a zero window or for other tags', () => {
        expect(escalate('abnormal', [130, 130], thresholds, 0)).toBe('abnormal');
        expect(escalate('normal', [130, 130], thresholds, 2)).toBe('normal');
    });
});
