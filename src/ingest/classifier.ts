import type { Thresholds } from '../config/env.js';
import { LABEL_CODES, type ReadingLabel, type Tag } from './types.js';

const LABEL_TAGS: Record<ReadingLabel, Tag> = {
    normal: 'normal',
    abnormal: 'abnormal',
    simulated_spike: 'critical',
};

function labelTag(label: ReadingLabel | number | undefined): Tag | undefined {
    if (label === undefined) return undefined;
    const name = typeof label === 'number' ? LABEL_CODES[label] : label;
    return name === undefined ? undefined : LABEL_TAGS[name];
}

export function isOutsideBand(bpm: number, thresholds: Thresholds): boolean {
    return bpm < thresholds.elevatedBand.low || bpm > thresholds.elevatedBand.high;
}

/**
 * Classify one heart-rate value. An explicit label (code 0/1/2 or its name) wins over
 * the thresholds; an unknown label code falls through to the rules.
 */
export function classify(bpm: number, label: ReadingLabel | number | undefined, thresholds: Thresholds): Tag {
    const fromLabel = labelTag(label);
    if (fromLabel) return fromLabel;

    if (bpm < thresholds.low || bpm > thresholds.high) {
        return 'critical';
    }

    if (isOutsideBand(bpm, thresholds)) {
        return 'abnormal';
    }

    return 'normal';
}

/**
 * Upgrade a rule-based `abnormal` tag to `critical` when each of the previous `window`
 * readings was also outside the elevated band. A window of 0 disables escalation.
 *
 * @param recentBpms previous readings, oldest first
 */
export function escalate(tag: Tag, recentBpms: readonly number[], thresholds: Thresholds, window: number): Tag {
    if (tag !== 'abnormal' || window <= 0 || recentBpms.length < window) {
        return tag;
    }

    const persisting = recentBpms.slice(-window).every((bpm) => isOutsideBand(bpm, thresholds));
    return persisting ? 'critical' : tag;
}
