import type { ReadingLabel } from './types.js';

export type SimulationMode = 'normal' | 'abnormal' | 'attack' | 'random';

export const SIMULATION_MODES: readonly SimulationMode[] = ['normal', 'abnormal', 'attack', 'random'];

export interface SimulatedSample {
    bpm: number;
    label?: ReadingLabel;
}

/** Uniform random in [0, 1). */
export type RandomSource = () => number;

function randomInt(min: number, max: number, random: RandomSource): number {
    return min + Math.floor(random() * (max - min + 1));
}

function spike(random: RandomSource): SimulatedSample {
    return { bpm: randomInt(155, 190, random), label: 'simulated_spike' };
}

function elevated(random: RandomSource): SimulatedSample {
    return { bpm: randomInt(121, 150, random) };
}

function depressed(random: RandomSource): SimulatedSample {
    return { bpm: randomInt(35, 44, random) };
}

/**
 * Produce one demo heart-rate sample. `random` mode is mostly resting values with
 * occasional elevated (7%), depressed (2%) and spike (1%) samples.
 */
export function simulateSample(mode: SimulationMode, random: RandomSource = Math.random): SimulatedSample {
    switch (mode) {
        case 'normal':
            return { bpm: randomInt(60, 90, random) };
        case 'abnormal':
            return random() < 0.5 ? elevated(random) : depressed(random);
        case 'attack':
            return spike(random);
        case 'random': {
            const roll = random();
            if (roll < 0.9) return { bpm: randomInt(60, 90, random) };
            if (roll < 0.97) return elevated(random);
            if (roll < 0.99) return depressed(random);
            return spike(random);
        }
    }
}
