import { EFFECT_PRESETS, TOGGLE_EFFECTS } from '@cadence/shared';
import type {
  EffectPreset,
  EffectState,
  FilterGraphSpec,
  FilterStage,
  ToggleEffect,
} from '@cadence/shared';
import { InvalidParameterError } from '../errors';

// ---------------------------------------------------------------------------
// Effect chain builder
//
// Maps a session's EffectState to the ordered filter graph the transcoder
// applies. Everything here is pure. The same EffectState always produces the
// same FilterGraphSpec, down to key order, so JSON.stringify of two specs
// compares byte for byte.
//
// Stage order is fixed and independent of the order effects were toggled in:
//
//   bass → karaoke → nightcore → echo → rotation → volume
//
// Nightcore runs before echo: the echo delay is in wall-clock time.
// ---------------------------------------------------------------------------

export const MAX_BASS_BOOST = 20;
export const MAX_VOLUME = 200;

// Product-tuning constants. Changing any of these changes the golden strings
// pinned in test/effects.test.ts.
export const BASS_GAIN_DB_PER_LEVEL = 0.75;
export const BASS_FREQUENCY_HZ = 110;
export const BASS_WIDTH = 0.6;
export const KARAOKE_LEVEL = 1;
export const NIGHTCORE_RATE = 1.3;
export const ECHO_IN_GAIN = 0.8;
export const ECHO_OUT_GAIN = 0.88;
export const ECHO_DELAY_MS = 500;
export const ECHO_DECAY = 0.3;
export const ROTATION_HZ = 0.2;

/** Output sample rate of the transcoder; nightcore resamples back to it. */
export const OUTPUT_SAMPLE_RATE = 48_000;

export const DEFAULT_EFFECTS: EffectState = Object.freeze({
  bassBoostLevel: 0,
  karaoke: false,
  nightcore: false,
  threeD: false,
  echo: false,
  volume: 100,
});

// ---------------------------------------------------------------------------
// buildFilterGraph
// ---------------------------------------------------------------------------
export function buildFilterGraph(effects: EffectState): FilterGraphSpec {
  const stages: FilterStage[] = [];

  if (effects.bassBoostLevel > 0) {
    stages.push({
      name: 'bass',
      params: {
        gainDb: effects.bassBoostLevel * BASS_GAIN_DB_PER_LEVEL,
        frequencyHz: BASS_FREQUENCY_HZ,
        width: BASS_WIDTH,
      },
    });
  }

  if (effects.karaoke) {
    stages.push({ name: 'karaoke', params: { level: KARAOKE_LEVEL } });
  }

  if (effects.nightcore) {
    stages.push({ name: 'nightcore', params: { rate: NIGHTCORE_RATE } });
  }

  if (effects.echo) {
    stages.push({
      name: 'echo',
      params: {
        inGain: ECHO_IN_GAIN,
        outGain: ECHO_OUT_GAIN,
        delayMs: ECHO_DELAY_MS,
        decay: ECHO_DECAY,
      },
    });
  }

  if (effects.threeD) {
    stages.push({ name: 'rotation', params: { hz: ROTATION_HZ } });
  }

  if (effects.volume !== 100) {
    stages.push({ name: 'volume', params: { gain: effects.volume / 100 } });
  }

  return { stages };
}

// ---------------------------------------------------------------------------
// renderFilterGraph
//
// Turns a spec into the value of FFmpeg's -af option, or null when there is
// nothing to apply (FFmpeg then runs without -af at all).
// ---------------------------------------------------------------------------
export function renderFilterGraph(spec: FilterGraphSpec): string | null {
  if (spec.stages.length === 0) return null;
  return spec.stages.map(renderStage).join(',');
}

function renderStage(stage: FilterStage): string {
  const p = stage.params;
  switch (stage.name) {
    case 'bass':
      return `bass=g=${p.gainDb}:f=${p.frequencyHz}:w=${p.width}`;
    case 'karaoke':
      // Centre-channel cancellation: vocals are usually mixed identically
      // into both channels, so subtracting one side from the other drops them.
      return `pan=stereo|c0=c0-${p.level}*c1|c1=c1-${p.level}*c0`;
    case 'nightcore':
      return `asetrate=${Math.round(OUTPUT_SAMPLE_RATE * p.rate)},aresample=${OUTPUT_SAMPLE_RATE}`;
    case 'echo':
      return `aecho=${p.inGain}:${p.outGain}:${p.delayMs}:${p.decay}`;
    case 'rotation':
      return `apulsator=hz=${p.hz}`;
    case 'volume':
      return `volume=${p.gain}`;
  }
}

/**
 * How much faster than real time the graph plays the source. Positions are
 * kept in track time, so one 20 ms output frame under nightcore covers 26 ms
 * of the original track.
 */
export function playbackRate(spec: FilterGraphSpec): number {
  let rate = 1;
  for (const stage of spec.stages) {
    if (stage.name === 'nightcore') rate *= stage.params.rate;
  }
  return rate;
}

// ---------------------------------------------------------------------------
// EffectState transitions
//
// Each returns a new EffectState or throws InvalidParameterError without
// touching the input. Values are never clamped.
// ---------------------------------------------------------------------------

export function setBassBoost(effects: EffectState, level: number): EffectState {
  if (!Number.isInteger(level) || level < 0 || level > MAX_BASS_BOOST) {
    throw new InvalidParameterError(
      `Bass boost must be an integer between 0 and ${MAX_BASS_BOOST} (got ${level}).`,
    );
  }
  return { ...effects, bassBoostLevel: level };
}

export function setVolume(effects: EffectState, volume: number): EffectState {
  if (!Number.isInteger(volume) || volume < 0 || volume > MAX_VOLUME) {
    throw new InvalidParameterError(
      `Volume must be an integer between 0 and ${MAX_VOLUME} (got ${volume}).`,
    );
  }
  return { ...effects, volume };
}

export function setEffect(effects: EffectState, name: ToggleEffect, enabled: boolean): EffectState {
  switch (name) {
    case 'karaoke':
      return { ...effects, karaoke: enabled };
    case 'nightcore':
      return { ...effects, nightcore: enabled };
    case 'threeD':
      return { ...effects, threeD: enabled };
    case 'echo':
      return { ...effects, echo: enabled };
  }
}

export function isToggleEffect(name: string): name is ToggleEffect {
  return TOGGLE_EFFECTS.some((effect) => effect === name);
}

// ---------------------------------------------------------------------------
// Presets
//
// A preset replaces the whole effect state: everything it does not name goes
// back to the default.
// ---------------------------------------------------------------------------

const PRESET_EFFECTS: Record<EffectPreset, EffectState> = {
  gaming: { ...DEFAULT_EFFECTS, bassBoostLevel: 8 },
  movie: { ...DEFAULT_EFFECTS, bassBoostLevel: 10 },
  party: { ...DEFAULT_EFFECTS, bassBoostLevel: 15 },
};

// "cinema" is accepted as another name for the movie preset.
const PRESET_ALIASES: Record<string, EffectPreset> = { cinema: 'movie' };

/**
 * Look up a preset by name, case-insensitively.
 */
export function presetEffects(name: string): EffectState {
  const key = name.trim().toLowerCase();
  const preset = EFFECT_PRESETS.find((candidate) => candidate === key) ?? PRESET_ALIASES[key];
  if (!preset) {
    throw new InvalidParameterError(
      `Unknown preset "${name}". Expected one of ${EFFECT_PRESETS.join(', ')}.`,
    );
  }
  return { ...PRESET_EFFECTS[preset] };
}
