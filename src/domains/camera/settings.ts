import { InvalidSetting } from '../../errors';
import type { SettingSpec, SettingValue, SettingsSnapshot } from './types';

export const TRIGGER_TYPES = ['SW Trigger', 'HW Trigger'] as const;
export type TriggerType = (typeof TRIGGER_TYPES)[number];

export const MAX_TRIGGER_COUNT = 65535;

/** Fixed properties of a camera model, read once when it is opened. */
export interface CameraCapabilities {
  sensorWidth: number;
  sensorHeight: number;
  color: boolean;
  exposureRangeMs: [number, number];
  binningXRange: [number, number];
  binningYRange: [number, number];
  gainRange: [number, number];
  blackLevelRange: [number, number];
  maxFrameQueueSize: number;
  supportedFreqs: string[];
  supportedTaps: string[];
}

/** Current value of every setting, keyed by wire name. */
export interface CameraValues {
  exposure_ms: number;
  binning_x: number;
  binning_y: number;
  roi_x: number;
  roi_y: number;
  roi_width: number;
  roi_height: number;
  trigger_type: TriggerType;
  trigger_count: number;
  frame_queue_size: number;
  gain: number;
  black_level: number;
  freq: string;
  taps: string;
  hot_pixel_correction: boolean;
}

export type SettingName = keyof CameraValues;

export const SETTING_NAMES: readonly SettingName[] = [
  'exposure_ms', 'binning_x', 'binning_y', 'roi_x', 'roi_y', 'roi_width', 'roi_height',
  'trigger_type', 'trigger_count', 'frame_queue_size', 'gain', 'black_level', 'freq', 'taps',
  'hot_pixel_correction',
];

/** Settings that may change while frames are being acquired. */
export const PLAY_SETTINGS: ReadonlySet<SettingName> = new Set<SettingName>(['exposure_ms', 'gain', 'black_level']);

export function isSettingName(name: string): name is SettingName {
  return SETTING_NAMES.some((known) => known === name);
}

const clamp = (value: number, [min, max]: [number, number]) => Math.min(Math.max(value, min), max);

interface NumericRule {
  kind: 'numeric';
  integer: boolean;
  range(caps: CameraCapabilities, values: CameraValues): [number, number];
}

interface EnumeratedRule {
  kind: 'enumerated';
  choices(caps: CameraCapabilities): readonly string[];
}

interface BooleanRule {
  kind: 'boolean';
}

type SettingRule = NumericRule | EnumeratedRule | BooleanRule;

const RULES: Record<SettingName, SettingRule> = {
  exposure_ms: { kind: 'numeric', integer: false, range: (caps) => caps.exposureRangeMs },
  binning_x: { kind: 'numeric', integer: true, range: (caps) => caps.binningXRange },
  binning_y: { kind: 'numeric', integer: true, range: (caps) => caps.binningYRange },
  roi_x: { kind: 'numeric', integer: true, range: (caps, v) => [0, caps.sensorWidth - v.binning_x] },
  roi_y: { kind: 'numeric', integer: true, range: (caps, v) => [0, caps.sensorHeight - v.binning_y] },
  roi_width: { kind: 'numeric', integer: true, range: (caps, v) => [v.binning_x, caps.sensorWidth - v.roi_x] },
  roi_height: { kind: 'numeric', integer: true, range: (caps, v) => [v.binning_y, caps.sensorHeight - v.roi_y] },
  trigger_type: { kind: 'enumerated', choices: () => TRIGGER_TYPES },
  trigger_count: { kind: 'numeric', integer: true, range: () => [0, MAX_TRIGGER_COUNT] },
  frame_queue_size: { kind: 'numeric', integer: true, range: (caps) => [1, caps.maxFrameQueueSize] },
  gain: { kind: 'numeric', integer: true, range: (caps) => caps.gainRange },
  black_level: { kind: 'numeric', integer: true, range: (caps) => caps.blackLevelRange },
  freq: { kind: 'enumerated', choices: (caps) => caps.supportedFreqs },
  taps: { kind: 'enumerated', choices: (caps) => caps.supportedTaps },
  hot_pixel_correction: { kind: 'boolean' },
};

function roundNumeric(rule: NumericRule, value: number): number {
  // Exposure is programmed in whole microseconds.
  return rule.integer ? Math.round(value) : Math.round(value * 1000) / 1000;
}

/**
 * Keeps one ROI axis on the sensor: the origin leaves room for at least one
 * binned pixel and the extent is a whole number of bins.
 */
function fitAxis(origin: number, extent: number, sensor: number, bin: number): [number, number] {
  const o = clamp(Math.round(origin), [0, sensor - bin]);
  const e = clamp(Math.round(extent), [bin, sensor - o]);
  return [o, Math.floor(e / bin) * bin];
}

function pick(choices: readonly string[], value: string): string {
  return choices.includes(value) ? value : (choices[0] ?? '');
}

/**
 * Recomputes every derived constraint from scratch. Run after each mutation so
 * a change to one setting moves the values that depend on it.
 */
export function normalizeValues(caps: CameraCapabilities, values: CameraValues): CameraValues {
  const binning_x = Math.round(clamp(values.binning_x, caps.binningXRange));
  const binning_y = Math.round(clamp(values.binning_y, caps.binningYRange));
  const [roi_x, roi_width] = fitAxis(values.roi_x, values.roi_width, caps.sensorWidth, binning_x);
  const [roi_y, roi_height] = fitAxis(values.roi_y, values.roi_height, caps.sensorHeight, binning_y);

  return {
    exposure_ms: Math.round(clamp(values.exposure_ms, caps.exposureRangeMs) * 1000) / 1000,
    binning_x,
    binning_y,
    roi_x,
    roi_y,
    roi_width,
    roi_height,
    trigger_type: values.trigger_type,
    trigger_count: Math.round(clamp(values.trigger_count, [0, MAX_TRIGGER_COUNT])),
    frame_queue_size: Math.round(clamp(values.frame_queue_size, [1, caps.maxFrameQueueSize])),
    gain: Math.round(clamp(values.gain, caps.gainRange)),
    black_level: Math.round(clamp(values.black_level, caps.blackLevelRange)),
    freq: pick(caps.supportedFreqs, values.freq),
    taps: pick(caps.supportedTaps, values.taps),
    hot_pixel_correction: values.hot_pixel_correction,
  };
}

export function describeSetting(caps: CameraCapabilities, values: CameraValues, name: SettingName): SettingSpec {
  const rule = RULES[name];
  const value = values[name];

  switch (rule.kind) {
    case 'numeric':
      return { name, kind: 'numeric', value: Number(value), range: rule.range(caps, values), integer: rule.integer };
    case 'enumerated':
      return { name, kind: 'enumerated', value: String(value), choices: [...rule.choices(caps)] };
    case 'boolean':
      return { name, kind: 'boolean', value: Boolean(value) };
  }
}

/** Full snapshot of all settings with their current ranges. */
export function describeSettings(caps: CameraCapabilities, values: CameraValues): SettingsSnapshot {
  const snapshot: SettingsSnapshot = {};
  for (const name of SETTING_NAMES) {
    snapshot[name] = describeSetting(caps, values, name);
  }
  return snapshot;
}

/**
 * Validates `raw` for `name`, clamps it into the setting's current range and
 * returns the new values with every dependent setting recomputed.
 */
export function applySetting(
  caps: CameraCapabilities,
  values: CameraValues,
  name: string,
  raw: SettingValue
): CameraValues {
  if (!isSettingName(name)) {
    throw new InvalidSetting(`Setting "${name}" is not recognized`);
  }

  const rule = RULES[name];
  const next: CameraValues = { ...values };

  switch (rule.kind) {
    case 'numeric': {
      if (typeof raw !== 'number' || !Number.isFinite(raw)) {
        throw new InvalidSetting(`Setting "${name}" expects a number, got ${JSON.stringify(raw)}`);
      }
      const value = roundNumeric(rule, clamp(raw, rule.range(caps, values)));
      Object.assign(next, { [name]: value });
      break;
    }
    case 'enumerated': {
      const choices = rule.choices(caps);
      if (typeof raw !== 'string' || !choices.includes(raw)) {
        throw new InvalidSetting(`Setting "${name}" must be one of [${choices.join(', ')}], got ${JSON.stringify(raw)}`);
      }
      Object.assign(next, { [name]: raw });
      break;
    }
    case 'boolean': {
      if (typeof raw !== 'boolean') {
        throw new InvalidSetting(`Setting "${name}" expects a boolean, got ${JSON.stringify(raw)}`);
      }
      Object.assign(next, { [name]: raw });
      break;
    }
  }

  return normalizeValues(caps, next);
}
