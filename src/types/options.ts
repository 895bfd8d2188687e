/**
 * OSD Options - Typed option record, factory defaults and the key table
 *
 * Option file keys (snake_case, as written in <client>.conf and in the
 * script-opts overlay) map onto camelCase fields of OsdOptions. The table is
 * built once; string lookups only happen when parsing a line or an overlay key.
 */

export type Urgency = 'low' | 'normal' | 'critical';

export type ScalingAlgorithm = 'fast-bilinear' | 'bilinear' | 'bicubic' | 'lanczos';

export interface OsdOptions {
  /** Seconds the notification stays open after the last reset (0 = until closed) */
  expireTimeout: number;
  /** Empty string disables the app icon */
  appIcon: string;
  /** Empty string removes the category hint */
  category: string;
  urgency: Urgency;
  sendThumbnail: boolean;
  sendProgress: boolean;
  sendSubText: boolean;
  /** Longer edge of the scaled thumbnail, px */
  thumbnailSize: number;
  /** Flags passed to the player's screenshot command */
  screenshotFlags: string;
  thumbnailScaling: ScalingAlgorithm;
  disableScaling: boolean;
  /** Treat the player as focused regardless of window focus */
  focusManual: boolean;
  /** Append timing diagnostics to the body */
  perfdata: boolean;
}

export type OptionKey = keyof OsdOptions;

/**
 * What the engine does when an option's active value changes.
 * Exactly one trigger per key.
 */
export type OptionTrigger =
  | 'none'
  | 'push-app-icon'
  | 'push-category'
  | 'push-urgency'
  | 'toggle-thumbnail'
  | 'push-progress'
  | 'rewrite-body'
  | 'rebuild-thumbnail'
  | 'recapture'
  | 'reopen';

type OptionKeysOf<V> = { [K in OptionKey]: OsdOptions[K] extends V ? K : never }[OptionKey];

export type IntOptionKey = OptionKeysOf<number>;
export type BoolOptionKey = OptionKeysOf<boolean>;
export type EnumOptionKey = 'urgency' | 'thumbnailScaling';
export type StringOptionKey = Exclude<OptionKeysOf<string>, EnumOptionKey>;

interface OptionSpecBase {
  fileKey: string;
  trigger: OptionTrigger;
}

export type OptionSpec =
  | (OptionSpecBase & { type: 'int'; key: IntOptionKey; min: number })
  | (OptionSpecBase & { type: 'string'; key: StringOptionKey })
  | (OptionSpecBase & { type: 'bool'; key: BoolOptionKey })
  | (OptionSpecBase & { type: 'enum'; key: EnumOptionKey; choices: readonly string[] });

export const URGENCIES: readonly Urgency[] = ['low', 'normal', 'critical'];

export const SCALING_ALGORITHMS: readonly ScalingAlgorithm[] = [
  'fast-bilinear',
  'bilinear',
  'bicubic',
  'lanczos'
];

export const DEFAULT_OPTIONS: Readonly<OsdOptions> = Object.freeze({
  expireTimeout: 10,
  appIcon: 'mpv',
  category: 'mpv',
  urgency: 'low',
  sendThumbnail: true,
  sendProgress: true,
  sendSubText: true,
  thumbnailSize: 64,
  screenshotFlags: 'video',
  thumbnailScaling: 'bicubic',
  disableScaling: false,
  focusManual: false,
  perfdata: false
});

/** Ordered option table; diff results follow this order */
export const OPTION_SPECS: readonly OptionSpec[] = [
  { key: 'expireTimeout', fileKey: 'expire_timeout', type: 'int', min: 0, trigger: 'none' },
  { key: 'appIcon', fileKey: 'ntf_app_icon', type: 'string', trigger: 'push-app-icon' },
  { key: 'category', fileKey: 'ntf_category', type: 'string', trigger: 'push-category' },
  { key: 'urgency', fileKey: 'ntf_urgency', type: 'enum', choices: URGENCIES, trigger: 'push-urgency' },
  { key: 'sendThumbnail', fileKey: 'send_thumbnail', type: 'bool', trigger: 'toggle-thumbnail' },
  { key: 'sendProgress', fileKey: 'send_progress', type: 'bool', trigger: 'push-progress' },
  { key: 'sendSubText', fileKey: 'send_sub_text', type: 'bool', trigger: 'rewrite-body' },
  { key: 'thumbnailSize', fileKey: 'thumbnail_size', type: 'int', min: 1, trigger: 'rebuild-thumbnail' },
  { key: 'screenshotFlags', fileKey: 'screenshot_flags', type: 'string', trigger: 'recapture' },
  { key: 'thumbnailScaling', fileKey: 'thumbnail_scaling', type: 'enum', choices: SCALING_ALGORITHMS, trigger: 'rebuild-thumbnail' },
  { key: 'disableScaling', fileKey: 'disable_scaling', type: 'bool', trigger: 'rebuild-thumbnail' },
  { key: 'focusManual', fileKey: 'focus_manual', type: 'bool', trigger: 'reopen' },
  { key: 'perfdata', fileKey: 'perfdata', type: 'bool', trigger: 'rewrite-body' }
];

const SPECS_BY_FILE_KEY = new Map<string, OptionSpec>(
  OPTION_SPECS.map(spec => [spec.fileKey, spec])
);

/**
 * Resolve a file/overlay key to its option spec. Returns undefined for unknown keys.
 */
export function findOptionSpec(fileKey: string): OptionSpec | undefined {
  return SPECS_BY_FILE_KEY.get(fileKey);
}

export function isUrgency(value: string): value is Urgency {
  return URGENCIES.some(urgency => urgency === value);
}

export function isScalingAlgorithm(value: string): value is ScalingAlgorithm {
  return SCALING_ALGORITHMS.some(algorithm => algorithm === value);
}
