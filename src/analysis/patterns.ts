/**
 * Pattern constants for the PsychoPy detection rules.
 *
 * Patterns can be either:
 * - string: exact match against a dotted callee ("visual.TextStim")
 * - RegExp: flexible matching against a callee or a source line
 *
 * Use the matchesPattern() helper to check content against patterns.
 */

export type Pattern = string | RegExp;

/**
 * Check if content matches a pattern (string or RegExp).
 * For strings, the whole content must be equal. For RegExp, uses test().
 */
export function matchesPattern(content: string, pattern: Pattern): boolean {
  if (typeof pattern === "string") {
    return content === pattern;
  }
  return pattern.test(content);
}

export function matchesAnyPattern(content: string, patterns: readonly Pattern[]): boolean {
  return patterns.some((pattern) => matchesPattern(content, pattern));
}

// ============================================================================
// Stimuli and media
// ============================================================================

/** Callees that construct a visual stimulus. */
export const STIMULUS_CONSTRUCTOR_PATTERNS: Pattern[] = [
  // visual.TextStim, visual.ImageStim, GratingStim, MovieStim3, ...
  /(?:^|\.)[A-Z]\w*Stim\d*$/,
  /^(?:visual\.)?(?:TextBox2|Circle|Rect|Polygon|Line|Pie|Aperture)$/,
  // Project-local factories: make_stimulus(), create_stim(), buildStimulus()
  /(?:^|\.)(?:make|create|build|new)_?\w*stim\w*$/i,
];

/** Callees that read media from disk. */
export const RESOURCE_LOADER_PATTERNS: Pattern[] = [
  "sound.Sound",
  "Sound",
  /(?:^|\.)MovieStim\d*$/,
  "Image.open",
  /(?:^|\.)imread$/,
  /^(?:np|numpy)\.load$/,
  /^(?:pd|pandas)\.read_(?:csv|excel)$/,
];

// ============================================================================
// Timing
// ============================================================================

export const WALL_CLOCK_SLEEP_CALLEES: Pattern[] = ["time.sleep"];

/** `from time import sleep` makes a bare sleep() the wall-clock sleep. */
export const SLEEP_IMPORT_PATTERN = /^\s*from\s+time\s+import\s+[^\n#]*\bsleep\b/m;

export const WALL_CLOCK_SLEEP_LINE_PATTERN = /\btime\s*\.\s*sleep\s*\(/;

export const BARE_SLEEP_LINE_PATTERN = /(?<![\w.])sleep\s*\(/;

// ============================================================================
// Trial loops
// ============================================================================

/** Method names that present something or collect a response on a trial. */
export const PRESENTATION_METHOD_PATTERNS: Pattern[] = [
  "draw",
  "flip",
  "play",
  "present",
  "getKeys",
  "waitKeys",
];

/** An ALL_CAPS identifier is treated as a named constant. */
export const CONSTANT_NAME_PATTERN = /^[A-Z][A-Z0-9_]*$/;

// ============================================================================
// Resources
// ============================================================================

export interface ResourcePattern {
  label: string;
  constructors: Pattern[];
  /** Methods that release the resource. */
  releases: string[];
}

export const RESOURCE_PATTERNS: ResourcePattern[] = [
  { label: "window", constructors: ["visual.Window", "Window"], releases: ["close"] },
  { label: "file handle", constructors: ["open", "io.open", "codecs.open"], releases: ["close"] },
  { label: "serial port", constructors: ["serial.Serial", "Serial"], releases: ["close"] },
  {
    label: "experiment handler",
    constructors: ["data.ExperimentHandler", "ExperimentHandler"],
    releases: ["close", "saveAsWideText", "saveAsPickle"],
  },
  {
    label: "ioHub server",
    constructors: ["launchHubServer", "iohub.launchHubServer", "io.launchHubServer"],
    releases: ["quit"],
  },
];

export const WINDOW_CONSTRUCTORS: Pattern[] = ["visual.Window", "Window"];

export const WINDOW_CONSTRUCTOR_LINE_PATTERN = /\bWindow\s*\(/;

export const CORE_QUIT_PATTERN = /\bcore\s*\.\s*quit\s*\(/;

// ============================================================================
// Literals
// ============================================================================

/** Numbers too common to be worth naming. */
export const TRIVIAL_NUMBERS = new Set(["0", "1", "2", "-1", "0.0", "1.0"]);

export const REPEATED_LITERAL_THRESHOLD = 3;

/** Maximum length of a code excerpt attached to a finding. */
export const MAX_EXCERPT_LENGTH = 120;
