export type DebugCategory =
  | 'pool'
  | 'emitter'
  | 'simulation'
  | 'geometry'
  | 'config';

export interface DebugSettings {
  debugEnabled: boolean;
  debugPool: boolean;
  debugEmitter: boolean;
  debugSimulation: boolean;
  debugGeometry: boolean;
  debugConfig: boolean;
}

const categoryToSettingKey: Record<DebugCategory, keyof DebugSettings> = {
  pool: 'debugPool',
  emitter: 'debugEmitter',
  simulation: 'debugSimulation',
  geometry: 'debugGeometry',
  config: 'debugConfig',
};

export const DEFAULT_DEBUG_SETTINGS: Readonly<DebugSettings> = {
  debugEnabled: false,
  debugPool: false,
  debugEmitter: false,
  debugSimulation: false,
  debugGeometry: false,
  debugConfig: false,
};

let debugSettings: DebugSettings = { ...DEFAULT_DEBUG_SETTINGS };

/**
 * Replace the active settings. Hosts usually wire this to their own
 * inspector toggles; partial updates keep the other flags.
 */
export function setDebugSettings(settings: Partial<DebugSettings>): void {
  debugSettings = { ...debugSettings, ...settings };
}

export function getDebugSettings(): Readonly<DebugSettings> {
  return debugSettings;
}

export function resetDebugSettings(): void {
  debugSettings = { ...DEFAULT_DEBUG_SETTINGS };
}

function isEnabled(category: DebugCategory): boolean {
  return debugSettings.debugEnabled && debugSettings[categoryToSettingKey[category]];
}

function prefix(category: DebugCategory): string {
  return `[particles:${category}]`;
}

/**
 * Console output gated twice: the master `debugEnabled` flag and the flag of
 * the category. Messages go out with a `[particles:<category>]` prefix.
 * `isEnabled` lets callers skip building expensive arguments.
 */
export const debugLog = {
  log(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      // eslint-disable-next-line no-console
      console.log(prefix(category), ...args);
    }
  },

  warn(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      console.warn(prefix(category), ...args);
    }
  },

  error(category: DebugCategory, ...args: unknown[]): void {
    if (isEnabled(category)) {
      console.error(prefix(category), ...args);
    }
  },

  isEnabled,
};

/** debugLog with the category bound */
export interface CategoryLogger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  isEnabled: () => boolean;
}

function createCategoryLogger(category: DebugCategory): CategoryLogger {
  return {
    log: (...args: unknown[]) => debugLog.log(category, ...args),
    warn: (...args: unknown[]) => debugLog.warn(category, ...args),
    error: (...args: unknown[]) => debugLog.error(category, ...args),
    isEnabled: () => isEnabled(category),
  };
}

export const debugPool = createCategoryLogger('pool');
export const debugEmitter = createCategoryLogger('emitter');
export const debugSimulation = createCategoryLogger('simulation');
export const debugGeometry = createCategoryLogger('geometry');
export const debugConfig = createCategoryLogger('config');
