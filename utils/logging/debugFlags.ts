// Module-specific verbose logging switches.
// Read once from DEBUG_FLAGS="SpatialFilter,BufferZoneGenerator"; always off in production.

/**
 * Type for debug flag map
 */
type DebugFlagMap = Record<string, boolean>;

const isProd = process.env.NODE_ENV === 'production';

let debugFlags: DebugFlagMap = {};

function loadEnvFlags(): DebugFlagMap {
  const raw = process.env.DEBUG_FLAGS;
  if (!raw) return {};
  const flags = raw.split(',').map(f => f.trim()).filter(Boolean);
  const map: DebugFlagMap = {};
  for (const flag of flags) map[flag] = true;
  return map;
}

debugFlags = isProd ? {} : loadEnvFlags();

/**
 * Check if debug is enabled for a given module
 * @param module - The module name (e.g., 'SpatialFilter')
 */
export function isDebugEnabled(module: string): boolean {
  if (isProd) return false;
  return debugFlags[module] === true;
}

/**
 * Set debug flag for a module (no-op in production)
 */
export function setDebugFlag(module: string, enabled: boolean): void {
  if (isProd) return;
  debugFlags[module] = enabled;
}

export function resetDebugFlags(): void {
  if (isProd) return;
  debugFlags = {};
}
