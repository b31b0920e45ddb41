/**
 * Layered JSON config for the navigation engine.
 *
 * `configs/navigation/base.json` holds the full parameter set; named
 * profiles in `configs/navigation/profiles/` are partial overrides merged
 * leaf by leaf on top of it. Missing files fall back to hardcoded defaults.
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DistanceConfig {
  /** Meters per floor-plan coordinate unit */
  metersPerUnit: number;
}

export interface TimingConfig {
  walkingSpeedMetersPerMinute: number;
  /** Added once per hop for finding and scanning the next checkpoint */
  checkpointDelaySeconds: number;
}

export interface DeviationConfig {
  /** Nearest-route distance below which a deviation is minor */
  minorThreshold: number;
  /** Nearest-route distance below which a deviation is moderate */
  moderateThreshold: number;
  /** Max jump between non-adjacent checkpoints accepted as a real transition */
  transitionProximity: number;
  /** Longest return route accepted for a minor-deviation splice */
  minorReturnMaxDistance: number;
}

export interface TagConfig {
  maxPayloadBytes: number;
}

export interface EventConfig {
  /** Pending tag events beyond this are dropped */
  queueCapacity: number;
}

export interface NavigationConfig {
  distance: DistanceConfig;
  timing: TimingConfig;
  deviation: DeviationConfig;
  tags: TagConfig;
  events: EventConfig;
}

export interface ProfileConfig {
  name: string;
  description: string;
  overrides: DeepPartial<NavigationConfig>;
}

export interface ProfileInfo {
  name: string;
  description: string;
}

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function getDefaultNavigationConfig(): NavigationConfig {
  return {
    distance: { metersPerUnit: 1 },
    timing: { walkingSpeedMetersPerMinute: 80, checkpointDelaySeconds: 30 },
    deviation: {
      minorThreshold: 50,
      moderateThreshold: 200,
      transitionProximity: 100,
      minorReturnMaxDistance: 100,
    },
    tags: { maxPayloadBytes: 8192 },
    events: { queueCapacity: 64 },
  };
}

// ---------------------------------------------------------------------------
// Overrides
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Pick a finite number from a section, or keep the fallback */
function num(section: unknown, key: string, fallback: number): number {
  if (!isPlainObject(section)) return fallback;
  const value = section[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
 * Apply partial overrides to a config. Unknown keys and non-numeric
 * values are ignored.
 */
export function applyOverrides(base: NavigationConfig, overrides: unknown): NavigationConfig {
  if (!isPlainObject(overrides)) return base;
  const { distance, timing, deviation, tags, events } = overrides;
  return {
    distance: {
      metersPerUnit: num(distance, "metersPerUnit", base.distance.metersPerUnit),
    },
    timing: {
      walkingSpeedMetersPerMinute: num(
        timing,
        "walkingSpeedMetersPerMinute",
        base.timing.walkingSpeedMetersPerMinute,
      ),
      checkpointDelaySeconds: num(timing, "checkpointDelaySeconds", base.timing.checkpointDelaySeconds),
    },
    deviation: {
      minorThreshold: num(deviation, "minorThreshold", base.deviation.minorThreshold),
      moderateThreshold: num(deviation, "moderateThreshold", base.deviation.moderateThreshold),
      transitionProximity: num(deviation, "transitionProximity", base.deviation.transitionProximity),
      minorReturnMaxDistance: num(
        deviation,
        "minorReturnMaxDistance",
        base.deviation.minorReturnMaxDistance,
      ),
    },
    tags: {
      maxPayloadBytes: num(tags, "maxPayloadBytes", base.tags.maxPayloadBytes),
    },
    events: {
      queueCapacity: num(events, "queueCapacity", base.events.queueCapacity),
    },
  };
}

/** Merge partial overrides supplied in code (e.g. by tests or scripts) */
export function withOverrides(
  overrides: DeepPartial<NavigationConfig>,
  base: NavigationConfig = getDefaultNavigationConfig(),
): NavigationConfig {
  return applyOverrides(base, overrides);
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/navigation/`.
 * Works from both source (packages/navigation/src/) and compiled (dist/) paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "navigation");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // __dirname is packages/navigation/src/config
  const repoRoot = resolve(__dirname, "..", "..", "..", "..");
  return join(repoRoot, "configs", "navigation");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Load the base config, falling back to hardcoded defaults. */
export function loadBaseConfig(configsRoot: string = findConfigsRoot()): NavigationConfig {
  const filePath = join(configsRoot, "base.json");
  const defaults = getDefaultNavigationConfig();
  if (!existsSync(filePath)) return defaults;

  try {
    return applyOverrides(defaults, JSON.parse(readFileSync(filePath, "utf-8")));
  } catch (err) {
    console.warn(`[config] Ignoring unreadable ${filePath}: ${String(err)}`);
    return defaults;
  }
}

function readProfile(filePath: string): ProfileConfig | undefined {
  const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  if (!isPlainObject(parsed) || typeof parsed["name"] !== "string") return undefined;
  const overrides = parsed["overrides"];
  return {
    name: parsed["name"],
    description: typeof parsed["description"] === "string" ? parsed["description"] : "",
    overrides: isPlainObject(overrides) ? overrides : {},
  };
}

/**
 * Load the navigation config, optionally merging a named profile on top.
 * Throws if the named profile does not exist.
 */
export function loadNavigationConfig(
  profileName?: string,
  configsRoot: string = findConfigsRoot(),
): NavigationConfig {
  const base = loadBaseConfig(configsRoot);
  if (!profileName) return base;

  const filePath = join(configsRoot, "profiles", `${profileName}.json`);
  if (!existsSync(filePath)) {
    throw new Error(`Unknown navigation profile "${profileName}"`);
  }
  const profile = readProfile(filePath);
  if (!profile) {
    throw new Error(`Malformed navigation profile "${profileName}"`);
  }
  console.log(`[config] Using profile "${profile.name}"`);
  return applyOverrides(base, profile.overrides);
}

/** List all available profiles from the profiles directory. */
export function listProfiles(configsRoot: string = findConfigsRoot()): ProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");
  if (!existsSync(profilesDir)) return [];

  const profiles: ProfileInfo[] = [];
  for (const file of readdirSync(profilesDir).filter((f) => f.endsWith(".json")).sort()) {
    try {
      const profile = readProfile(join(profilesDir, file));
      if (profile) profiles.push({ name: profile.name, description: profile.description });
    } catch {
      console.warn(`[config] Skipping malformed profile ${file}`);
    }
  }
  return profiles;
}
