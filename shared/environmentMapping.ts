/**
 * Environment Mapping - Single source of truth for environment-type normalization
 * Maps raw "Environment Type" values from the inventory to the stages the
 * segregation policy checks for.
 */

export type EnvironmentStage = 'DEV' | 'TEST' | 'PROD' | 'OTHER';

export const REQUIRED_STAGES = ['DEV', 'TEST', 'PROD'] as const;

export type RequiredStage = (typeof REQUIRED_STAGES)[number];

const STAGE_NAMES: ReadonlySet<string> = new Set(REQUIRED_STAGES);

function isRequiredStage(value: string): value is RequiredStage {
  return STAGE_NAMES.has(value);
}

/**
 * Map a raw environment type to its policy stage. Only the exact stage names
 * count, ignoring case and surrounding whitespace; "Production" is OTHER.
 */
export function mapToEnvironmentStage(rawType: string | null | undefined): EnvironmentStage {
  if (!rawType) return 'OTHER';

  const normalized = rawType.trim().toUpperCase();
  return isRequiredStage(normalized) ? normalized : 'OTHER';
}

/**
 * Human-readable list of stages, joined the way the report reasons read:
 * "TEST", "DEV and TEST", "DEV, TEST and PROD".
 */
export function joinStages(stages: readonly string[]): string {
  if (stages.length <= 1) return stages.join('');
  return `${stages.slice(0, -1).join(', ')} and ${stages[stages.length - 1]}`;
}

/**
 * Reason text for a system given which required stages it is missing
 */
export function describeMissingStages(missing: readonly RequiredStage[]): string {
  if (missing.length === 0) {
    return 'DEV, TEST, PROD environments are present';
  }
  const noun = missing.length === 1 ? 'environment' : 'environments';
  return `No ${joinStages(missing)} ${noun} available`;
}
