import { z } from 'zod';
import { logger } from '../../utils/logging/logger';
import { DEFAULT_CIRCLE_SEGMENTS } from '../buffer/buffer-zone-generator';
import { DEFAULT_CACHE_CAPACITY } from '../coordinate-systems/coordinate-transform-service';
import { EngineConfigError } from '../errors/types';

const SOURCE = 'EngineConfig';

export const DEFAULT_BUFFER_METERS = 50;

const engineConfigSchema = z.object({
  SECTION_ENGINE_NATIONAL_GRID: z.enum(['EPSG:27700', 'EPSG:2056']).default('EPSG:27700'),
  SECTION_ENGINE_CACHE_CAPACITY: z.coerce.number().int().min(1).max(100000).default(DEFAULT_CACHE_CAPACITY),
  SECTION_ENGINE_BUFFER_METERS: z.coerce.number().finite().positive().default(DEFAULT_BUFFER_METERS),
  SECTION_ENGINE_CIRCLE_SEGMENTS: z.coerce.number().int().min(8).max(256).default(DEFAULT_CIRCLE_SEGMENTS)
});

export interface EngineConfig {
  nationalGrid: z.infer<typeof engineConfigSchema>['SECTION_ENGINE_NATIONAL_GRID'];
  cacheCapacity: number;
  defaultBufferMeters: number;
  circleSegments: number;
}

type EnvSource = Record<string, string | undefined>;

// Blank variables count as unset
function pickVariables(env: EnvSource): Record<string, string | undefined> {
  const picked: Record<string, string | undefined> = {};
  for (const key of Object.keys(engineConfigSchema.shape)) {
    const value = env[key]?.trim();
    picked[key] = value ? value : undefined;
  }
  return picked;
}

/**
 * Reads engine settings from environment variables
 * @throws EngineConfigError when a variable is present but invalid
 */
export function loadEngineConfig(env: EnvSource = process.env): EngineConfig {
  const parsed = engineConfigSchema.safeParse(pickVariables(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    logger.error('Invalid engine configuration', { issues }, { source: SOURCE });
    throw new EngineConfigError(`Invalid engine configuration: ${issues.join('; ')}`, { issues });
  }

  const config: EngineConfig = {
    nationalGrid: parsed.data.SECTION_ENGINE_NATIONAL_GRID,
    cacheCapacity: parsed.data.SECTION_ENGINE_CACHE_CAPACITY,
    defaultBufferMeters: parsed.data.SECTION_ENGINE_BUFFER_METERS,
    circleSegments: parsed.data.SECTION_ENGINE_CIRCLE_SEGMENTS
  };
  logger.debug('Engine configuration loaded', { ...config }, { source: SOURCE });
  return config;
}
