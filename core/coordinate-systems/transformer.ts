import proj4 from 'proj4';
import { logger } from '../../utils/logging/logger';
import {
  GEOGRAPHIC_DEFINITION,
  WEB_MERCATOR_DEFINITION
} from './definitions';
import { CoordinateSystem, LocalFrame, NationalGridDefinition } from './types';

const SOURCE = 'CoordinateTransformer';

/**
 * Forward/inverse pair as returned by proj4(from, to)
 */
export interface PositionConverter {
  forward(coordinates: number[]): number[];
  inverse(coordinates: number[]): number[];
}

/**
 * Builds proj4 converters once per (source, target) definition pair and
 * hands out the same instance on every later request.
 */
export class CoordinateTransformer {
  private readonly converters = new Map<string, PositionConverter>();

  constructor(private readonly nationalGrid: NationalGridDefinition) {}

  public getNationalGrid(): NationalGridDefinition {
    return this.nationalGrid;
  }

  /**
   * proj4 definition string for a system; LocalProjected needs a frame
   */
  public resolveDefinition(system: CoordinateSystem, frame: LocalFrame | null): string | null {
    switch (system) {
      case 'NationalGrid':
        return this.nationalGrid.proj4def;
      case 'Geographic':
        return GEOGRAPHIC_DEFINITION;
      case 'WebMercator':
        return WEB_MERCATOR_DEFINITION;
      case 'LocalProjected':
        return frame ? frame.proj4def : null;
      default: {
        const unknownSystem: never = system;
        throw new Error(`Unsupported coordinate system: ${String(unknownSystem)}`);
      }
    }
  }

  public getConverter(fromDefinition: string, toDefinition: string): PositionConverter {
    const key = `${fromDefinition}|${toDefinition}`;
    const cached = this.converters.get(key);
    if (cached) {
      return cached;
    }

    const converter: PositionConverter = proj4(fromDefinition, toDefinition);
    this.converters.set(key, converter);

    logger.debug('Created converter', {
      from: fromDefinition,
      to: toDefinition,
      converterCount: this.converters.size
    }, { source: SOURCE });

    return converter;
  }

  public getConverterCount(): number {
    return this.converters.size;
  }

  public clear(): void {
    this.converters.clear();
  }
}
