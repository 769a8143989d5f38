import { CoordinateTransformService } from '../../core/coordinate-systems/coordinate-transform-service';
import { createLocalFrame, determineUtmZone } from '../../core/coordinate-systems/definitions';
import { isCoordinateSystem } from '../../core/coordinate-systems/types';

describe('CoordinateTransformService', () => {
  let service: CoordinateTransformService;

  beforeEach(() => {
    service = new CoordinateTransformService();
  });

  describe('national grid conversion', () => {
    it('should place a British National Grid position in southern England', () => {
      const result = service.transformPoint('NationalGrid', 'Geographic', 500000, 200000);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.y).toBeGreaterThan(51.6);
      expect(result.value.y).toBeLessThan(51.8);
      expect(result.value.x).toBeGreaterThan(-0.7);
      expect(result.value.x).toBeLessThan(-0.4);
    });

    it('should round trip national grid through geographic within a centimetre', () => {
      const forward = service.transformPoint('NationalGrid', 'Geographic', 512345.67, 234567.89);
      expect(forward.ok).toBe(true);
      if (!forward.ok) return;

      const back = service.transformPoint('Geographic', 'NationalGrid', forward.value.x, forward.value.y);
      expect(back.ok).toBe(true);
      if (!back.ok) return;
      expect(Math.abs(back.value.x - 512345.67)).toBeLessThan(0.01);
      expect(Math.abs(back.value.y - 234567.89)).toBeLessThan(0.01);
    });

    it('should use the Swiss grid when configured', () => {
      const swiss = new CoordinateTransformService({ nationalGrid: 'EPSG:2056' });
      const result = swiss.transformPoint('NationalGrid', 'Geographic', 2600000, 1200000);

      expect(swiss.getNationalGrid().code).toBe('EPSG:2056');
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.x).toBeCloseTo(7.44, 2);
      expect(result.value.y).toBeCloseTo(46.95, 2);
    });
  });

  describe('local frames', () => {
    it('should derive UTM zone 30 north for positions around London', () => {
      const frame = service.resolveLocalFrame('NationalGrid', [{ x: 500000, y: 200000 }]);

      expect(frame.ok).toBe(true);
      if (!frame.ok) return;
      expect(frame.value.code).toBe('EPSG:32630');
      expect(frame.value.zone).toBe(30);
      expect(frame.value.hemisphere).toBe('north');
    });

    it('should build southern hemisphere frames', () => {
      const frame = createLocalFrame(151.2, -33.9);

      expect(frame.code).toBe('EPSG:32756');
      expect(frame.proj4def).toBe('+proj=utm +zone=56 +south +datum=WGS84 +units=m +no_defs');
    });

    it('should clamp zones at the antimeridian', () => {
      expect(determineUtmZone(-180)).toBe(1);
      expect(determineUtmZone(180)).toBe(60);
      expect(determineUtmZone(-0.5)).toBe(30);
    });

    it('should round trip geographic through a local frame', () => {
      const frame = createLocalFrame(-0.15, 51.5);
      const projected = service.transformPoint('Geographic', 'LocalProjected', -0.15, 51.5, frame);
      expect(projected.ok).toBe(true);
      if (!projected.ok) return;

      const back = service.transformPoint('LocalProjected', 'Geographic', projected.value.x, projected.value.y, frame);
      expect(back.ok).toBe(true);
      if (!back.ok) return;
      expect(back.value.x).toBeCloseTo(-0.15, 7);
      expect(back.value.y).toBeCloseTo(51.5, 7);
    });

    it('should fail local projected input without a frame', () => {
      const result = service.transformPoint('LocalProjected', 'Geographic', 1000, 2000);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('TRANSFORM_FAILURE');
    });
  });

  describe('input validation', () => {
    it('should reject latitudes beyond the poles', () => {
      const result = service.transformPoint('Geographic', 'NationalGrid', 0, 95);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('INVALID_COORDINATE');
    });

    it('should reject non-finite coordinates', () => {
      const result = service.transformPoint('NationalGrid', 'Geographic', Number.NaN, 200000);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('INVALID_COORDINATE');
    });

    it('should reject grid coordinates outside the grid extent', () => {
      const result = service.transformPoint('NationalGrid', 'Geographic', -5, 10);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('INVALID_COORDINATE');
    });
  });

  describe('batches', () => {
    it('should report failures per index without aborting the batch', () => {
      const batch = service.transformBatch('NationalGrid', 'Geographic', [
        { x: 500000, y: 200000 },
        { x: Number.NaN, y: 1 },
        { x: 510000, y: 210000 }
      ]);

      expect(batch.frame).toBeNull();
      expect(batch.results.map(result => result.ok)).toEqual([true, false, true]);
    });

    it('should project a whole batch into one frame', () => {
      const batch = service.transformBatch('NationalGrid', 'LocalProjected', [
        { x: 500000, y: 200000 },
        { x: 500100, y: 200100 }
      ]);

      expect(batch.frame?.code).toBe('EPSG:32630');
      expect(batch.results.every(result => result.ok)).toBe(true);
    });
  });

  describe('caching', () => {
    it('should return identity results without building a converter', () => {
      const result = service.transformPoint('Geographic', 'Geographic', 1, 2);

      expect(result).toEqual({ ok: true, value: { x: 1, y: 2 } });
      expect(service.getConverterCount()).toBe(0);
    });

    it('should serve repeated conversions from the cache', () => {
      const first = service.transformPoint('NationalGrid', 'Geographic', 500000, 200000);
      const second = service.transformPoint('NationalGrid', 'Geographic', 500000, 200000);

      expect(second).toEqual(first);
      expect(service.getCacheStats()).toMatchObject({ size: 1, hits: 1, misses: 1 });
    });

    it('should reuse one converter per system pair', () => {
      service.transformPoint('NationalGrid', 'Geographic', 500000, 200000);
      service.transformPoint('NationalGrid', 'Geographic', 400000, 300000);

      expect(service.getConverterCount()).toBe(1);
    });

    it('should drop cached results and converters on clear', () => {
      service.transformPoint('NationalGrid', 'Geographic', 500000, 200000);
      service.clearCache();

      expect(service.getCacheStats().size).toBe(0);
      expect(service.getConverterCount()).toBe(0);
    });
  });

  it('should convert geographic positions to Web Mercator', () => {
    const result = service.transformPoint('Geographic', 'WebMercator', 180, 0);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.x).toBeCloseTo(20037508.34, 1);
    expect(result.value.y).toBeCloseTo(0, 6);
  });

  it('should recognise coordinate system names', () => {
    expect(isCoordinateSystem('LocalProjected')).toBe(true);
    expect(isCoordinateSystem('WGS84')).toBe(false);
  });
});
