import { calculateMapBounds, calculateMapCenterAndZoom } from '../../core/map-view/map-view';

describe('map view helpers', () => {
  describe('calculateMapBounds', () => {
    it('should fall back to UK bounds without points', () => {
      expect(calculateMapBounds([])).toEqual({ north: 52, south: 50, east: 1, west: -2 });
    });

    it('should pad the extent of the points', () => {
      const bounds = calculateMapBounds([
        { lat: 51, lon: -1 },
        { lat: 52, lon: 0.5 }
      ]);

      expect(bounds.north).toBeCloseTo(52.01, 10);
      expect(bounds.south).toBeCloseTo(50.99, 10);
      expect(bounds.east).toBeCloseTo(0.51, 10);
      expect(bounds.west).toBeCloseTo(-1.01, 10);
    });

    it('should ignore non-finite positions', () => {
      expect(calculateMapBounds([{ lat: Number.NaN, lon: 0 }])).toEqual({ north: 52, south: 50, east: 1, west: -2 });
    });
  });

  describe('calculateMapCenterAndZoom', () => {
    it('should default to London', () => {
      expect(calculateMapCenterAndZoom([])).toEqual({ center: { lat: 51.5, lon: -0.1 }, zoom: 6 });
    });

    it('should zoom close on a single point', () => {
      expect(calculateMapCenterAndZoom([{ lat: 51.2, lon: -0.4 }])).toEqual({
        center: { lat: 51.2, lon: -0.4 },
        zoom: 15
      });
    });

    it('should centre on the mean position', () => {
      const view = calculateMapCenterAndZoom([
        { lat: 50, lon: 0 },
        { lat: 50, lon: 0 },
        { lat: 53, lon: 0 }
      ]);

      expect(view).toEqual({ center: { lat: 51, lon: 0 }, zoom: 6 });
    });

    it.each([
      [2, 7],
      [0.75, 8],
      [0.3, 10],
      [0.08, 12],
      [0.01, 14]
    ])('should pick zoom for a spread of %p degrees', (spread, zoom) => {
      const view = calculateMapCenterAndZoom([
        { lat: 51, lon: 0 },
        { lat: 51, lon: spread }
      ]);

      expect(view.zoom).toBe(zoom);
    });
  });
});
