import { Projector } from '../../core/section/projector';
import { SectionLineBuilder } from '../../core/section/section-line-builder';
import { SectionLine } from '../../types/geometry';
import { SurveyPoint, createSurveyPoint } from '../../types/survey';

const projectedPoint = (id: string, x: number, y: number): SurveyPoint => ({
  ...createSurveyPoint(id, 0, 0),
  projX: x,
  projY: y
});

// Deterministic linear congruential generator
function createRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

describe('Projector', () => {
  const projector = new Projector();
  const eastLine: SectionLine = { originX: 0, originY: 0, directionX: 1, directionY: 0 };

  it('should order points by distance along the line', () => {
    const result = projector.projectAndOrder([
      projectedPoint('A', 5, 1),
      projectedPoint('B', -2, -3),
      projectedPoint('C', 10, 0)
    ], eastLine);

    expect(result).toEqual({
      ok: true,
      value: [
        { pointId: 'B', distanceAlongLine: -2, perpendicularOffset: -3 },
        { pointId: 'A', distanceAlongLine: 5, perpendicularOffset: 1 },
        { pointId: 'C', distanceAlongLine: 10, perpendicularOffset: 0 }
      ]
    });
  });

  it('should flip the line when the first point lies beyond the last', () => {
    const result = projector.projectAndOrder([
      projectedPoint('C', 10, 0),
      projectedPoint('A', 5, 1),
      projectedPoint('B', -2, -3)
    ], eastLine);

    expect(result).toEqual({
      ok: true,
      value: [
        { pointId: 'C', distanceAlongLine: -10, perpendicularOffset: 0 },
        { pointId: 'A', distanceAlongLine: -5, perpendicularOffset: -1 },
        { pointId: 'B', distanceAlongLine: 2, perpendicularOffset: 3 }
      ]
    });
  });

  it('should expose the oriented line', () => {
    const result = projector.orientLine([projectedPoint('C', 10, 0), projectedPoint('B', -2, -3)], eastLine);

    expect(result).toEqual({ ok: true, value: { originX: 0, originY: 0, directionX: -1, directionY: 0 } });
  });

  it('should keep input order for distances within a micrometre', () => {
    const result = projector.projectAndOrder([
      projectedPoint('start', 0, 0),
      projectedPoint('north', 2.0000001, 5),
      projectedPoint('south', 2, -5),
      projectedPoint('end', 4, 0)
    ], eastLine);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map(projection => projection.pointId)).toEqual(['start', 'north', 'south', 'end']);
    expect(result.value[1].distanceAlongLine).toBe(2);
  });

  it('should reject points without projected coordinates', () => {
    const result = projector.projectAndOrder([
      projectedPoint('A', 0, 0),
      createSurveyPoint('B', 500000, 200000)
    ], eastLine);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('INVALID_COORDINATE');
    expect(result.error.details).toMatchObject({ pointId: 'B' });
  });

  it('should accept an empty selection', () => {
    expect(projector.projectAndOrder([], eastLine)).toEqual({ ok: true, value: [] });
  });

  it('should produce non-decreasing distances for fitted lines', () => {
    const random = createRandom(42);
    const builder = new SectionLineBuilder();

    for (let round = 0; round < 20; round++) {
      const points = Array.from({ length: 25 }, (_, index) =>
        projectedPoint(`P${index}`, random() * 1000, random() * 400)
      );
      const line = builder.fitLine(points.map(point => ({ x: point.projX ?? 0, y: point.projY ?? 0 })));
      expect(line.ok).toBe(true);
      if (!line.ok) return;

      const result = projector.projectAndOrder(points, line.value);
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      const distances = result.value.map(projection => projection.distanceAlongLine);
      for (let i = 1; i < distances.length; i++) {
        expect(distances[i]).toBeGreaterThanOrEqual(distances[i - 1]);
      }
      expect(new Set(result.value.map(projection => projection.pointId)).size).toBe(points.length);
    }
  });
});
