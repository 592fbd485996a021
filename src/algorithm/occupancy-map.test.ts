/**
 * Occupancy Map Tests
 */

import { OccupancyMap } from './occupancy-map';

describe('OccupancyMap', () => {
  let map: OccupancyMap;

  beforeEach(() => {
    map = new OccupancyMap(4);
  });

  it('should start empty', () => {
    expect(map.edgeCount).toBe(4);
    expect(map.totalReserved).toBe(0);
    expect(map.collides(0, 5, 2)).toBe(false);
  });

  it('should reserve a centered interval', () => {
    expect(map.reserve(0, 5, 2)).toEqual({ start: 4, end: 6 });
    expect(map.intervalsOn(0)).toEqual([{ start: 4, end: 6 }]);
    expect(map.totalReserved).toBe(1);
  });

  it('should allow intervals that only touch', () => {
    map.reserve(0, 5, 2);
    expect(map.collides(0, 7, 2)).toBe(false);
    expect(map.collides(0, 3, 2)).toBe(false);
  });

  it('should detect overlapping intervals', () => {
    map.reserve(0, 5, 2);
    expect(map.collides(0, 6.9, 2)).toBe(true);
    expect(map.overlaps(0, 5.5, 5.6)).toBe(true);
  });

  it('should keep edges separate', () => {
    map.reserve(0, 5, 2);
    expect(map.collides(1, 5, 2)).toBe(false);
  });

  it('should clone without sharing intervals', () => {
    map.reserve(2, 3, 1);
    const copy = map.clone();
    copy.reserve(2, 8, 1);

    expect(map.intervalsOn(2)).toEqual([{ start: 2.5, end: 3.5 }]);
    expect(copy.intervalsOn(2)).toEqual([
      { start: 2.5, end: 3.5 },
      { start: 7.5, end: 8.5 }
    ]);
  });

  it('should return copies from intervalsOn', () => {
    map.reserve(0, 5, 2);
    expect(map.intervalsOn(0)[0]).not.toBe(map.intervalsOn(0)[0]);
  });

  it('should reject out-of-range edge indices', () => {
    expect(() => map.reserve(4, 1, 1)).toThrow(RangeError);
    expect(() => map.collides(-1, 1, 1)).toThrow(RangeError);
  });

  it('should reject invalid edge counts', () => {
    expect(() => new OccupancyMap(-1)).toThrow(RangeError);
    expect(() => new OccupancyMap(2.5)).toThrow(RangeError);
  });
});
