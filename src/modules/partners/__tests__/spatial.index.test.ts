import { SpatialIndex } from '../spatial.index.js';

const box = (minLng: number, minLat: number, maxLng: number, maxLat: number) => ({ minLng, minLat, maxLng, maxLat });

describe('SpatialIndex', () => {
  it('finds entries whose bounding box contains the point', () => {
    const index = new SpatialIndex(1);
    index.insert('a', box(0, 0, 2, 2));
    expect(index.search([1.5, 1.5])).toEqual(['a']);
    // same grid cell, outside the box
    expect(index.search([2.5, 1])).toEqual([]);
    expect(index.search([50, 50])).toEqual([]);
  });

  it('handles negative coordinates', () => {
    const index = new SpatialIndex(1);
    index.insert('p', box(-46.7, -23.6, -46.6, -23.5));
    expect(index.search([-46.65, -23.55])).toEqual(['p']);
  });

  it('returns matches in insertion order', () => {
    const index = new SpatialIndex(0.5);
    index.insert('b', box(0, 0, 3, 3));
    index.insert('a', box(0, 0, 3, 3));
    expect(index.search([1.2, 2.7])).toEqual(['b', 'a']);
  });

  it('removes entries from every cell', () => {
    const index = new SpatialIndex(1);
    index.insert('a', box(0, 0, 5, 5));
    expect(index.remove('a')).toBe(true);
    expect(index.remove('a')).toBe(false);
    expect(index.size).toBe(0);
    expect(index.search([4.5, 0.5])).toEqual([]);
  });

  it('re-inserting an id replaces its box', () => {
    const index = new SpatialIndex(1);
    index.insert('a', box(0, 0, 1, 1));
    index.insert('a', box(10, 10, 11, 11));
    expect(index.size).toBe(1);
    expect(index.search([0.5, 0.5])).toEqual([]);
    expect(index.search([10.5, 10.5])).toEqual(['a']);
  });

  it('rejects a non-positive cell size', () => {
    expect(() => new SpatialIndex(0)).toThrow(RangeError);
  });
});
