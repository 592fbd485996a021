/**
 * Floor Elements - Occupancy Map
 *
 * Reserved 1-D intervals per footprint edge. One map belongs to one
 * generation run; a later policy receives a clone, never the original.
 */

import { OccupiedInterval } from './types';

export class OccupancyMap {
  private readonly intervals: OccupiedInterval[][];

  constructor(edgeCount: number) {
    if (!Number.isInteger(edgeCount) || edgeCount < 0) {
      throw new RangeError(`edgeCount must be a non-negative integer (got ${edgeCount})`);
    }
    this.intervals = Array.from({ length: edgeCount }, () => []);
  }

  get edgeCount(): number {
    return this.intervals.length;
  }

  private edge(edgeIndex: number): OccupiedInterval[] {
    const list = this.intervals[edgeIndex];
    if (list === undefined) {
      throw new RangeError(`edge index ${edgeIndex} out of range (0..${this.intervals.length - 1})`);
    }
    return list;
  }

  /**
   * Whether [start, end] overlaps a reserved interval on the edge.
   * Intervals that only touch do not overlap.
   */
  overlaps(edgeIndex: number, start: number, end: number): boolean {
    return this.edge(edgeIndex).some(iv => start < iv.end && end > iv.start);
  }

  /**
   * Whether an element centered at `center` with clearance `spacing`
   * would collide with anything reserved on the edge
   */
  collides(edgeIndex: number, center: number, spacing: number): boolean {
    return this.overlaps(edgeIndex, center - spacing / 2, center + spacing / 2);
  }

  /**
   * Reserves [center - spacing/2, center + spacing/2] on the edge
   */
  reserve(edgeIndex: number, center: number, spacing: number): OccupiedInterval {
    const interval = { start: center - spacing / 2, end: center + spacing / 2 };
    this.edge(edgeIndex).push(interval);
    return interval;
  }

  /**
   * Reserved intervals of one edge, in reservation order
   */
  intervalsOn(edgeIndex: number): ReadonlyArray<Readonly<OccupiedInterval>> {
    return this.edge(edgeIndex).map(iv => ({ ...iv }));
  }

  get totalReserved(): number {
    return this.intervals.reduce((sum, list) => sum + list.length, 0);
  }

  clone(): OccupancyMap {
    const copy = new OccupancyMap(this.intervals.length);
    this.intervals.forEach((list, i) => {
      copy.intervals[i].push(...list.map(iv => ({ ...iv })));
    });
    return copy;
  }
}
