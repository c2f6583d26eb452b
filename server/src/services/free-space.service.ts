import { FreeRegion, Rect } from '../models/cutting.interface';

export const EPSILON = 1e-9;

export function rectArea(rect: Rect): number {
  return rect.width * rect.height;
}

/**
 * True when the two rectangles share interior area (touching edges do not count)
 */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return (
    a.x < b.x + b.width - EPSILON &&
    a.x + a.width > b.x + EPSILON &&
    a.y < b.y + b.height - EPSILON &&
    a.y + a.height > b.y + EPSILON
  );
}

export function rectContains(outer: Rect, inner: Rect): boolean {
  return (
    inner.x >= outer.x - EPSILON &&
    inner.y >= outer.y - EPSILON &&
    inner.x + inner.width <= outer.x + outer.width + EPSILON &&
    inner.y + inner.height <= outer.y + outer.height + EPSILON
  );
}

function nearlyEqual(a: number, b: number): boolean {
  return Math.abs(a - b) <= EPSILON;
}

/**
 * Guillotine remainders of `region` once `placed` is cut out of it.
 * Below and above span the region's full width; left and right are clipped
 * to the placed rectangle's vertical extent inside the region.
 */
export function carveRegion(region: FreeRegion, placed: Rect): FreeRegion[] {
  const regionTop = region.y + region.height;
  const regionRight = region.x + region.width;
  const placedTop = placed.y + placed.height;
  const placedRight = placed.x + placed.width;

  const bandBottom = Math.max(region.y, placed.y);
  const bandTop = Math.min(regionTop, placedTop);
  const bandHeight = bandTop - bandBottom;

  const remainders: FreeRegion[] = [
    // below
    { x: region.x, y: region.y, width: region.width, height: placed.y - region.y },
    // above
    { x: region.x, y: placedTop, width: region.width, height: regionTop - placedTop },
    // left
    { x: region.x, y: bandBottom, width: placed.x - region.x, height: bandHeight },
    // right
    { x: placedRight, y: bandBottom, width: regionRight - placedRight, height: bandHeight },
  ];

  return remainders.filter(r => r.width > EPSILON && r.height > EPSILON);
}

/**
 * Merge pairs of regions that share a full edge. Mutates the array in place.
 */
export function mergeAdjacentRegions(regions: FreeRegion[]): void {
  let merged = true;
  while (merged) {
    merged = false;
    outer: for (let i = 0; i < regions.length; i++) {
      for (let j = i + 1; j < regions.length; j++) {
        const a = regions[i];
        const b = regions[j];

        // Side by side: same band, touching in x
        if (nearlyEqual(a.y, b.y) && nearlyEqual(a.height, b.height)) {
          if (nearlyEqual(a.x + a.width, b.x) || nearlyEqual(b.x + b.width, a.x)) {
            regions[i] = { x: Math.min(a.x, b.x), y: a.y, width: a.width + b.width, height: a.height };
            regions.splice(j, 1);
            merged = true;
            break outer;
          }
        }

        // Stacked: same column, touching in y
        if (nearlyEqual(a.x, b.x) && nearlyEqual(a.width, b.width)) {
          if (nearlyEqual(a.y + a.height, b.y) || nearlyEqual(b.y + b.height, a.y)) {
            regions[i] = { x: a.x, y: Math.min(a.y, b.y), width: a.width, height: a.height + b.height };
            regions.splice(j, 1);
            merged = true;
            break outer;
          }
        }
      }
    }
  }
}

/**
 * Remove regions fully contained in another region. Mutates the array in place.
 */
export function pruneContainedRegions(regions: FreeRegion[]): void {
  for (let i = regions.length - 1; i >= 0; i--) {
    for (let j = 0; j < regions.length; j++) {
      if (i === j) continue;
      if (rectContains(regions[j], regions[i])) {
        regions.splice(i, 1);
        break;
      }
    }
  }
}

/**
 * Per-sheet ledger of unused rectangular space
 */
export class FreeSpaceTracker {
  private ledger: FreeRegion[];

  constructor(length: number, width: number);
  constructor(regions: FreeRegion[]);
  constructor(lengthOrRegions: number | FreeRegion[], width = 0) {
    this.ledger = Array.isArray(lengthOrRegions)
      ? lengthOrRegions.map(r => ({ ...r }))
      : [{ x: 0, y: 0, width: lengthOrRegions, height: width }];
  }

  regions(): FreeRegion[] {
    return this.ledger.map(r => ({ ...r }));
  }

  freeArea(): number {
    return this.ledger.reduce((sum, r) => sum + rectArea(r), 0);
  }

  /**
   * Cut `placed` out of the ledger. `placed` must lie inside the region at
   * `regionIndex`; any other region it touches is carved as well.
   * Returns the remainders created by this commit.
   */
  commit(regionIndex: number, placed: Rect): FreeRegion[] {
    const target = this.ledger[regionIndex];
    if (target === undefined) {
      throw new RangeError(`Free region ${regionIndex} does not exist (ledger has ${this.ledger.length})`);
    }
    if (placed.width <= 0 || placed.height <= 0 || !rectContains(target, placed)) {
      throw new RangeError(
        `Rectangle ${placed.width}x${placed.height} at (${placed.x}, ${placed.y}) does not fit free region ${regionIndex}`
      );
    }

    const kept: FreeRegion[] = [];
    const created: FreeRegion[] = [];

    for (const region of this.ledger) {
      if (rectsOverlap(region, placed)) {
        created.push(...carveRegion(region, placed));
      } else {
        kept.push(region);
      }
    }

    const next = [...kept, ...created];
    mergeAdjacentRegions(next);
    pruneContainedRegions(next);
    this.ledger = next;

    return created.map(r => ({ ...r }));
  }
}
