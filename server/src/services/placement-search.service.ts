import { FreeRegion, Sheet } from '../models/cutting.interface';
import { EPSILON } from './free-space.service';

/**
 * Anything with a nominal size can be searched for; PartInstance and Part both qualify
 */
export interface SizedPart {
  length: number;
  height: number;
}

export interface PlacementCandidate {
  regionIndex: number;
  x: number;
  y: number;
  width: number;          // effective part width after rotation
  height: number;         // effective part height after rotation
  reservedWidth: number;  // width cut out of the free region (part + kerf)
  reservedHeight: number;
  rotated: boolean;
  waste: number;
}

interface Orientation {
  width: number;
  height: number;
  rotated: boolean;
}

function orientationsFor(part: SizedPart, allowRotation: boolean): Orientation[] {
  const orientations: Orientation[] = [{ width: part.length, height: part.height, rotated: false }];
  if (allowRotation && part.length !== part.height) {
    orientations.push({ width: part.height, height: part.length, rotated: true });
  }
  return orientations;
}

/**
 * Extent to reserve along one axis, or null when the part does not fit.
 * Kerf is reserved after the part unless the region runs to the sheet edge
 * and only the kerf would overflow it.
 */
export function reserveExtent(
  size: number,
  regionStart: number,
  regionSize: number,
  sheetSize: number,
  gap: number
): number | null {
  if (size + gap <= regionSize + EPSILON) {
    return size + gap;
  }
  const reachesSheetEdge = regionStart + regionSize >= sheetSize - EPSILON;
  if (reachesSheetEdge && size <= regionSize + EPSILON) {
    return regionSize;
  }
  return null;
}

function perimeter(region: FreeRegion): number {
  return 2 * (region.width + region.height);
}

function isBetter(
  candidate: PlacementCandidate,
  candidateRegion: FreeRegion,
  best: PlacementCandidate,
  bestRegion: FreeRegion
): boolean {
  if (candidate.waste < best.waste - EPSILON) return true;
  if (candidate.waste > best.waste + EPSILON) return false;

  if (candidate.rotated !== best.rotated) return !candidate.rotated;

  return perimeter(candidateRegion) < perimeter(bestRegion) - EPSILON;
}

/**
 * Best-area-fit search over a sheet's free regions.
 * Returns null when nothing fits; the caller should try another sheet.
 */
export function findBestPlacement(
  sheet: Pick<Sheet, 'length' | 'width' | 'freeRegions'>,
  part: SizedPart,
  gap: number,
  allowRotation: boolean
): PlacementCandidate | null {
  let best: PlacementCandidate | null = null;
  let bestRegion: FreeRegion | null = null;

  for (let regionIndex = 0; regionIndex < sheet.freeRegions.length; regionIndex++) {
    const region = sheet.freeRegions[regionIndex];
    for (const orientation of orientationsFor(part, allowRotation)) {
      const reservedWidth = reserveExtent(orientation.width, region.x, region.width, sheet.length, gap);
      const reservedHeight = reserveExtent(orientation.height, region.y, region.height, sheet.width, gap);
      if (reservedWidth === null || reservedHeight === null) continue;

      const candidate: PlacementCandidate = {
        regionIndex,
        x: region.x,
        y: region.y,
        width: orientation.width,
        height: orientation.height,
        reservedWidth,
        reservedHeight,
        rotated: orientation.rotated,
        waste: region.width * region.height - orientation.width * orientation.height,
      };

      if (best === null || bestRegion === null || isBetter(candidate, region, best, bestRegion)) {
        best = candidate;
        bestRegion = region;
      }
    }
  }

  return best;
}

/**
 * Whether the part fits an empty sheet of the given size in any allowed orientation
 */
export function fitsEmptySheet(
  sheetLength: number,
  sheetWidth: number,
  part: SizedPart,
  gap: number,
  allowRotation: boolean
): boolean {
  const emptySheet = {
    length: sheetLength,
    width: sheetWidth,
    freeRegions: [{ x: 0, y: 0, width: sheetLength, height: sheetWidth }],
  };
  return findBestPlacement(emptySheet, part, gap, allowRotation) !== null;
}
