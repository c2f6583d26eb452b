import {
  Part,
  PartInstance,
  Placement,
  Sheet,
  Solution,
  StockSelectionPolicy,
  StockType,
  UnplacedPart,
  UnplacedReason,
} from '../models/cutting.interface';
import { StockExhaustedError } from '../errors/packing.errors';
import { FreeSpaceTracker } from './free-space.service';
import { findBestPlacement, PlacementCandidate } from './placement-search.service';
import { SheetAllocator } from './sheet-allocator.service';
import { RandomSource } from '../utils/random';

export interface EngineOptions {
  gap: number;
  allowRotation: boolean;
  stockSelection?: StockSelectionPolicy;
  /** Relative jitter applied to the area sort key; needs `random` */
  jitter?: number;
  random?: RandomSource;
}

/**
 * Turn each Part into `quantity` unit-demand instances.
 * Rows may share a label; numbering continues across them so instance ids stay unique.
 */
export function expandParts(parts: Part[]): PartInstance[] {
  const instances: PartInstance[] = [];
  const issued = new Map<string, number>();
  for (const part of parts) {
    for (let n = 1; n <= part.quantity; n++) {
      const number = (issued.get(part.id) ?? 0) + 1;
      issued.set(part.id, number);
      instances.push({
        partId: part.id,
        instanceId: `${part.id}#${number}`,
        length: part.length,
        height: part.height,
        material: part.material,
        sequence: instances.length,
      });
    }
  }
  return instances;
}

/**
 * Rank of each material label by first appearance; unlabelled parts form their own group
 */
function materialRanks(instances: PartInstance[]): Map<string | undefined, number> {
  const ranks = new Map<string | undefined, number>();
  for (const instance of instances) {
    if (!ranks.has(instance.material)) {
      ranks.set(instance.material, ranks.size);
    }
  }
  return ranks;
}

/**
 * Material groups in order of first appearance, then big pieces first:
 * area descending, height descending, input order.
 * With jitter, each area key is scaled by 1 + jitter * u, u in [-1, 1).
 */
export function orderInstances(
  instances: PartInstance[],
  jitter = 0,
  random?: RandomSource
): PartInstance[] {
  const ranks = materialRanks(instances);
  const keyed = instances.map(instance => {
    const area = instance.length * instance.height;
    const scale = jitter > 0 && random ? 1 + jitter * (random() * 2 - 1) : 1;
    return { instance, group: ranks.get(instance.material) ?? 0, key: area * scale };
  });

  keyed.sort((a, b) => {
    if (a.group !== b.group) return a.group - b.group;
    if (a.key !== b.key) return b.key - a.key;
    if (a.instance.height !== b.instance.height) return b.instance.height - a.instance.height;
    return a.instance.sequence - b.instance.sequence;
  });

  return keyed.map(k => k.instance);
}

/**
 * Commit a candidate to a sheet: carve the free space, then record the placement.
 * The tracker validates before anything on the sheet changes.
 */
export function placeOnSheet(sheet: Sheet, candidate: PlacementCandidate, instance: PartInstance): Placement {
  const tracker = new FreeSpaceTracker(sheet.freeRegions);
  tracker.commit(candidate.regionIndex, {
    x: candidate.x,
    y: candidate.y,
    width: candidate.reservedWidth,
    height: candidate.reservedHeight,
  });

  const placement: Placement = {
    partId: instance.partId,
    instanceId: instance.instanceId,
    x: candidate.x,
    y: candidate.y,
    width: candidate.width,
    height: candidate.height,
    rotated: candidate.rotated,
    partLength: instance.length,
    partHeight: instance.height,
    material: instance.material,
  };

  sheet.freeRegions = tracker.regions();
  sheet.placements.push(placement);
  return placement;
}

function toUnplaced(instance: PartInstance, reason: UnplacedReason): UnplacedPart {
  return {
    partId: instance.partId,
    instanceId: instance.instanceId,
    length: instance.length,
    height: instance.height,
    reason,
  };
}

/**
 * One greedy cutting run over a fixed stock list
 */
export class PackingEngine {
  constructor(
    private readonly stockTypes: StockType[],
    private readonly options: EngineOptions
  ) {}

  run(parts: Part[]): Solution {
    const ordered = orderInstances(expandParts(parts), this.options.jitter, this.options.random);
    return this.runInstances(ordered);
  }

  /**
   * Place instances in exactly the given order
   */
  runInstances(ordered: PartInstance[]): Solution {
    const { gap, allowRotation } = this.options;
    const allocator = new SheetAllocator(this.stockTypes, {
      gap,
      allowRotation,
      policy: this.options.stockSelection,
    });

    const unplaced: UnplacedPart[] = [];
    let stockExhausted = false;

    for (const instance of ordered) {
      if (stockExhausted) {
        unplaced.push(toUnplaced(instance, 'stock-exhausted'));
        continue;
      }

      if (!allocator.fitsAnyStock(instance)) {
        unplaced.push(toUnplaced(instance, 'part-exceeds-all-stock'));
        continue;
      }

      if (this.placeOnActiveSheet(allocator, instance)) {
        continue;
      }

      let fresh: Sheet | null;
      try {
        fresh = allocator.openNewSheet({ part: instance });
      } catch (error) {
        if (!(error instanceof StockExhaustedError)) throw error;
        stockExhausted = true;
        unplaced.push(toUnplaced(instance, 'stock-exhausted'));
        continue;
      }

      if (fresh === null) {
        unplaced.push(toUnplaced(instance, 'stock-exhausted'));
        continue;
      }

      const candidate = findBestPlacement(fresh, instance, gap, allowRotation);
      if (candidate === null) {
        unplaced.push(toUnplaced(instance, 'part-exceeds-all-stock'));
        continue;
      }
      placeOnSheet(fresh, candidate, instance);
    }

    allocator.closeAll();
    const sheets = allocator.sheets().filter(sheet => sheet.placements.length > 0);

    return { sheets, unplaced, stockExhausted };
  }

  private placeOnActiveSheet(allocator: SheetAllocator, instance: PartInstance): boolean {
    for (const sheet of allocator.activeSheets(instance.material)) {
      const candidate = findBestPlacement(sheet, instance, this.options.gap, this.options.allowRotation);
      if (candidate) {
        placeOnSheet(sheet, candidate, instance);
        return true;
      }
    }
    return false;
  }
}
