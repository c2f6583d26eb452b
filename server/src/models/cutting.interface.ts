/**
 * Cutting job types shared by the engine, the refiner, the worker and the API
 * All dimensions are in millimeters
 */

export interface Part {
  id: string; // location label, e.g. "Kitchen W1"
  length: number;
  height: number;
  quantity: number;
  material?: string;
}

export interface StockType {
  length: number;
  width: number;
  quantity?: number; // absent = unbounded
  name?: string;
  material?: string;
}

/**
 * One unit of demand: a Part expanded to quantity 1
 */
export interface PartInstance {
  partId: string;
  instanceId: string; // `${partId}#${n}`, n is 1-based
  length: number;
  height: number;
  material?: string;
  sequence: number; // position in the expanded (input-ordered) list
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type FreeRegion = Rect;

export interface Placement {
  partId: string;
  instanceId: string;
  x: number;
  y: number;
  width: number;  // effective, after rotation
  height: number; // effective, after rotation
  rotated: boolean;
  partLength: number;
  partHeight: number;
  material?: string;
}

export interface Sheet {
  index: number;
  stockIndex: number;
  length: number;
  width: number;
  stockName?: string;
  material?: string;
  placements: Placement[];
  freeRegions: FreeRegion[];
  closed: boolean;
}

export type UnplacedReason = 'part-exceeds-all-stock' | 'stock-exhausted' | 'dropped-by-refinement';

export interface UnplacedPart {
  partId: string;
  instanceId: string;
  length: number;
  height: number;
  reason: UnplacedReason;
}

export interface Solution {
  sheets: Sheet[];
  unplaced: UnplacedPart[];
  stockExhausted: boolean;
}

export type StockSelectionPolicy = 'in-order' | 'smallest-area';

export type CrossoverMode = 'sequence' | 'sheet-splice';

export interface RefineConfig {
  populationSize?: number;
  generations?: number;
  seed?: number;
  mutationRate?: number;
  topK?: number;
  jitter?: number;
  patience?: number;
  crossover?: CrossoverMode;
}

export interface PackingOptions {
  gap: number;
  allowRotation: boolean;
  stockSelection: StockSelectionPolicy;
  refine?: RefineConfig;
}

export interface SheetSizeCount {
  key: string; // "<length>x<width>"
  length: number;
  width: number;
  count: number;
}

export interface SheetStats {
  index: number;
  length: number;
  width: number;
  placedCount: number;
  usedArea: number;
  utilizationPct: number;
}

export interface LayoutGroup {
  signature: string;
  length: number;
  width: number;
  count: number;
  sheetIndices: number[];
}

export interface Report {
  sheetsUsed: number;
  totalStockArea: number;
  totalPartArea: number;
  totalStockAreaSqm: number;
  totalPartAreaSqm: number;
  utilizationPct: number;
  wastePct: number;
  sheetSizeHistogram: SheetSizeCount[];
  perSheet: SheetStats[];
  layoutGroups: LayoutGroup[];
  unplacedCount: number;
}

export interface RefinementSummary {
  fitness: number;
  generations: number;
  improvements: number;
  seed: number;
}

export interface CuttingResult {
  solution: Solution;
  report: Report;
  refinement?: RefinementSummary;
}
