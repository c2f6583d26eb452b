import { Sheet, StockSelectionPolicy, StockType } from '../models/cutting.interface';
import { StockExhaustedError } from '../errors/packing.errors';
import { fitsEmptySheet, SizedPart } from './placement-search.service';

export interface AllocatorOptions {
  gap: number;
  allowRotation: boolean;
  policy?: StockSelectionPolicy;
}

export interface OpenSheetRequest {
  part: SizedPart & { material?: string };
  stockIndex?: number; // restrict to one stock type
}

interface StockSlot {
  stock: StockType;
  stockIndex: number;
  remaining: number;
  active?: Sheet;
}

/**
 * A material label on either side acts as a filter; a missing label matches anything
 */
export function isMaterialCompatible(stock: StockType, material?: string): boolean {
  return stock.material === undefined || material === undefined || stock.material === material;
}

/**
 * Owns the stock pool: remaining quantity per stock type and the single
 * active sheet of each type. Sheets are only ever created here.
 */
export class SheetAllocator {
  private readonly slots: StockSlot[];
  private readonly opened: Sheet[] = [];
  private readonly gap: number;
  private readonly allowRotation: boolean;
  private readonly policy: StockSelectionPolicy;

  constructor(stockTypes: StockType[], options: AllocatorOptions) {
    this.slots = stockTypes.map((stock, stockIndex) => ({
      stock,
      stockIndex,
      remaining: stock.quantity === undefined ? Infinity : stock.quantity,
    }));
    this.gap = options.gap;
    this.allowRotation = options.allowRotation;
    this.policy = options.policy ?? 'in-order';
  }

  /**
   * Active (not yet closed) sheets in ascending stock index
   */
  activeSheets(material?: string): Sheet[] {
    return this.slots
      .map(slot => slot.active)
      .filter((sheet): sheet is Sheet => sheet !== undefined)
      .filter(sheet => sheet.material === undefined || material === undefined || sheet.material === material);
  }

  currentSheet(stockIndex: number): Sheet | undefined {
    return this.slots[stockIndex]?.active;
  }

  remaining(stockIndex: number): number {
    const slot = this.slots[stockIndex];
    if (!slot) {
      throw new RangeError(`Unknown stock type ${stockIndex}`);
    }
    return slot.remaining;
  }

  isExhausted(): boolean {
    return this.slots.every(slot => slot.remaining <= 0);
  }

  /**
   * Whether the part fits some configured stock type, ignoring quantities
   */
  fitsAnyStock(part: SizedPart & { material?: string }): boolean {
    return this.slots.some(
      slot =>
        isMaterialCompatible(slot.stock, part.material) &&
        fitsEmptySheet(slot.stock.length, slot.stock.width, part, this.gap, this.allowRotation)
    );
  }

  /**
   * Open a sheet able to take `part`. Closes the previous active sheet of
   * the chosen type. Returns null when stock remains but none of it can take
   * the part; throws StockExhaustedError once every type is used up.
   */
  openNewSheet(request: OpenSheetRequest): Sheet | null {
    if (this.isExhausted()) {
      throw new StockExhaustedError();
    }

    const { part, stockIndex } = request;
    const candidates = stockIndex !== undefined
      ? this.slots.filter(slot => slot.stockIndex === stockIndex)
      : this.orderedSlots();

    for (const slot of candidates) {
      if (slot.remaining <= 0) continue;
      if (!isMaterialCompatible(slot.stock, part.material)) continue;
      if (!fitsEmptySheet(slot.stock.length, slot.stock.width, part, this.gap, this.allowRotation)) continue;

      return this.issue(slot, part.material);
    }

    return null;
  }

  closeAll(): void {
    for (const slot of this.slots) {
      if (slot.active) {
        slot.active.closed = true;
        slot.active = undefined;
      }
    }
  }

  /**
   * Every sheet issued so far, in opening order
   */
  sheets(): Sheet[] {
    return [...this.opened];
  }

  private orderedSlots(): StockSlot[] {
    if (this.policy === 'in-order') {
      return this.slots;
    }
    return [...this.slots].sort((a, b) => {
      const areaDiff = a.stock.length * a.stock.width - b.stock.length * b.stock.width;
      if (areaDiff !== 0) return areaDiff;
      return a.stockIndex - b.stockIndex;
    });
  }

  private issue(slot: StockSlot, partMaterial?: string): Sheet {
    if (slot.active) {
      slot.active.closed = true;
    }

    const { stock } = slot;
    const sheet: Sheet = {
      index: this.opened.length,
      stockIndex: slot.stockIndex,
      length: stock.length,
      width: stock.width,
      stockName: stock.name,
      material: stock.material ?? partMaterial,
      placements: [],
      freeRegions: [{ x: 0, y: 0, width: stock.length, height: stock.width }],
      closed: false,
    };

    slot.remaining -= 1;
    slot.active = sheet;
    this.opened.push(sheet);
    return sheet;
  }
}
