import { StockExhaustedError } from '../errors/packing.errors';
import { isMaterialCompatible, SheetAllocator } from '../services/sheet-allocator.service';

const part60 = { length: 60, height: 60 };

describe('SheetAllocator', () => {
  it('should issue stock types in order and decrement quantities', () => {
    const allocator = new SheetAllocator(
      [
        { length: 100, width: 100, quantity: 1 },
        { length: 200, width: 200, quantity: 1 },
      ],
      { gap: 0, allowRotation: true }
    );

    const first = allocator.openNewSheet({ part: part60 });
    expect(first).toMatchObject({ index: 0, stockIndex: 0, length: 100, width: 100, closed: false });
    expect(first?.freeRegions).toEqual([{ x: 0, y: 0, width: 100, height: 100 }]);
    expect(allocator.remaining(0)).toBe(0);

    const second = allocator.openNewSheet({ part: part60 });
    expect(second).toMatchObject({ index: 1, stockIndex: 1 });
    expect(allocator.remaining(1)).toBe(0);
    expect(allocator.isExhausted()).toBe(true);

    expect(() => allocator.openNewSheet({ part: part60 })).toThrow(StockExhaustedError);
  });

  it('should return null when remaining stock cannot take the part', () => {
    const allocator = new SheetAllocator(
      [
        { length: 50, width: 50, quantity: 1 },
        { length: 100, width: 100, quantity: 0 },
      ],
      { gap: 0, allowRotation: true }
    );

    expect(allocator.openNewSheet({ part: part60 })).toBeNull();
    expect(allocator.remaining(0)).toBe(1);
  });

  it('should treat a missing quantity as unbounded', () => {
    const allocator = new SheetAllocator([{ length: 100, width: 100 }], { gap: 0, allowRotation: true });
    allocator.openNewSheet({ part: part60 });
    allocator.openNewSheet({ part: part60 });
    expect(allocator.remaining(0)).toBe(Infinity);
    expect(allocator.sheets()).toHaveLength(2);
  });

  it('should close the previous sheet of a type when opening another', () => {
    const allocator = new SheetAllocator([{ length: 100, width: 100 }], { gap: 0, allowRotation: true });
    const first = allocator.openNewSheet({ part: part60 });
    const second = allocator.openNewSheet({ part: part60 });

    expect(first?.closed).toBe(true);
    expect(allocator.activeSheets()).toEqual([second]);
    expect(allocator.currentSheet(0)).toBe(second);

    allocator.closeAll();
    expect(second?.closed).toBe(true);
    expect(allocator.activeSheets()).toEqual([]);
  });

  it('should pick the smallest stock first under the smallest-area policy', () => {
    const allocator = new SheetAllocator(
      [
        { length: 200, width: 200 },
        { length: 100, width: 100 },
      ],
      { gap: 0, allowRotation: true, policy: 'smallest-area' }
    );
    expect(allocator.openNewSheet({ part: { length: 10, height: 10 } })?.stockIndex).toBe(1);
  });

  it('should honour a requested stock type', () => {
    const allocator = new SheetAllocator(
      [
        { length: 100, width: 100 },
        { length: 200, width: 200 },
      ],
      { gap: 0, allowRotation: true }
    );
    expect(allocator.openNewSheet({ part: part60, stockIndex: 1 })?.stockIndex).toBe(1);
  });

  it('should filter stock and active sheets by material', () => {
    const allocator = new SheetAllocator(
      [
        { length: 100, width: 100, material: 'glass' },
        { length: 100, width: 100, material: 'mdf' },
      ],
      { gap: 0, allowRotation: true }
    );

    const sheet = allocator.openNewSheet({ part: { ...part60, material: 'mdf' } });
    expect(sheet).toMatchObject({ stockIndex: 1, material: 'mdf' });
    expect(allocator.activeSheets('glass')).toEqual([]);
    expect(allocator.activeSheets('mdf')).toEqual([sheet]);
    expect(allocator.fitsAnyStock({ ...part60, material: 'oak' })).toBe(false);
  });

  it('should label unlabelled stock with the material of its first part', () => {
    const allocator = new SheetAllocator([{ length: 100, width: 100 }], { gap: 0, allowRotation: true });
    expect(allocator.openNewSheet({ part: { ...part60, material: 'oak' } })?.material).toBe('oak');
  });

  it('should reject an unknown stock index', () => {
    const allocator = new SheetAllocator([{ length: 100, width: 100 }], { gap: 0, allowRotation: true });
    expect(() => allocator.remaining(3)).toThrow(RangeError);
  });

  it('should report whether a part fits any stock type', () => {
    const allocator = new SheetAllocator([{ length: 100, width: 200, quantity: 0 }], { gap: 0, allowRotation: true });
    expect(allocator.fitsAnyStock({ length: 150, height: 50 })).toBe(true);
    expect(allocator.fitsAnyStock({ length: 250, height: 50 })).toBe(false);
  });

  describe('isMaterialCompatible', () => {
    it('should match when either side has no label', () => {
      expect(isMaterialCompatible({ length: 1, width: 1 }, 'glass')).toBe(true);
      expect(isMaterialCompatible({ length: 1, width: 1, material: 'glass' })).toBe(true);
      expect(isMaterialCompatible({ length: 1, width: 1, material: 'glass' }, 'mdf')).toBe(false);
    });
  });
});
