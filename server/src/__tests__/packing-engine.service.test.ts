import { Part, Solution, StockType } from '../models/cutting.interface';
import { expandParts, orderInstances, PackingEngine } from '../services/packing-engine.service';
import { rectsOverlap } from '../services/free-space.service';
import { createSeededRandom } from '../utils/random';

function pack(parts: Part[], stockTypes: StockType[], gap = 0, allowRotation = true): Solution {
  return new PackingEngine(stockTypes, { gap, allowRotation }).run(parts);
}

function placedCount(solution: Solution): number {
  return solution.sheets.reduce((sum, sheet) => sum + sheet.placements.length, 0);
}

describe('PackingEngine', () => {
  describe('expandParts', () => {
    it('should expand quantities into numbered instances', () => {
      const instances = expandParts([
        { id: 'A', length: 10, height: 5, quantity: 2 },
        { id: 'B', length: 3, height: 3, quantity: 1 },
      ]);

      expect(instances.map(i => i.instanceId)).toEqual(['A#1', 'A#2', 'B#1']);
      expect(instances.map(i => i.sequence)).toEqual([0, 1, 2]);
    });

    it('should keep numbering across rows that share a label', () => {
      const instances = expandParts([
        { id: 'K', length: 10, height: 5, quantity: 1 },
        { id: 'K', length: 3, height: 3, quantity: 2 },
      ]);

      expect(instances.map(i => i.instanceId)).toEqual(['K#1', 'K#2', 'K#3']);
    });
  });

  describe('orderInstances', () => {
    it('should order by area, then height, then input order', () => {
      const ordered = orderInstances(
        expandParts([
          { id: 'a', length: 10, height: 10, quantity: 1 },
          { id: 'b', length: 20, height: 10, quantity: 2 },
          { id: 'c', length: 10, height: 20, quantity: 1 },
        ])
      );

      expect(ordered.map(i => i.instanceId)).toEqual(['c#1', 'b#1', 'b#2', 'a#1']);
    });

    it('should keep material groups together in order of first appearance', () => {
      const ordered = orderInstances(
        expandParts([
          { id: 'x', length: 10, height: 10, quantity: 1, material: 'm2' },
          { id: 'y', length: 50, height: 50, quantity: 1, material: 'm1' },
          { id: 'z', length: 30, height: 30, quantity: 1, material: 'm2' },
        ])
      );

      expect(ordered.map(i => i.instanceId)).toEqual(['z#1', 'x#1', 'y#1']);
    });

    it('should reproduce a jittered order for the same seed', () => {
      const instances = expandParts([
        { id: 'a', length: 10, height: 10, quantity: 3 },
        { id: 'b', length: 11, height: 9, quantity: 3 },
      ]);

      const first = orderInstances(instances, 0.5, createSeededRandom(42));
      const second = orderInstances(instances, 0.5, createSeededRandom(42));

      expect(second.map(i => i.instanceId)).toEqual(first.map(i => i.instanceId));
      expect([...first].sort((p, q) => p.sequence - q.sequence)).toEqual(instances);
    });
  });

  describe('scenarios', () => {
    it('should fit four 400x300 parts on one 1000x1000 sheet', () => {
      const solution = pack(
        [{ id: 'W1', length: 400, height: 300, quantity: 4 }],
        [{ length: 1000, width: 1000 }]
      );

      expect(solution.sheets).toHaveLength(1);
      expect(solution.unplaced).toEqual([]);
      expect(solution.sheets[0].placements.map(p => [p.x, p.y, p.rotated])).toEqual([
        [0, 0, false],
        [400, 0, false],
        [0, 300, false],
        [400, 300, false],
      ]);
    });

    it('should rotate a part that only fits turned', () => {
      const solution = pack(
        [{ id: 'P', length: 150, height: 50, quantity: 1 }],
        [{ length: 100, width: 200, quantity: 1 }]
      );

      expect(solution.sheets[0].placements[0]).toMatchObject({
        x: 0,
        y: 0,
        rotated: true,
        width: 50,
        height: 150,
        partLength: 150,
        partHeight: 50,
      });
    });

    it('should report a 150x50 part as too large for a 100x100 sheet', () => {
      const solution = pack(
        [{ id: 'P', length: 150, height: 50, quantity: 1 }],
        [{ length: 100, width: 100, quantity: 1 }]
      );

      expect(solution.sheets).toEqual([]);
      expect(solution.unplaced).toEqual([
        { partId: 'P', instanceId: 'P#1', length: 150, height: 50, reason: 'part-exceeds-all-stock' },
      ]);
    });

    it('should list a part larger than every stock type as unplaced', () => {
      const solution = pack(
        [{ id: 'Big', length: 200, height: 200, quantity: 1 }],
        [{ length: 100, width: 100, quantity: 1 }]
      );

      expect(solution.sheets).toHaveLength(0);
      expect(solution.unplaced).toHaveLength(1);
      expect(solution.unplaced[0].reason).toBe('part-exceeds-all-stock');
      expect(solution.stockExhausted).toBe(false);
    });

    it('should move on to the next stock type once the first runs out', () => {
      const solution = pack(
        [{ id: 'S', length: 60, height: 60, quantity: 3 }],
        [
          { length: 100, width: 100, quantity: 1 },
          { length: 200, width: 200, quantity: 1 },
        ]
      );

      expect(solution.sheets.map(s => [s.stockIndex, s.length, s.placements.length])).toEqual([
        [0, 100, 1],
        [1, 200, 2],
      ]);
      expect(solution.sheets[1].placements.map(p => [p.x, p.y])).toEqual([
        [0, 0],
        [60, 0],
      ]);
      expect(solution.stockExhausted).toBe(false);
    });

    it('should keep the cutting gap between neighbours', () => {
      const solution = pack(
        [{ id: 'G', length: 40, height: 40, quantity: 2 }],
        [{ length: 100, width: 100, quantity: 1 }],
        10
      );

      const [first, second] = solution.sheets[0].placements;
      expect([first.x, first.y]).toEqual([0, 0]);
      expect(second.x).toBe(50);
      expect(second.y).toBe(0);
    });
  });

  describe('stock exhaustion', () => {
    it('should stop placing once every stock type is used up', () => {
      const solution = pack(
        [
          { id: 'A', length: 60, height: 60, quantity: 2 },
          { id: 'B', length: 10, height: 10, quantity: 1 },
        ],
        [{ length: 100, width: 100, quantity: 1 }]
      );

      expect(solution.stockExhausted).toBe(true);
      expect(placedCount(solution)).toBe(1);
      expect(solution.unplaced.map(u => [u.instanceId, u.reason])).toEqual([
        ['A#2', 'stock-exhausted'],
        ['B#1', 'stock-exhausted'],
      ]);
    });

    it('should keep going when remaining stock is merely too small for one part', () => {
      const solution = pack(
        [
          { id: 'A', length: 80, height: 80, quantity: 2 },
          { id: 'B', length: 30, height: 30, quantity: 1 },
        ],
        [
          { length: 100, width: 100, quantity: 1 },
          { length: 40, width: 40, quantity: 1 },
        ]
      );

      expect(solution.stockExhausted).toBe(false);
      expect(solution.unplaced.map(u => [u.instanceId, u.reason])).toEqual([['A#2', 'stock-exhausted']]);
      expect(solution.sheets.map(s => s.stockIndex)).toEqual([0, 1]);
    });
  });

  describe('materials', () => {
    it('should never share a sheet between materials', () => {
      const solution = pack(
        [
          { id: 'G', length: 50, height: 50, quantity: 1, material: 'glass' },
          { id: 'M', length: 50, height: 50, quantity: 1, material: 'mdf' },
        ],
        [{ length: 100, width: 100 }]
      );

      expect(solution.sheets.map(s => s.material)).toEqual(['glass', 'mdf']);
      expect(solution.sheets.map(s => s.placements.map(p => p.partId))).toEqual([['G'], ['M']]);
    });
  });

  describe('invariants', () => {
    const parts: Part[] = [
      { id: 'K1', length: 700, height: 450, quantity: 3 },
      { id: 'K2', length: 320, height: 610, quantity: 4 },
      { id: 'K3', length: 150, height: 150, quantity: 7 },
      { id: 'K4', length: 1200, height: 90, quantity: 2 },
      { id: 'K5', length: 2500, height: 400, quantity: 1 },
    ];
    const stockTypes: StockType[] = [
      { length: 1500, width: 1000, quantity: 3 },
      { length: 2000, width: 1200, quantity: 2 },
    ];
    const gap = 4;

    it('should account for every instance exactly once', () => {
      const solution = pack(parts, stockTypes, gap);
      const demand = parts.reduce((sum, part) => sum + part.quantity, 0);

      const ids = [
        ...solution.sheets.flatMap(s => s.placements.map(p => p.instanceId)),
        ...solution.unplaced.map(u => u.instanceId),
      ];
      expect(ids).toHaveLength(demand);
      expect(new Set(ids).size).toBe(demand);
      expect(solution.unplaced.find(u => u.partId === 'K5')?.reason).toBe('part-exceeds-all-stock');
    });

    it('should keep placements inside their sheet and apart from each other', () => {
      const solution = pack(parts, stockTypes, gap);

      for (const sheet of solution.sheets) {
        for (const p of sheet.placements) {
          expect(p.x).toBeGreaterThanOrEqual(0);
          expect(p.y).toBeGreaterThanOrEqual(0);
          expect(p.x + p.width).toBeLessThanOrEqual(sheet.length);
          expect(p.y + p.height).toBeLessThanOrEqual(sheet.width);
          const expected = p.rotated ? [p.partHeight, p.partLength] : [p.partLength, p.partHeight];
          expect([p.width, p.height]).toEqual(expected);
        }
        for (let i = 0; i < sheet.placements.length; i++) {
          for (let j = i + 1; j < sheet.placements.length; j++) {
            expect(rectsOverlap(sheet.placements[i], sheet.placements[j])).toBe(false);
          }
        }
        for (const region of sheet.freeRegions) {
          for (const p of sheet.placements) {
            expect(rectsOverlap(region, p)).toBe(false);
          }
        }
      }
    });

    it('should return the same layout on every run', () => {
      expect(pack(parts, stockTypes, gap)).toEqual(pack(parts, stockTypes, gap));
    });

    it('should close every sheet it returns', () => {
      const solution = pack(parts, stockTypes, gap);
      expect(solution.sheets.every(s => s.closed)).toBe(true);
      expect(solution.sheets.every(s => s.placements.length > 0)).toBe(true);
    });
  });
});
