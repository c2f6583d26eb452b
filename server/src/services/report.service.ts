import {
  LayoutGroup,
  Placement,
  Report,
  Sheet,
  SheetSizeCount,
  SheetStats,
  Solution,
} from '../models/cutting.interface';

const MM2_PER_SQM = 1_000_000;

function clampPct(value: number): number {
  return Math.min(100, Math.max(0, value));
}

function placedArea(placements: Placement[]): number {
  return placements.reduce((sum, p) => sum + p.partLength * p.partHeight, 0);
}

export function sheetSizeKey(length: number, width: number): string {
  return `${length}x${width}`;
}

/**
 * Order-independent fingerprint of a sheet's layout: sheet size plus the
 * sorted multiset of (nominal length, nominal height, rotated)
 */
export function layoutSignature(sheet: Sheet): string {
  const items = sheet.placements
    .map(p => `${p.partLength}x${p.partHeight}${p.rotated ? 'R' : ''}`)
    .sort();
  return `${sheetSizeKey(sheet.length, sheet.width)}|${items.join(',')}`;
}

function sheetStats(sheet: Sheet): SheetStats {
  const usedArea = placedArea(sheet.placements);
  const area = sheet.length * sheet.width;
  return {
    index: sheet.index,
    length: sheet.length,
    width: sheet.width,
    placedCount: sheet.placements.length,
    usedArea,
    utilizationPct: area > 0 ? clampPct((usedArea * 100) / area) : 0,
  };
}

function sizeHistogram(sheets: Sheet[]): SheetSizeCount[] {
  const counts = new Map<string, SheetSizeCount>();
  for (const sheet of sheets) {
    const key = sheetSizeKey(sheet.length, sheet.width);
    const entry = counts.get(key);
    if (entry) {
      entry.count++;
    } else {
      counts.set(key, { key, length: sheet.length, width: sheet.width, count: 1 });
    }
  }
  return [...counts.values()];
}

function groupLayouts(sheets: Sheet[]): LayoutGroup[] {
  const groups = new Map<string, LayoutGroup>();
  for (const sheet of sheets) {
    const signature = layoutSignature(sheet);
    const group = groups.get(signature);
    if (group) {
      group.count++;
      group.sheetIndices.push(sheet.index);
    } else {
      groups.set(signature, {
        signature,
        length: sheet.length,
        width: sheet.width,
        count: 1,
        sheetIndices: [sheet.index],
      });
    }
  }
  return [...groups.values()];
}

/**
 * Read-only statistics over a finished Solution
 */
export function buildReport(solution: Solution): Report {
  const { sheets } = solution;
  const totalStockArea = sheets.reduce((sum, s) => sum + s.length * s.width, 0);
  const totalPartArea = sheets.reduce((sum, s) => sum + placedArea(s.placements), 0);

  const utilizationPct = totalStockArea > 0 ? clampPct((totalPartArea * 100) / totalStockArea) : 0;
  const wastePct = sheets.length > 0 ? clampPct(100 - utilizationPct) : 0;

  return {
    sheetsUsed: sheets.length,
    totalStockArea,
    totalPartArea,
    totalStockAreaSqm: totalStockArea / MM2_PER_SQM,
    totalPartAreaSqm: totalPartArea / MM2_PER_SQM,
    utilizationPct,
    wastePct,
    sheetSizeHistogram: sizeHistogram(sheets),
    perSheet: sheets.map(sheetStats),
    layoutGroups: groupLayouts(sheets),
    unplacedCount: solution.unplaced.length,
  };
}

export function formatReportSummary(report: Report): string {
  const lines = [
    `Total stock area: ${report.totalStockAreaSqm.toFixed(3)} sq m`,
    `Total part area: ${report.totalPartAreaSqm.toFixed(3)} sq m`,
    `Total sheets used: ${report.sheetsUsed}`,
    `Used area percentage: ${report.utilizationPct.toFixed(2)}%`,
    `Wastage percentage: ${report.wastePct.toFixed(2)}%`,
  ];
  if (report.unplacedCount > 0) {
    lines.push(`Unplaced parts: ${report.unplacedCount}`);
  }
  lines.push('', 'Summary of sheet sizes used:');
  for (const entry of report.sheetSizeHistogram) {
    lines.push(`  ${entry.length}mm x ${entry.width}mm: ${entry.count} pcs`);
  }
  return lines.join('\n');
}
