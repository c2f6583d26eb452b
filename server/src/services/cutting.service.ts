import {
  CuttingResult,
  PackingOptions,
  Part,
  RefineConfig,
  RefinementSummary,
  Solution,
  StockType,
} from '../models/cutting.interface';
import { DEFAULT_PACKING_OPTIONS, DEFAULT_REFINE_CONFIG } from '../config/app.config';
import { packingOptionsSchema, packInputSchema, parseOrThrow } from '../validation/cutting.schemas';
import { PackingEngine } from './packing-engine.service';
import { DEFAULT_REFINER_CONFIG, GenerationProgress, PopulationRefiner, RefinerConfig } from './population-refiner.service';
import { buildReport, formatReportSummary } from './report.service';

export interface PackHooks {
  onGeneration?: (progress: GenerationProgress) => void;
}

function resolveRefineConfig(refine: RefineConfig, hooks: PackHooks): RefinerConfig {
  return {
    populationSize: refine.populationSize ?? DEFAULT_REFINE_CONFIG.populationSize,
    generations: refine.generations ?? DEFAULT_REFINE_CONFIG.generations,
    seed: refine.seed ?? DEFAULT_REFINE_CONFIG.seed,
    mutationRate: refine.mutationRate ?? DEFAULT_REFINER_CONFIG.mutationRate,
    topK: refine.topK ?? DEFAULT_REFINER_CONFIG.topK,
    jitter: refine.jitter ?? DEFAULT_REFINER_CONFIG.jitter,
    patience: refine.patience ?? DEFAULT_REFINER_CONFIG.patience,
    crossover: refine.crossover ?? DEFAULT_REFINER_CONFIG.crossover,
    onGeneration: hooks.onGeneration,
  };
}

export class CuttingService {
  /**
   * Validate, run the greedy engine, optionally refine, and report
   */
  pack(
    parts: Part[],
    stockTypes: StockType[],
    options: Partial<PackingOptions> = {},
    hooks: PackHooks = {}
  ): CuttingResult {
    const input = parseOrThrow(packInputSchema, { parts, stockTypes }, 'Invalid cutting input');
    const parsedOptions = parseOrThrow(packingOptionsSchema, options, 'Invalid packing options');

    const resolved: PackingOptions = {
      gap: parsedOptions.gap ?? DEFAULT_PACKING_OPTIONS.gap,
      allowRotation: parsedOptions.allowRotation ?? DEFAULT_PACKING_OPTIONS.allowRotation,
      stockSelection: parsedOptions.stockSelection ?? DEFAULT_PACKING_OPTIONS.stockSelection,
      refine: parsedOptions.refine,
    };

    const demand = input.parts.reduce((sum, part) => sum + part.quantity, 0);
    console.log(
      `[CuttingService] Packing ${demand} parts (${input.parts.length} types) on ${input.stockTypes.length} stock types ` +
      `(gap=${resolved.gap}, rotation=${resolved.allowRotation}, selection=${resolved.stockSelection})`
    );

    let solution: Solution;
    let refinement: RefinementSummary | undefined;

    if (resolved.refine) {
      const refiner = new PopulationRefiner(input.parts, input.stockTypes, resolved);
      const result = refiner.optimize(resolveRefineConfig(resolved.refine, hooks));
      solution = result.solution;
      refinement = {
        fitness: result.fitness,
        generations: result.generations,
        improvements: result.improvements,
        seed: result.seed,
      };
    } else {
      solution = new PackingEngine(input.stockTypes, resolved).run(input.parts);
    }

    const report = buildReport(solution);
    console.log(
      `[CuttingService] ✓ ${report.sheetsUsed} sheets, ${report.utilizationPct.toFixed(1)}% utilization, ` +
      `${report.unplacedCount} unplaced${solution.stockExhausted ? ' (stock exhausted)' : ''}`
    );
    console.log(formatReportSummary(report));

    return refinement ? { solution, report, refinement } : { solution, report };
  }
}

export const cuttingService = new CuttingService();

export function pack(
  parts: Part[],
  stockTypes: StockType[],
  options: Partial<PackingOptions> = {},
  hooks: PackHooks = {}
): CuttingResult {
  return cuttingService.pack(parts, stockTypes, options, hooks);
}
