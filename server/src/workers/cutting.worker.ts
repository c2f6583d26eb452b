/**
 * Worker thread for cutting jobs
 * Keeps long refinement runs off the main event loop
 */
import { parentPort, workerData } from 'worker_threads';
import { CuttingResult, PackingOptions, Part, StockType } from '../models/cutting.interface';
import { CuttingService } from '../services/cutting.service';

export interface CuttingWorkerData {
  parts: Part[];
  stockTypes: StockType[];
  options: Partial<PackingOptions>;
}

export interface CuttingWorkerProgress {
  type: 'progress';
  message: string;
  generation?: number;
  totalGenerations?: number;
  bestFitness?: number;
  percentComplete?: number;
}

export interface CuttingWorkerResult {
  type: 'result';
  result: CuttingResult;
}

export interface CuttingWorkerError {
  type: 'error';
  error: string;
}

export type CuttingWorkerMessage = CuttingWorkerProgress | CuttingWorkerResult | CuttingWorkerError;

function sendMessage(message: CuttingWorkerMessage): void {
  parentPort?.postMessage(message);
}

export function runCuttingJob(data: CuttingWorkerData, send: (message: CuttingWorkerMessage) => void): void {
  const totalGenerations = data.options.refine?.generations;

  send({ type: 'progress', message: 'Starting cutting optimization...', percentComplete: 0 });

  const result = new CuttingService().pack(data.parts, data.stockTypes, data.options, {
    onGeneration: progress => {
      send({
        type: 'progress',
        message: `Generation ${progress.generation}: best ${(progress.bestFitness * 100).toFixed(1)}%`,
        generation: progress.generation,
        totalGenerations,
        bestFitness: progress.bestFitness,
        percentComplete: totalGenerations
          ? Math.min(99, Math.floor((progress.generation / totalGenerations) * 100))
          : undefined,
      });
    },
  });

  send({ type: 'result', result });
}

if (parentPort) {
  const data: CuttingWorkerData = workerData;
  try {
    runCuttingJob(data, sendMessage);
  } catch (error) {
    sendMessage({
      type: 'error',
      error: error instanceof Error ? error.message : 'Unknown error in cutting worker',
    });
  }
}
