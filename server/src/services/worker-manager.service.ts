/**
 * Worker Manager Service
 * Runs cutting jobs in worker threads
 */
import { Worker } from 'worker_threads';
import path from 'path';
import { CuttingResult } from '../models/cutting.interface';
import {
  CuttingWorkerData,
  CuttingWorkerMessage,
  CuttingWorkerProgress,
} from '../workers/cutting.worker';

export interface WorkerJobOptions {
  onProgress?: (progress: CuttingWorkerProgress) => void;
  onComplete?: (result: CuttingResult) => void;
  onError?: (error: string) => void;
}

export interface WorkerScript {
  path: string;
  execArgv: string[];
}

/**
 * Worker entry point beside the given module: the .ts source under ts-node,
 * the compiled .js under dist
 */
export function resolveWorkerScript(moduleFile: string): WorkerScript {
  const extension = path.extname(moduleFile);
  return {
    path: path.join(path.dirname(moduleFile), '../workers', `cutting.worker${extension}`),
    execArgv: extension === '.ts' ? ['-r', 'ts-node/register'] : [],
  };
}

export class WorkerManagerService {
  private activeWorkers: Map<string, Worker> = new Map();

  /**
   * Execute a cutting job in a worker thread
   * Resolves with the job's CuttingResult
   */
  executeCuttingJob(
    jobId: string,
    data: CuttingWorkerData,
    options: WorkerJobOptions = {}
  ): Promise<CuttingResult> {
    return new Promise((resolve, reject) => {
      const script = resolveWorkerScript(__filename);

      console.log(`[WorkerManager] Starting worker for job ${jobId}`);

      const worker = new Worker(script.path, {
        workerData: data,
        execArgv: script.execArgv,
      });

      this.activeWorkers.set(jobId, worker);
      let settled = false;

      const fail = (message: string, error: Error = new Error(message)) => {
        if (settled) return;
        settled = true;
        options.onError?.(message);
        this.terminateWorker(jobId);
        reject(error);
      };

      worker.on('message', (message: CuttingWorkerMessage) => {
        if (message.type === 'progress') {
          console.log(`[WorkerManager] Progress (${jobId}): ${message.message}`);
          options.onProgress?.(message);
        } else if (message.type === 'result') {
          if (settled) return;
          settled = true;
          console.log(`[WorkerManager] Job ${jobId} completed successfully`);
          options.onComplete?.(message.result);
          this.terminateWorker(jobId);
          resolve(message.result);
        } else {
          console.error(`[WorkerManager] Job ${jobId} error: ${message.error}`);
          fail(message.error);
        }
      });

      worker.on('error', (error) => {
        console.error(`[WorkerManager] Worker error for job ${jobId}:`, error);
        fail(error.message, error);
      });

      worker.on('exit', (code) => {
        if (code !== 0) {
          const error = `Worker stopped with exit code ${code}`;
          console.error(`[WorkerManager] ${error}`);
          fail(error);
        } else if (!settled) {
          fail('Worker exited without a result');
        }
        this.activeWorkers.delete(jobId);
      });
    });
  }

  /**
   * Terminate a specific worker
   */
  terminateWorker(jobId: string): void {
    const worker = this.activeWorkers.get(jobId);
    if (worker) {
      void worker.terminate();
      this.activeWorkers.delete(jobId);
      console.log(`[WorkerManager] Worker ${jobId} terminated`);
    }
  }

  terminateAll(): void {
    console.log(`[WorkerManager] Terminating ${this.activeWorkers.size} active workers`);
    this.activeWorkers.forEach((worker, jobId) => {
      void worker.terminate();
      console.log(`[WorkerManager] Terminated worker ${jobId}`);
    });
    this.activeWorkers.clear();
  }
}
