import { NextFunction, Router, Request, Response } from 'express';
import { Server as SocketIOServer } from 'socket.io';
import { v4 as uuidv4 } from 'uuid';
import { PackingOptions } from '../models/cutting.interface';
import { CuttingService } from '../services/cutting.service';
import { buildReport } from '../services/report.service';
import { WorkerManagerService } from '../services/worker-manager.service';
import { optimizeRequestSchema, reportRequestSchema } from '../validation/cutting.schemas';

const router = Router();
const cuttingService = new CuttingService();

/**
 * Optimize a cutting list against the given stock
 * With `background: true` the job runs in a worker and reports over Socket.IO
 */
router.post('/optimize', (req: Request, res: Response, next: NextFunction) => {
  const parsed = optimizeRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return res.status(400).json({ error: 'Invalid payload', details: parsed.error.flatten() });
  }

  const { parts, stockTypes, background, socketId, ...rest } = parsed.data;
  const options: Partial<PackingOptions> = rest;

  try {
    if (background) {
      const io: SocketIOServer | undefined = req.app.locals.io;
      const workerManager: WorkerManagerService = req.app.locals.workerManager;
      const jobId = uuidv4();
      console.log(`[Cutting] Starting cutting job ${jobId} (socket: ${socketId || 'none'})`);

      workerManager.executeCuttingJob(
        jobId,
        { parts, stockTypes, options },
        {
          onProgress: (progress) => {
            if (socketId && io) {
              io.to(socketId).emit('cutting:progress', { jobId, ...progress });
            }
          },
          onComplete: (result) => {
            if (socketId && io) {
              io.to(socketId).emit('cutting:complete', { jobId, result });
            }
          },
          onError: (error) => {
            if (socketId && io) {
              io.to(socketId).emit('cutting:error', { jobId, error });
            }
          },
        }
      ).catch(error => {
        console.error(`[Cutting] Worker job ${jobId} failed:`, error);
      });

      return res.json({
        jobId,
        message: 'Cutting optimization started. Listen for progress via Socket.IO.',
      });
    }

    const result = cuttingService.pack(parts, stockTypes, options);
    return res.json(result);
  } catch (error) {
    return next(error);
  }
});

/**
 * Recompute statistics for a previously returned solution
 */
router.post('/report', (req: Request, res: Response) => {
  const parsed = reportRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return res.status(400).json({ error: 'Invalid payload', details: parsed.error.flatten() });
  }
  return res.json(buildReport(parsed.data.solution));
});

export const cuttingRouter = router;
