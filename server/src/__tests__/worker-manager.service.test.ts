import path from 'path';
import { resolveWorkerScript } from '../services/worker-manager.service';

describe('WorkerManagerService', () => {
  describe('resolveWorkerScript', () => {
    it('should run the compiled worker when loaded from dist', () => {
      const script = resolveWorkerScript(path.join('/srv', 'dist', 'services', 'worker-manager.service.js'));

      expect(script).toEqual({
        path: path.join('/srv', 'dist', 'workers', 'cutting.worker.js'),
        execArgv: [],
      });
    });

    it('should run the TypeScript worker through ts-node when loaded from source', () => {
      const script = resolveWorkerScript(path.join('/srv', 'server', 'src', 'services', 'worker-manager.service.ts'));

      expect(script).toEqual({
        path: path.join('/srv', 'server', 'src', 'workers', 'cutting.worker.ts'),
        execArgv: ['-r', 'ts-node/register'],
      });
    });

    it('should ignore NODE_ENV when picking the worker file', () => {
      const previous = process.env.NODE_ENV;
      process.env.NODE_ENV = 'development';
      try {
        expect(resolveWorkerScript('/srv/dist/services/worker-manager.service.js').path).toBe(
          path.join('/srv', 'dist', 'workers', 'cutting.worker.js')
        );
      } finally {
        process.env.NODE_ENV = previous;
      }
    });
  });
});
