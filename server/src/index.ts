import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { appConfig } from './config/app.config';
import { cuttingRouter } from './routes/cutting.routes';
import { errorHandler } from './middleware/error-handler';
import { WorkerManagerService } from './services/worker-manager.service';

const app: Express = express();
const httpServer = createServer(app);
const PORT = appConfig.port;

// Initialize Socket.IO
const io = new SocketIOServer(httpServer, {
  cors: {
    origin: appConfig.corsOrigins,
    methods: ['GET', 'POST']
  },
  pingTimeout: 60000,
  pingInterval: 25000
});

const workerManager = new WorkerManagerService();

// Make io and workerManager available to routes via app.locals
app.locals.io = io;
app.locals.workerManager = workerManager;

// Middleware
app.use(cors(appConfig.corsOrigins ? { origin: appConfig.corsOrigins } : undefined));
app.use(express.json({ limit: appConfig.jsonBodyLimit }));

// Routes
app.use('/api/cutting', cuttingRouter);

// Health check
app.get('/api/health', (req: Request, res: Response) => {
  res.json({ status: 'ok', message: 'Cutting API is running' });
});

app.use(errorHandler);

// Socket.IO connection handling
io.on('connection', (socket) => {
  console.log(`🔌 Client connected: ${socket.id}`);

  socket.on('disconnect', (reason) => {
    console.log(`❌ Client disconnected: ${socket.id} (${reason})`);
  });

  socket.on('error', (error) => {
    console.error(`⚠️  Socket error for ${socket.id}:`, error);
  });
});

// Graceful shutdown: terminate all workers
process.on('SIGTERM', () => {
  console.log('SIGTERM received, cleaning up workers...');
  workerManager.terminateAll();
  process.exit(0);
});

process.on('SIGINT', () => {
  console.log('SIGINT received, cleaning up workers...');
  workerManager.terminateAll();
  process.exit(0);
});

httpServer.listen(PORT, () => {
  console.log(`⚡️ Server is running on port ${PORT}`);
  console.log(`✂️  Cutting API ready at http://localhost:${PORT}/api`);
  console.log(`🔌 Socket.IO ready for real-time communication`);
});

export default app;
