import dotenv from 'dotenv';
import { PackingOptions } from '../models/cutting.interface';

dotenv.config();

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readBoolean(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

const nodeEnv = process.env.NODE_ENV ?? 'development';

// In production, Socket.IO and CORS use same origin unless origins are listed
function readCorsOrigins(): string[] | false {
  const raw = process.env.CORS_ORIGINS;
  if (raw && raw.trim() !== '') {
    return raw.split(',').map(origin => origin.trim()).filter(origin => origin !== '');
  }
  return nodeEnv === 'production' ? false : ['http://localhost:4200', 'http://localhost:8084'];
}

export const appConfig = {
  port: readNumber('PORT', 3001),
  nodeEnv,
  corsOrigins: readCorsOrigins(),
  jsonBodyLimit: process.env.JSON_BODY_LIMIT ?? '10mb',
};

export const DEFAULT_REFINE_CONFIG = {
  populationSize: readNumber('REFINE_POPULATION_SIZE', 5),
  generations: readNumber('REFINE_GENERATIONS', 20),
  seed: readNumber('REFINE_SEED', 1),
};

export const DEFAULT_PACKING_OPTIONS: PackingOptions = {
  gap: readNumber('CUTTING_DEFAULT_GAP', 0),
  allowRotation: readBoolean('CUTTING_ALLOW_ROTATION', true),
  stockSelection: 'in-order',
};
