import type { FinalLapStart, RuleOptions } from '@hanabi/shared';
import { DEFAULT_RULES } from '@hanabi/shared';

export interface ServerConfig {
  port: number;
  corsOrigins: string[];
  supabaseUrl: string | undefined;
  supabaseServiceKey: string | undefined;
  rules: RuleOptions;
  seed: string | undefined;
}

// Dev defaults when CORS_ORIGINS is not set
const DEFAULT_CORS_ORIGINS = ['http://localhost:3006', 'http://localhost:5173'];

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new Error(`Expected true or false, got "${value}"`);
}

function parseFinalLap(value: string | undefined): FinalLapStart {
  if (value === undefined || value === '') return DEFAULT_RULES.finalLapStart;
  if (value === 'lastDraw' || value === 'emptyDraw') return value;
  throw new Error(`HANABI_FINAL_LAP must be lastDraw or emptyDraw, got "${value}"`);
}

function parsePort(value: string | undefined): number {
  if (value === undefined || value === '') return 3005;
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`PORT must be a positive integer, got "${value}"`);
  }
  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parsePort(env.PORT),
    corsOrigins: env.CORS_ORIGINS
      ? env.CORS_ORIGINS.split(',').map(s => s.trim()).filter(Boolean)
      : DEFAULT_CORS_ORIGINS,
    supabaseUrl: env.SUPABASE_URL || undefined,
    supabaseServiceKey: env.SUPABASE_SERVICE_KEY || undefined,
    rules: {
      bonusClueOnStackCompletion: parseBoolean(
        env.HANABI_BONUS_CLUE,
        DEFAULT_RULES.bonusClueOnStackCompletion
      ),
      finalLapStart: parseFinalLap(env.HANABI_FINAL_LAP),
    },
    seed: env.HANABI_SEED || undefined,
  };
}
