import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3005,
      corsOrigins: ['http://localhost:3006', 'http://localhost:5173'],
      supabaseUrl: undefined,
      supabaseServiceKey: undefined,
      rules: { bonusClueOnStackCompletion: true, finalLapStart: 'lastDraw' },
      seed: undefined,
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      PORT: '8080',
      CORS_ORIGINS: 'https://a.example, https://b.example',
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_KEY: 'test-secret',
      HANABI_BONUS_CLUE: 'false',
      HANABI_FINAL_LAP: 'emptyDraw',
      HANABI_SEED: 'table-1',
    });

    expect(config).toEqual({
      port: 8080,
      corsOrigins: ['https://a.example', 'https://b.example'],
      supabaseUrl: 'http://localhost:54321',
      supabaseServiceKey: 'test-secret',
      rules: { bonusClueOnStackCompletion: false, finalLapStart: 'emptyDraw' },
      seed: 'table-1',
    });
  });

  it('rejects values it cannot interpret', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('PORT must be a positive integer, got "abc"');
    expect(() => loadConfig({ HANABI_FINAL_LAP: 'never' })).toThrow(
      'HANABI_FINAL_LAP must be lastDraw or emptyDraw, got "never"'
    );
    expect(() => loadConfig({ HANABI_BONUS_CLUE: 'maybe' })).toThrow('Expected true or false, got "maybe"');
  });
});
