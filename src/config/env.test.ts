import { describe, it, expect } from 'vitest';
import { envSchema } from './env.js';
import { buildConfig, clampWorkerCount } from './index.js';

describe('envSchema', () => {
  describe('defaults', () => {
    it('should use the reference directory layout when nothing is set', () => {
      const result = envSchema.safeParse({});

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.NODE_ENV).toBe('development');
        expect(result.data.INPUT_DIR).toBe('images/inputs');
        expect(result.data.BACKGROUND_DIR).toBe('images/backgrounds');
        expect(result.data.OUTPUT_DIR).toBe('images/outputs');
        expect(result.data.MAX_WORKERS).toBe(4);
        expect(result.data.WORKER_MODE).toBe('process');
        expect(result.data.SUBJECT_EXTRACTION_PROVIDER).toBe('stability');
        expect(result.data.FLATTEN_COLOR).toBe('#ffffff');
        expect(result.data.RESIZE_MIN_DIMENSION).toBe(350);
        expect(result.data.RESIZED_FOLDER_NAME).toBe('resized_backgrounds');
      }
    });
  });

  describe('MAX_WORKERS', () => {
    it('should coerce numeric strings', () => {
      const result = envSchema.safeParse({ MAX_WORKERS: '8' });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.MAX_WORKERS).toBe(8);
      }
    });

    it('should reject zero', () => {
      expect(envSchema.safeParse({ MAX_WORKERS: '0' }).success).toBe(false);
    });

    it('should reject non-integers', () => {
      expect(envSchema.safeParse({ MAX_WORKERS: '2.5' }).success).toBe(false);
    });
  });

  describe('SUBJECT_EXTRACTION_PROVIDER', () => {
    it('should accept photoroom', () => {
      const result = envSchema.safeParse({ SUBJECT_EXTRACTION_PROVIDER: 'photoroom' });
      expect(result.success).toBe(true);
    });

    it('should reject unknown providers', () => {
      const result = envSchema.safeParse({ SUBJECT_EXTRACTION_PROVIDER: 'rembg' });
      expect(result.success).toBe(false);
    });
  });

  describe('FLATTEN_COLOR', () => {
    it('should accept short and long hex colors', () => {
      expect(envSchema.safeParse({ FLATTEN_COLOR: '#fff' }).success).toBe(true);
      expect(envSchema.safeParse({ FLATTEN_COLOR: '#102030' }).success).toBe(true);
    });

    it('should reject named colors', () => {
      expect(envSchema.safeParse({ FLATTEN_COLOR: 'white' }).success).toBe(false);
    });
  });

  describe('WORKER_MODE', () => {
    it('should reject unknown modes', () => {
      expect(envSchema.safeParse({ WORKER_MODE: 'thread' }).success).toBe(false);
    });
  });
});

describe('clampWorkerCount', () => {
  it('should keep counts within the per-CPU ceiling', () => {
    expect(clampWorkerCount(4, 8)).toBe(4);
  });

  it('should cap counts above two workers per CPU', () => {
    expect(clampWorkerCount(64, 4)).toBe(8);
  });

  it('should never go below one worker', () => {
    expect(clampWorkerCount(0, 4)).toBe(1);
    expect(clampWorkerCount(3, 0)).toBe(1);
  });
});

describe('buildConfig', () => {
  it('should resolve batch directories to absolute paths', () => {
    const env = envSchema.parse({ INPUT_DIR: '/data/in', BACKGROUND_DIR: '/data/bg', OUTPUT_DIR: '/data/out' });
    const config = buildConfig(env);

    expect(config.batch).toEqual({
      inputDir: '/data/in',
      backgroundDir: '/data/bg',
      outputDir: '/data/out',
    });
  });

  it('should treat empty API keys as unset', () => {
    const env = envSchema.parse({ STABILITY_API_KEY: '', PHOTOROOM_API_KEY: 'test-photoroom-key' });
    const config = buildConfig(env);

    expect(config.apis.stability).toBeUndefined();
    expect(config.apis.photoroom).toBe('test-photoroom-key');
  });
});
