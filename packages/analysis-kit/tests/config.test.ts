import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG, InvalidConfigError } from '@trendline/contracts';
import { resolveEngineConfig, validateEngineConfig } from '../src/config.js';

function captureConfigError(run: () => unknown): InvalidConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof InvalidConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected InvalidConfigError');
}

describe('resolveEngineConfig', () => {
  it('should return the defaults when nothing is overridden', () => {
    expect(resolveEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it('should apply a preset under the overrides', () => {
    expect(resolveEngineConfig({ rsiPolicy: 'wilder' }, 'legacy-40')).toEqual({
      ...DEFAULT_ENGINE_CONFIG,
      wLong: 40,
      rsiPolicy: 'wilder',
    });
  });

  it('should let overrides beat the preset', () => {
    expect(resolveEngineConfig({ wLong: 60 }, 'legacy-40').wLong).toBe(60);
  });

  it('should ignore overrides set to undefined', () => {
    expect(resolveEngineConfig({ wShort: undefined }).wShort).toBe(18);
  });

  it('should reject a short window that is not below the long window', () => {
    const error = captureConfigError(() => resolveEngineConfig({ wShort: 50 }));

    expect(error.message).toBe('Invalid engine config: wShort must be less than wLong (50), got 50');
    expect(error.data).toEqual({ parameter: 'wShort', value: 50 });
    expect(error.code).toBe('INVALID_CONFIG');
  });

  it('should reject a non-positive window', () => {
    const error = captureConfigError(() => resolveEngineConfig({ wMomentum: 0 }));

    expect(error.message).toBe('Invalid engine config: wMomentum must be a positive integer, got 0');
    expect(error.data.parameter).toBe('wMomentum');
  });

  it('should reject a fractional window', () => {
    const error = captureConfigError(() => resolveEngineConfig({ wExtrema: 2.5 }));

    expect(error.message).toBe('Invalid engine config: wExtrema must be an integer, got 2.5');
  });

  it('should reject inverted RSI reference lines', () => {
    const error = captureConfigError(() => resolveEngineConfig({ rsiOversold: 80 }));

    expect(error.data.parameter).toBe('rsiOversold');
    expect(error.message).toBe('Invalid engine config: rsiOversold must be less than rsiOverbought (70), got 80');
  });

  it('should reject RSI reference lines outside 0..100', () => {
    const error = captureConfigError(() => resolveEngineConfig({ rsiOverbought: 120 }));

    expect(error.message).toBe('Invalid engine config: rsiOverbought must be between 0 and 100, got 120');
  });
});

describe('validateEngineConfig', () => {
  it('should name an unknown RSI policy', () => {
    const error = captureConfigError(() => validateEngineConfig({ ...DEFAULT_ENGINE_CONFIG, rsiPolicy: 'ema' }));

    expect(error.data).toEqual({ parameter: 'rsiPolicy', value: 'ema' });
  });

  it('should name a missing parameter', () => {
    const error = captureConfigError(() => validateEngineConfig({ ...DEFAULT_ENGINE_CONFIG, wVolume: undefined }));

    expect(error.data.parameter).toBe('wVolume');
  });
});
