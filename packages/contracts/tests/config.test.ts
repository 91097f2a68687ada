import { describe, it, expect } from 'vitest';
import { DEFAULT_ENGINE_CONFIG, ENGINE_PRESETS, isEnginePresetName } from '../src/config.js';

describe('DEFAULT_ENGINE_CONFIG', () => {
  it('should use the 18/50/14 windows', () => {
    expect(DEFAULT_ENGINE_CONFIG.wShort).toBe(18);
    expect(DEFAULT_ENGINE_CONFIG.wLong).toBe(50);
    expect(DEFAULT_ENGINE_CONFIG.wMomentum).toBe(14);
    expect(DEFAULT_ENGINE_CONFIG.wExtrema).toBe(20);
    expect(DEFAULT_ENGINE_CONFIG.wVolume).toBe(20);
    expect(DEFAULT_ENGINE_CONFIG.rsiPolicy).toBe('simple');
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(DEFAULT_ENGINE_CONFIG)).toBe(true);
  });
});

describe('ENGINE_PRESETS', () => {
  it('should shorten the long window in the legacy preset', () => {
    expect(ENGINE_PRESETS['legacy-40']).toEqual({ wLong: 40 });
  });

  it('should recognise preset names', () => {
    expect(isEnginePresetName('default')).toBe(true);
    expect(isEnginePresetName('legacy-40')).toBe(true);
    expect(isEnginePresetName('toString')).toBe(false);
  });
});
