/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  TrendlineError,
  InvalidConfigError,
  InvalidBarError,
  NoDataError,
  FixtureError,
  isTrendlineError,
  isInvalidConfigError,
  isInvalidBarError,
  isNoDataError,
  isFixtureError,
} from '../src/errors.js';

describe('TrendlineError', () => {
  it('should create error with code and message', () => {
    const error = new TrendlineError('TEST_CODE', 'Test message');

    expect(error.name).toBe('TrendlineError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.timestamp).toBeDefined();
    expect(error.stack).toBeDefined();
    expect(error).toBeInstanceOf(Error);
  });

  it('should include optional data', () => {
    const data = { foo: 'bar', count: 42 };
    const error = new TrendlineError('TEST_CODE', 'Test message', data);

    expect(error.data).toEqual(data);
  });

  it('should have valid ISO timestamp', () => {
    const error = new TrendlineError('TEST_CODE', 'Test message');
    const timestamp = new Date(error.timestamp);

    expect(timestamp.toISOString()).toBe(error.timestamp);
  });

  it('should serialize to JSON correctly', () => {
    const error = new TrendlineError('TEST_CODE', 'Test message', { key: 'value' });
    const json = error.toJSON();

    expect(json.name).toBe('TrendlineError');
    expect(json.code).toBe('TEST_CODE');
    expect(json.message).toBe('Test message');
    expect(json.data).toEqual({ key: 'value' });
    expect(json.timestamp).toBe(error.timestamp);
    expect(json.stack).toBeDefined();
  });

  it('should be JSON stringifiable', () => {
    const error = new TrendlineError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed = JSON.parse(JSON.stringify(error));

    expect(parsed.name).toBe('TrendlineError');
    expect(parsed.code).toBe('TEST_CODE');
    expect(parsed.message).toBe('Test message');
  });
});

describe('InvalidConfigError', () => {
  it('should carry the offending parameter', () => {
    const error = new InvalidConfigError('wShort (50) must be less than wLong (50)', {
      parameter: 'wShort',
      value: 50,
    });

    expect(error.name).toBe('InvalidConfigError');
    expect(error.code).toBe('INVALID_CONFIG');
    expect(error.data.parameter).toBe('wShort');
    expect(error.data.value).toBe(50);
    expect(error).toBeInstanceOf(TrendlineError);
  });
});

describe('InvalidBarError', () => {
  it('should carry the bar index', () => {
    const error = new InvalidBarError('bad bar', { index: 7, field: 'high' });

    expect(error.name).toBe('InvalidBarError');
    expect(error.code).toBe('INVALID_BAR');
    expect(error.data.index).toBe(7);
    expect(error.data['field']).toBe('high');
  });
});

describe('NoDataError', () => {
  it('should serialize the request context', () => {
    const error = new NoDataError('No bars for AAPL', {
      symbol: 'AAPL',
      interval: '5m',
      period: '1y',
    });

    const parsed = JSON.parse(JSON.stringify(error.toJSON()));

    expect(parsed.code).toBe('NO_DATA');
    expect(parsed.data).toEqual({ symbol: 'AAPL', interval: '5m', period: '1y' });
  });
});

describe('FixtureError', () => {
  it('should carry the fixture path', () => {
    const error = new FixtureError('Fixture file not found', { path: 'missing.json' });

    expect(error.code).toBe('FIXTURE_INVALID');
    expect(error.data.path).toBe('missing.json');
  });
});

describe('type guards', () => {
  const config = new InvalidConfigError('bad', { parameter: 'wLong' });
  const bar = new InvalidBarError('bad', { index: 0 });
  const noData = new NoDataError('none', { symbol: 'X', interval: '1d', period: '1mo' });
  const fixture = new FixtureError('bad', { path: 'x.json' });

  it('should recognise every subclass as a TrendlineError', () => {
    for (const error of [config, bar, noData, fixture]) {
      expect(isTrendlineError(error)).toBe(true);
    }
    expect(isTrendlineError(new Error('plain'))).toBe(false);
    expect(isTrendlineError('string')).toBe(false);
  });

  it('should discriminate between subclasses', () => {
    expect(isInvalidConfigError(config)).toBe(true);
    expect(isInvalidConfigError(bar)).toBe(false);
    expect(isInvalidBarError(bar)).toBe(true);
    expect(isNoDataError(noData)).toBe(true);
    expect(isNoDataError(fixture)).toBe(false);
    expect(isFixtureError(fixture)).toBe(true);
  });
});
