import { afterEach, describe, expect, it, vi } from 'vitest';
import { configureLogger, describeError, log } from '../index';

afterEach(() => {
  configureLogger(process.env);
  vi.restoreAllMocks();
});

describe('log', () => {
  it('writes one JSON line with level, message and metadata', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});

    log('INFO', 'session stored', { layer: 'ENGINE', gameId: 7, playerId: 'p1' }, {});

    expect(out).toHaveBeenCalledTimes(1);
    const payload = JSON.parse(String(out.mock.calls[0][0]));
    expect(payload).toMatchObject({
      level: 'INFO',
      message: 'session stored',
      layer: 'ENGINE',
      gameId: 7,
      playerId: 'p1',
    });
    expect(typeof payload.timestamp).toBe('string');
  });

  it('routes WARN and ERROR to stderr', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});

    log('WARN', 'channel has no game', { layer: 'SERVER' }, {});
    log('ERROR', 'delivery failed', { layer: 'DELIVERY' }, {});

    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledTimes(2);
  });

  it('drops entries below the configured level', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});

    log('DEBUG', 'hidden', { layer: 'ENGINE' }, {});
    log('INFO', 'hidden too', { layer: 'ENGINE' }, { LOG_LEVEL: 'warn' });
    log('DEBUG', 'shown', { layer: 'ENGINE' }, { LOG_LEVEL: 'DEBUG' });

    expect(out).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(out.mock.calls[0][0])).message).toBe('shown');
  });

  it('falls back to INFO for an unknown level name', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});

    log('DEBUG', 'hidden', { layer: 'ENGINE' }, { LOG_LEVEL: 'chatty' });
    log('INFO', 'shown', { layer: 'ENGINE' }, { LOG_LEVEL: 'chatty' });

    expect(out).toHaveBeenCalledTimes(1);
  });
});

describe('configureLogger', () => {
  it('sets the environment used when none is passed', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => {});

    configureLogger({ LOG_LEVEL: 'DEBUG' });
    log('DEBUG', 'shown', { layer: 'ENGINE' });
    configureLogger({ LOG_LEVEL: 'ERROR' });
    log('INFO', 'hidden', { layer: 'ENGINE' });

    expect(out).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(out.mock.calls[0][0])).message).toBe('shown');
  });
});

describe('describeError', () => {
  it('keeps message and stack of Error instances', () => {
    const described = describeError(new Error('boom'));
    expect(described.error).toBe('boom');
    expect(described.stack).toContain('boom');
  });

  it('stringifies anything else', () => {
    expect(describeError(42)).toEqual({ error: '42' });
  });
});
