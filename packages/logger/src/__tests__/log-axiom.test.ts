import { beforeEach, describe, expect, it, vi } from 'vitest';

const axiom = vi.hoisted(() => {
  const ingest = vi.fn();
  const flush = vi.fn(async () => undefined);
  const Axiom = vi.fn(function () {
    return { ingest, flush };
  });
  return { ingest, flush, Axiom };
});

vi.mock('@axiomhq/js', () => ({ Axiom: axiom.Axiom }));

import { flushLogs, log } from '../index';

describe('Axiom shipping', () => {
  beforeEach(() => {
    axiom.ingest.mockClear();
    axiom.flush.mockClear();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('ingests each entry into the configured dataset', () => {
    log('INFO', 'shipped', { layer: 'SERVER', gameId: 1 }, { AXIOM_TOKEN: 'test-token', AXIOM_ORG_ID: 'test-org', AXIOM_DATASET: 'quiz-test' });

    expect(axiom.Axiom).toHaveBeenCalledWith({ token: 'test-token', orgId: 'test-org' });
    expect(axiom.ingest).toHaveBeenCalledTimes(1);
    expect(axiom.ingest).toHaveBeenCalledWith('quiz-test', [
      expect.objectContaining({ level: 'INFO', message: 'shipped', layer: 'SERVER', gameId: 1 }),
    ]);
  });

  it('falls back to the default dataset', () => {
    log('INFO', 'shipped', { layer: 'SERVER' }, { AXIOM_TOKEN: 'test-token' });

    expect(axiom.ingest).toHaveBeenCalledWith('chat-quiz', [expect.objectContaining({ message: 'shipped' })]);
    expect(axiom.Axiom).toHaveBeenCalledTimes(1);
  });

  it('does not ship entries below the threshold', () => {
    log('DEBUG', 'hidden', { layer: 'SERVER' }, { AXIOM_TOKEN: 'test-token' });
    expect(axiom.ingest).not.toHaveBeenCalled();
  });

  it('drains queued entries on flush', async () => {
    await flushLogs();
    expect(axiom.flush).toHaveBeenCalledTimes(1);
  });

  it('reports a failed flush without throwing', async () => {
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('axiom down');
    axiom.flush.mockRejectedValueOnce(failure);

    await expect(flushLogs()).resolves.toBeUndefined();
    expect(err).toHaveBeenCalledWith('Failed to ship logs to Axiom', failure);
  });
});
