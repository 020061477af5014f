import { describe, it, expect } from 'vitest';
import { createSession, hasPlayed, recordResult, sessionKey } from '../session';

describe('session helpers', () => {
  const player = { channelId: '42', id: '7' };

  it('creates a fresh session', () => {
    expect(createSession(player, 3)).toEqual({
      playerId: { channelId: '42', id: '7' },
      gameId: 3,
      state: { type: 'NEW' },
      results: [],
      score: 0,
    });
  });

  it('builds a composite key', () => {
    expect(sessionKey(3, player)).toBe('3:42:7');
  });

  it('records a result and adds it to the score', () => {
    const session = recordResult(createSession(player, 3), 1, 4);
    expect(session.results).toEqual([{ topicId: 1, score: 4 }]);
    expect(session.score).toBe(4);
    expect(hasPlayed(session, 1)).toBe(true);
    expect(hasPlayed(session, 0)).toBe(false);
  });

  it('refuses to resolve a topic twice', () => {
    const session = recordResult(createSession(player, 3), 1, 4);
    expect(() => recordResult(session, 1, 0)).toThrow('Topic 1 is already resolved');
  });
});
