import type { GameId, GameSession, PlayerId, TopicId } from '@chat-quiz/shared-types';

export function createSession(playerId: PlayerId, gameId: GameId): GameSession {
  return {
    playerId: { ...playerId },
    gameId,
    state: { type: 'NEW' },
    results: [],
    score: 0,
  };
}

/** Composite key shared by session stores and locks. */
export function sessionKey(gameId: GameId, playerId: PlayerId): string {
  return `${gameId}:${playerId.channelId}:${playerId.id}`;
}

export function hasPlayed(session: Pick<GameSession, 'results'>, topicId: TopicId): boolean {
  return session.results.some((r) => r.topicId === topicId);
}

/**
 * Appends a topic result and adds it to the running score.
 * A topic is resolved at most once; recording it again is a programming error.
 */
export function recordResult<T extends Pick<GameSession, 'results' | 'score'>>(
  session: T,
  topicId: TopicId,
  score: number,
): T {
  if (hasPlayed(session, topicId)) {
    throw new Error(`Topic ${topicId} is already resolved`);
  }
  return {
    ...session,
    results: [...session.results, { topicId, score }],
    score: session.score + score,
  };
}
