import type { GameId, GameSession, PlayerId } from '@chat-quiz/shared-types';
import type { SessionRepository } from '../contracts';
import { sessionKey } from '../engine/session';

/**
 * Process-local session store. Sessions are copied on the way in and out so
 * callers never share a mutable reference with the store.
 */
export class InMemorySessionRepository implements SessionRepository {
  private readonly sessions = new Map<string, GameSession>();

  async getById(gameId: GameId, playerId: PlayerId): Promise<GameSession | undefined> {
    const session = this.sessions.get(sessionKey(gameId, playerId));
    return session ? structuredClone(session) : undefined;
  }

  async store(session: GameSession): Promise<void> {
    this.sessions.set(sessionKey(session.gameId, session.playerId), structuredClone(session));
  }

  get size(): number {
    return this.sessions.size;
  }
}
