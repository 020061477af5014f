import type { Channel, GameDocumentInput, PlayerId } from '@chat-quiz/shared-types';
import type { GameApplicationContext, Response, ResponseSender } from '../../contracts';
import { parseGameDefinition, type GameDefinition, type GameDefinitionOptions } from '../../definition/game-definition';
import { KeyedMutex } from '../../adapters/keyed-mutex';
import { InMemorySessionRepository } from '../../adapters/memory-sessions';
import { StaticDefinitionsRepository } from '../../adapters/static-definitions';
import { processPlayerMessage } from '../dialog-engine';

export const PLAYER: PlayerId = { channelId: '1', id: '1' };

export function testGameDocument(overrides: Partial<GameDocumentInput> = {}): GameDocumentInput {
  return {
    id: 1,
    name: '#TEST_GAME',
    maxAttempt: 2,
    topics: [
      { name: 'Topic 1', key: 'topic1', bonus: 1, questions: [{ text: 'q11', answers: ['ans11'] }] },
      { name: 'Topic 2', key: 'topic2', bonus: 1, questions: [{ text: 'q21', answers: ['ans2'] }] },
    ],
    ...overrides,
  };
}

export function createTestGame(
  overrides: Partial<GameDocumentInput> = {},
  options: GameDefinitionOptions = {},
): GameDefinition {
  return parseGameDefinition(testGameDocument(overrides), options);
}

export const TEST_CHANNEL: Channel = {
  name: 'test channel',
  channelId: '1',
  token: 'test-token',
  gameId: 1,
};

export class RecordingResponder implements ResponseSender {
  readonly sent: Response[] = [];

  async respond(response: Response): Promise<void> {
    this.sent.push(response);
  }

  get messages() {
    return this.sent.map((r) => r.message);
  }
}

export function createTestContext(
  game: GameDefinition = createTestGame(),
  channels: Channel[] = [TEST_CHANNEL],
) {
  const responder = new RecordingResponder();
  const sessions = new InMemorySessionRepository();
  const locks = new KeyedMutex();
  const ctx: GameApplicationContext = {
    responder,
    sessions,
    locks,
    definitions: new StaticDefinitionsRepository([game], channels),
  };
  return { ctx, responder, sessions, locks };
}

export async function play(
  ctx: GameApplicationContext,
  texts: string[],
  playerId: PlayerId = PLAYER,
): Promise<void> {
  for (const text of texts) {
    await processPlayerMessage({ playerId, text }, ctx);
  }
}
