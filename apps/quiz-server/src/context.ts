import { InMemorySessionRepository, KeyedMutex, type DefinitionsRepository, type GameApplicationContext } from '@chat-quiz/quiz-engine';
import type { ServerConfig } from './config';
import { MessengerResponder } from './messenger';

export function createApplicationContext(
  config: Pick<ServerConfig, 'graphApiUrl'>,
  definitions: DefinitionsRepository,
): GameApplicationContext {
  return {
    responder: new MessengerResponder({ graphApiUrl: config.graphApiUrl }),
    sessions: new InMemorySessionRepository(),
    definitions,
    locks: new KeyedMutex(),
  };
}
