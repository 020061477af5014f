import type { Channel, PlayerId } from '@chat-quiz/shared-types';
import {
  InMemorySessionRepository,
  KeyedMutex,
  processPlayerMessage,
  StaticDefinitionsRepository,
  type GameApplicationContext,
  type GameDefinition,
  type Response,
  type ResponseSender,
} from '@chat-quiz/quiz-engine';

export const QUIT_COMMAND = ':q';

const CONSOLE_CHANNEL: Channel = { name: 'console', channelId: 'console', token: '' };
const CONSOLE_PLAYER: PlayerId = { channelId: CONSOLE_CHANNEL.channelId, id: 'local' };

/** Prints each rendered response on its own line. */
export class ConsoleResponder implements ResponseSender {
  constructor(private readonly write: (line: string) => void) {}

  async respond(response: Response): Promise<void> {
    this.write(response.formatter.format(response.message));
  }
}

/** One local player against one game, wired with the in-memory adapters. */
export class ConsoleApp {
  private readonly ctx: GameApplicationContext;

  constructor(game: GameDefinition, write: (line: string) => void) {
    this.ctx = {
      responder: new ConsoleResponder(write),
      sessions: new InMemorySessionRepository(),
      locks: new KeyedMutex(),
      definitions: new StaticDefinitionsRepository([game], [{ ...CONSOLE_CHANNEL, gameId: game.id }]),
    };
  }

  /** Returns false once the user asked to leave. */
  async handleLine(line: string): Promise<boolean> {
    if (line.trim() === QUIT_COMMAND) return false;
    await processPlayerMessage({ playerId: CONSOLE_PLAYER, text: line }, this.ctx);
    return true;
  }
}
