/**
 * Collaborator Contracts
 *
 * The engine depends only on these capabilities. Implementations are
 * swappable: in-memory doubles for tests and the simulator, file- and
 * network-backed ones in the server.
 */
import type {
  Channel,
  ChannelId,
  GameId,
  GameSession,
  PlayerId,
  ResponseMessage,
} from '@chat-quiz/shared-types';
import type { GameDefinition } from '../definition/game-definition';

export interface ResponseTextFormatter {
  format(message: ResponseMessage): string;
}

/** Outbound envelope handed to the responder. Rendering happens on that side. */
export interface Response {
  to: PlayerId;
  channel: Channel;
  message: ResponseMessage;
  formatter: ResponseTextFormatter;
}

export interface ResponseSender {
  respond(response: Response): Promise<void>;
}

export interface SessionRepository {
  getById(gameId: GameId, playerId: PlayerId): Promise<GameSession | undefined>;
  store(session: GameSession): Promise<void>;
}

export interface DefinitionsRepository {
  getGameById(gameId: GameId): Promise<GameDefinition | undefined>;
  getChannelById(channelId: ChannelId): Promise<Channel | undefined>;
}

/** Mutual exclusion per session key. Tasks for one key never overlap. */
export interface SessionLock {
  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T>;
}

/** Built once at startup and passed by reference into every handler. */
export interface GameApplicationContext {
  responder: ResponseSender;
  sessions: SessionRepository;
  definitions: DefinitionsRepository;
  locks: SessionLock;
}
