import type { Channel, ChannelId, GameId } from '@chat-quiz/shared-types';
import type { DefinitionsRepository } from '../contracts';
import type { GameDefinition } from '../definition/game-definition';

/** Definitions held in memory. Loaded once, never mutated. */
export class StaticDefinitionsRepository implements DefinitionsRepository {
  private readonly games: ReadonlyMap<GameId, GameDefinition>;
  private readonly channels: ReadonlyMap<ChannelId, Channel>;

  constructor(games: GameDefinition[], channels: Channel[]) {
    this.games = new Map(games.map((game) => [game.id, game]));
    this.channels = new Map(channels.map((channel) => [channel.channelId, channel]));
  }

  async getGameById(gameId: GameId): Promise<GameDefinition | undefined> {
    return this.games.get(gameId);
  }

  async getChannelById(channelId: ChannelId): Promise<Channel | undefined> {
    return this.channels.get(channelId);
  }

  get gameCount(): number {
    return this.games.size;
  }

  get channelCount(): number {
    return this.channels.size;
  }
}
