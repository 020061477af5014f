/**
 * File-backed definitions.
 *
 * Layout of the data directory:
 *   channels.json   array of channel documents
 *   game-*.json     one game document per file
 *
 * Everything is loaded and validated once at startup; the result is immutable.
 */
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ZodError } from 'zod';
import { ChannelListSchema, Config, type Channel } from '@chat-quiz/shared-types';
import { parseGameDefinition, StaticDefinitionsRepository, type GameDefinition } from '@chat-quiz/quiz-engine';
import { log } from '@chat-quiz/logger';

export class DefinitionLoadError extends Error {
  constructor(
    message: string,
    readonly file?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DefinitionLoadError';
  }
}

async function readJson(file: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(file, 'utf8');
  } catch (err) {
    throw new DefinitionLoadError(`Cannot read ${file}`, file, { cause: err });
  }
  try {
    return JSON.parse(content);
  } catch (err) {
    throw new DefinitionLoadError(`${file} is not valid JSON`, file, { cause: err });
  }
}

function describeIssues(err: ZodError): string {
  return err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

async function loadChannels(dataDir: string): Promise<Channel[]> {
  const file = join(dataDir, Config.server.channelsFile);
  const parsed = ChannelListSchema.safeParse(await readJson(file));
  if (!parsed.success) {
    throw new DefinitionLoadError(`Invalid channels in ${file}: ${describeIssues(parsed.error)}`, file);
  }
  const seen = new Set<string>();
  for (const channel of parsed.data) {
    if (seen.has(channel.channelId)) {
      throw new DefinitionLoadError(`Duplicate channel ${channel.channelId} in ${file}`, file);
    }
    seen.add(channel.channelId);
  }
  return parsed.data;
}

async function listGameFiles(dataDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dataDir);
  } catch (err) {
    throw new DefinitionLoadError(`Cannot list data directory ${dataDir}`, dataDir, { cause: err });
  }
  return names
    .filter((name) => name.startsWith(Config.server.gameFilePrefix) && name.endsWith('.json'))
    .sort()
    .map((name) => join(dataDir, name));
}

async function loadGame(file: string): Promise<GameDefinition> {
  const raw = await readJson(file);
  try {
    return parseGameDefinition(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new DefinitionLoadError(`Invalid game in ${file}: ${describeIssues(err)}`, file, { cause: err });
    }
    throw err;
  }
}

/**
 * Loads every channel and game from `dataDir`.
 * Throws DefinitionLoadError on the first unreadable, malformed or duplicate document.
 */
export async function loadDefinitions(dataDir: string): Promise<StaticDefinitionsRepository> {
  const channels = await loadChannels(dataDir);

  const games: GameDefinition[] = [];
  const files = new Map<number, string>();
  for (const file of await listGameFiles(dataDir)) {
    const game = await loadGame(file);
    const previous = files.get(game.id);
    if (previous !== undefined) {
      throw new DefinitionLoadError(`Game ${game.id} is defined in both ${previous} and ${file}`, file);
    }
    files.set(game.id, file);
    games.push(game);
  }

  for (const channel of channels) {
    if (channel.gameId !== undefined && !files.has(channel.gameId)) {
      log('WARN', 'Channel points at an unknown game', {
        layer: 'DEFINITIONS',
        channelId: channel.channelId,
        gameId: channel.gameId,
      });
    }
  }

  log('INFO', 'Definitions loaded', { layer: 'DEFINITIONS', dataDir, channels: channels.length, games: games.length });
  return new StaticDefinitionsRepository(games, channels);
}
