/**
 * Console simulator: plays a game file from the terminal.
 *
 *   npm run simulate -- [path/to/game-N.json]
 *
 * Type `:q` to leave.
 */
import { readFile } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import { join } from 'node:path';
import { Config } from '@chat-quiz/shared-types';
import { parseGameDefinition } from '@chat-quiz/quiz-engine';
import { describeError, flushLogs, log } from '@chat-quiz/logger';
import { ConsoleApp } from './console-app';

async function main(): Promise<void> {
  const file = process.argv[2] ?? join(Config.server.dataDir, `${Config.server.gameFilePrefix}1.json`);
  const game = parseGameDefinition(JSON.parse(await readFile(file, 'utf8')));
  log('INFO', 'Simulator started', { layer: 'SIMULATOR', gameId: game.id, file });

  const app = new ConsoleApp(game, (line) => console.log(`< ${line}`));
  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });

  rl.prompt();
  for await (const line of rl) {
    if (!(await app.handleLine(line))) break;
    rl.prompt();
  }
  rl.close();
  await flushLogs();
}

main().catch(async (err: unknown) => {
  log('ERROR', 'Simulator failed', { layer: 'SIMULATOR', ...describeError(err) });
  await flushLogs();
  process.exit(1);
});
