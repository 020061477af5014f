/**
 * Dialog Engine
 *
 * `stepSession` is the pure decision step: (definition, session, normalized
 * input) -> (next session, ordered responses). `processPlayerMessage` wraps
 * it with routing, the per-session lock, persistence and delivery.
 *
 * The engine keeps no state of its own. Everything mutable lives in the
 * session store; definitions are shared read-only.
 */
import { createActor } from 'xstate';
import type {
  AnswerAttempt,
  GameSession,
  PlayerMessage,
  ResponseMessage,
  SessionState,
} from '@chat-quiz/shared-types';
import { Events, SessionStateTypeSchema } from '@chat-quiz/shared-types';
import { log } from '@chat-quiz/logger';
import type { GameApplicationContext } from '../contracts';
import type { GameDefinition } from '../definition/game-definition';
import { normalizeText } from '../helpers/normalize';
import { createDialogMachine, type DialogContext, type DialogMachine } from './dialog-machine';
import { createSession, sessionKey } from './session';

export interface DialogStep {
  session: GameSession;
  responses: ResponseMessage[];
}

// Definitions are immutable, so their machines can be cached alongside them
const machines = new WeakMap<GameDefinition, DialogMachine>();

function machineFor(game: GameDefinition): DialogMachine {
  let machine = machines.get(game);
  if (!machine) {
    machine = createDialogMachine(game);
    machines.set(game, machine);
  }
  return machine;
}

function toContext(session: GameSession): DialogContext {
  const answering: AnswerAttempt | null =
    session.state.type === 'ANSWERING'
      ? { questionId: session.state.questionId, attempt: session.state.attempt }
      : null;
  return { results: session.results, score: session.score, answering, outbox: [] };
}

function toSessionState(value: unknown, answering: AnswerAttempt | null): SessionState {
  const parsed = SessionStateTypeSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Dialog stopped in a non-resting state: ${JSON.stringify(value)}`);
  }
  const type = parsed.data;
  switch (type) {
    case 'NEW':
    case 'DECIDING':
    case 'CHOOSING_TOPIC':
    case 'COMPLETE':
    case 'TERMINATED':
      return { type };
    case 'ANSWERING':
      if (!answering) {
        throw new Error('Dialog is answering without an active question');
      }
      return { type, questionId: answering.questionId, attempt: answering.attempt };
    default:
      return assertNever(type);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled session state: ${String(value)}`);
}

/**
 * Runs one utterance through the dialog. `text` must already be normalized.
 * A TERMINATED session comes back untouched with no responses.
 */
export function stepSession(game: GameDefinition, session: GameSession, text: string): DialogStep {
  if (session.state.type === 'TERMINATED') {
    return { session, responses: [] };
  }

  const machine = machineFor(game);
  const restored = machine.resolveState({
    value: session.state.type,
    context: toContext(session),
  });

  const actor = createActor(machine, { snapshot: restored });
  // With an error observer attached, xstate records the failure on the
  // snapshot (rethrown below) instead of raising it on a later tick.
  actor.subscribe({ error: () => undefined });
  actor.start();
  actor.send({ type: Events.Player.MESSAGE, text });
  const next = actor.getSnapshot();
  actor.stop();

  if (next.status === 'error') {
    throw next.error;
  }

  return {
    session: {
      ...session,
      state: toSessionState(next.value, next.context.answering),
      results: next.context.results,
      score: next.context.score,
    },
    responses: next.context.outbox,
  };
}

/**
 * Routes one inbound message to its game and runs it through the dialog.
 *
 * Routing misses (unknown channel, channel without a game, unknown game) are
 * logged and dropped. Store and delivery failures propagate to the caller.
 */
export async function processPlayerMessage(
  message: PlayerMessage,
  ctx: GameApplicationContext,
): Promise<void> {
  const { playerId } = message;
  const meta = { layer: 'ENGINE' as const, channelId: playerId.channelId, playerId: playerId.id };

  const channel = await ctx.definitions.getChannelById(playerId.channelId);
  if (!channel) {
    log('INFO', 'Ignoring message: no channel config', meta);
    return;
  }
  if (channel.gameId === undefined) {
    log('INFO', 'Ignoring message: no game configured for channel', meta);
    return;
  }
  const game = await ctx.definitions.getGameById(channel.gameId);
  if (!game) {
    log('INFO', 'Ignoring message: game not found', { ...meta, gameId: channel.gameId });
    return;
  }

  const text = normalizeText(message.text);

  await ctx.locks.runExclusive(sessionKey(game.id, playerId), async () => {
    const session = (await ctx.sessions.getById(game.id, playerId)) ?? createSession(playerId, game.id);
    if (session.state.type === 'TERMINATED') return;

    const step = stepSession(game, session, text);
    await ctx.sessions.store(step.session);

    log('DEBUG', 'Dialog step', {
      ...meta,
      gameId: game.id,
      from: session.state.type,
      to: step.session.state.type,
      responses: step.responses.map((r) => r.type),
    });

    // Sequential on purpose: one player's responses arrive in engine order
    for (const response of step.responses) {
      await ctx.responder.respond({
        to: playerId,
        channel,
        message: response,
        formatter: game.formatter,
      });
    }
  });
}
