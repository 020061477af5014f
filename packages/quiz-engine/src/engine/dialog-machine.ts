/**
 * Dialog Machine Factory
 *
 * Transition table of one quiz conversation. Built once per game definition:
 * guards and actions close over the immutable definition, so the machine can
 * be shared by every session of that game.
 *
 * The machine never talks to the outside world. Responses are queued in
 * `context.outbox` in the order they are produced; the engine drains the
 * outbox after each step.
 *
 * State keys match the persisted SessionState tags. CHECKING_COMPLETION is
 * transient: its eventless transitions always leave it within the same step.
 */
import { setup, assign } from 'xstate';
import type { AnswerAttempt, ResponseMessage, TopicResult } from '@chat-quiz/shared-types';
import { Events, Responses } from '@chat-quiz/shared-types';
import type { GameDefinition } from '../definition/game-definition';
import { hasPlayed, recordResult } from './session';

// --- Machine Context ---

export interface DialogContext {
  results: TopicResult[];
  score: number;
  /** Active question while in ANSWERING, null otherwise. */
  answering: AnswerAttempt | null;
  outbox: ResponseMessage[];
}

export interface PlayerMessageEvent {
  type: typeof Events.Player.MESSAGE;
  /** Already normalized. */
  text: string;
}

function queue(context: DialogContext, message: ResponseMessage): ResponseMessage[] {
  return [...context.outbox, message];
}

// --- Factory ---

export function createDialogMachine(game: GameDefinition) {
  return setup({
    types: {
      context: {} as DialogContext,
      events: {} as PlayerMessageEvent,
    },
    guards: {
      isStop: ({ event }) => game.isStop(event.text),
      isYes: ({ event }) => game.isYes(event.text),
      isNo: ({ event }) => game.isNo(event.text),
      isUnknownTopic: ({ event }) => game.findTopic(event.text) === undefined,
      isResolvedTopic: ({ context, event }) => {
        const topicId = game.findTopic(event.text);
        return topicId !== undefined && hasPlayed(context, topicId);
      },
      isCorrectAnswer: ({ context, event }) =>
        context.answering !== null && game.isCorrectAnswer(context.answering.questionId, event.text),
      hasUnlimitedAttempts: () => game.maxAttempt === undefined,
      isLastAttempt: ({ context }) =>
        game.maxAttempt !== undefined &&
        context.answering !== null &&
        context.answering.attempt + 1 >= game.maxAttempt,
      allTopicsResolved: ({ context }) => game.isComplete(context.results.length),
    },
    actions: {
      greet: assign({
        outbox: ({ context }) => queue(context, Responses.greeting(game.name)),
      }),
      explainRules: assign({
        outbox: ({ context }) => queue(context, Responses.rules(game.topicKeys())),
      }),
      rephrase: assign({
        outbox: ({ context }) => queue(context, Responses.rephrase()),
      }),
      quit: assign({
        outbox: ({ context }) => queue(context, Responses.quit()),
      }),
      alreadyAnswered: assign({
        outbox: ({ context }) => queue(context, Responses.alreadyAnswered()),
      }),

      askQuestion: assign(({ context, event }) => {
        const topicId = game.findTopic(event.text);
        if (topicId === undefined) return {};
        const questionId = game.selectQuestion(topicId);
        return {
          answering: { questionId, attempt: 0 },
          outbox: queue(context, Responses.answerQuestion(game.questionText(questionId))),
        };
      }),

      acceptAnswer: assign(({ context }) => {
        if (!context.answering) return {};
        const topicId = context.answering.questionId.topic;
        const next = recordResult(context, topicId, game.bonus(topicId));
        return {
          results: next.results,
          score: next.score,
          outbox: queue(context, Responses.correct(next.score)),
        };
      }),

      // Out of attempts: the topic is consumed with zero score
      rejectAnswer: assign(({ context }) => {
        if (!context.answering) return {};
        const next = recordResult(context, context.answering.questionId.topic, 0);
        return {
          results: next.results,
          score: next.score,
          outbox: queue(context, Responses.incorrect()),
        };
      }),

      offerRetry: assign({
        outbox: ({ context }) => queue(context, Responses.pleaseRetry()),
      }),

      countFailedAttempt: assign(({ context }) => {
        if (!context.answering || game.maxAttempt === undefined) return {};
        const attempt = context.answering.attempt + 1;
        return {
          answering: { ...context.answering, attempt },
          outbox: queue(context, Responses.pleaseRetryLimits(game.maxAttempt - attempt)),
        };
      }),

      clearQuestion: assign({ answering: null }),

      promptNextTopic: assign({
        outbox: ({ context }) => queue(context, Responses.chooseNextTopic()),
      }),
      announceComplete: assign({
        outbox: ({ context }) => queue(context, Responses.gameComplete(context.score)),
      }),
    },
  }).createMachine({
    id: 'quiz-dialog',
    context: { results: [], score: 0, answering: null, outbox: [] },
    initial: 'NEW',
    states: {
      NEW: {
        on: {
          'PLAYER.MESSAGE': [
            { guard: 'isStop', target: 'TERMINATED', actions: 'quit' },
            { target: 'DECIDING', actions: 'greet' },
          ],
        },
      },
      DECIDING: {
        on: {
          'PLAYER.MESSAGE': [
            { guard: 'isStop', target: 'TERMINATED', actions: 'quit' },
            { guard: 'isYes', target: 'CHOOSING_TOPIC', actions: 'explainRules' },
            { guard: 'isNo', target: 'TERMINATED', actions: 'quit' },
            { actions: 'rephrase' },
          ],
        },
      },
      CHOOSING_TOPIC: {
        on: {
          'PLAYER.MESSAGE': [
            { guard: 'isStop', target: 'TERMINATED', actions: 'quit' },
            { guard: 'isUnknownTopic', actions: 'rephrase' },
            { guard: 'isResolvedTopic', actions: 'alreadyAnswered' },
            { target: 'ANSWERING', actions: 'askQuestion' },
          ],
        },
      },
      ANSWERING: {
        on: {
          'PLAYER.MESSAGE': [
            { guard: 'isStop', target: 'TERMINATED', actions: 'quit' },
            { guard: 'isCorrectAnswer', target: 'CHECKING_COMPLETION', actions: 'acceptAnswer' },
            { guard: 'hasUnlimitedAttempts', actions: 'offerRetry' },
            { guard: 'isLastAttempt', target: 'CHECKING_COMPLETION', actions: 'rejectAnswer' },
            { actions: 'countFailedAttempt' },
          ],
        },
      },
      CHECKING_COMPLETION: {
        entry: 'clearQuestion',
        always: [
          { guard: 'allTopicsResolved', target: 'COMPLETE', actions: 'announceComplete' },
          { target: 'CHOOSING_TOPIC', actions: 'promptNextTopic' },
        ],
      },
      COMPLETE: {
        on: {
          'PLAYER.MESSAGE': [
            { guard: 'isStop', target: 'TERMINATED', actions: 'quit' },
            { actions: 'announceComplete' },
          ],
        },
      },
      // Sticky. Not `final`: a done actor would refuse the restored snapshot.
      TERMINATED: {},
    },
  });
}

export type DialogMachine = ReturnType<typeof createDialogMachine>;
