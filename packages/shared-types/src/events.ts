/**
 * Centralized string literal constants for session states, response tags
 * and engine events. All consumers import from here instead of using raw
 * strings.
 *
 * Design: `as const` objects (not TS enums) for Zod compat.
 */

// --- SESSION STATE CONSTANTS ---

export const SessionStates = {
  NEW: 'NEW',
  DECIDING: 'DECIDING',
  CHOOSING_TOPIC: 'CHOOSING_TOPIC',
  ANSWERING: 'ANSWERING',
  COMPLETE: 'COMPLETE',
  TERMINATED: 'TERMINATED',
} as const;

export type SessionStateType = (typeof SessionStates)[keyof typeof SessionStates];

// --- RESPONSE TAG CONSTANTS ---

export const ResponseTypes = {
  GREETING: 'GREETING',
  REPHRASE: 'REPHRASE',
  RULES: 'RULES',
  ANSWER_QUESTION: 'ANSWER_QUESTION',
  PLEASE_RETRY: 'PLEASE_RETRY',
  PLEASE_RETRY_LIMITS: 'PLEASE_RETRY_LIMITS',
  INCORRECT: 'INCORRECT',
  CORRECT: 'CORRECT',
  GAME_COMPLETE: 'GAME_COMPLETE',
  CHOOSE_NEXT_TOPIC: 'CHOOSE_NEXT_TOPIC',
  ALREADY_ANSWERED: 'ALREADY_ANSWERED',
  QUIT: 'QUIT',
} as const;

export type ResponseMessage =
  | { type: typeof ResponseTypes.GREETING; name: string }
  | { type: typeof ResponseTypes.REPHRASE }
  | { type: typeof ResponseTypes.RULES; topics: string[] }
  | { type: typeof ResponseTypes.ANSWER_QUESTION; question: string }
  | { type: typeof ResponseTypes.PLEASE_RETRY }
  | { type: typeof ResponseTypes.PLEASE_RETRY_LIMITS; left: number }
  | { type: typeof ResponseTypes.INCORRECT }
  | { type: typeof ResponseTypes.CORRECT; score: number }
  | { type: typeof ResponseTypes.GAME_COMPLETE; score: number }
  | { type: typeof ResponseTypes.CHOOSE_NEXT_TOPIC }
  | { type: typeof ResponseTypes.ALREADY_ANSWERED }
  | { type: typeof ResponseTypes.QUIT };

/** Constructors, so call sites never spell out tag objects by hand. */
export const Responses = {
  greeting: (name: string): ResponseMessage => ({ type: ResponseTypes.GREETING, name }),
  rephrase: (): ResponseMessage => ({ type: ResponseTypes.REPHRASE }),
  rules: (topics: string[]): ResponseMessage => ({ type: ResponseTypes.RULES, topics }),
  answerQuestion: (question: string): ResponseMessage => ({ type: ResponseTypes.ANSWER_QUESTION, question }),
  pleaseRetry: (): ResponseMessage => ({ type: ResponseTypes.PLEASE_RETRY }),
  pleaseRetryLimits: (left: number): ResponseMessage => ({ type: ResponseTypes.PLEASE_RETRY_LIMITS, left }),
  incorrect: (): ResponseMessage => ({ type: ResponseTypes.INCORRECT }),
  correct: (score: number): ResponseMessage => ({ type: ResponseTypes.CORRECT, score }),
  gameComplete: (score: number): ResponseMessage => ({ type: ResponseTypes.GAME_COMPLETE, score }),
  chooseNextTopic: (): ResponseMessage => ({ type: ResponseTypes.CHOOSE_NEXT_TOPIC }),
  alreadyAnswered: (): ResponseMessage => ({ type: ResponseTypes.ALREADY_ANSWERED }),
  quit: (): ResponseMessage => ({ type: ResponseTypes.QUIT }),
};

// --- ENGINE EVENT CONSTANTS ---

export const Events = {
  Player: {
    MESSAGE: 'PLAYER.MESSAGE',
  },
} as const;

// --- DELIVERY MODES ---

export const DeliveryModes = {
  SYNC: 'sync',
  ASYNC: 'async',
} as const;

export type DeliveryMode = (typeof DeliveryModes)[keyof typeof DeliveryModes];
