// Contracts
export type {
  GameApplicationContext,
  DefinitionsRepository,
  Response,
  ResponseSender,
  ResponseTextFormatter,
  SessionLock,
  SessionRepository,
} from './contracts';

// Helpers
export { normalizeText } from './helpers/normalize';

// Definition + rendering
export { GameDefinition, parseGameDefinition } from './definition/game-definition';
export type { GameDefinitionOptions } from './definition/game-definition';
export { TemplateFormatter } from './formatter/template-formatter';

// Engine
export { createDialogMachine } from './engine/dialog-machine';
export type { DialogContext, DialogMachine, PlayerMessageEvent } from './engine/dialog-machine';
export { stepSession, processPlayerMessage } from './engine/dialog-engine';
export type { DialogStep } from './engine/dialog-engine';
export { createSession, sessionKey, hasPlayed, recordResult } from './engine/session';

// Adapters
export { KeyedMutex } from './adapters/keyed-mutex';
export { InMemorySessionRepository } from './adapters/memory-sessions';
export { StaticDefinitionsRepository } from './adapters/static-definitions';
