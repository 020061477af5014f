import { z } from "zod";
import { Config } from "./config";
import type { SessionStateType } from "./events";

export * from "./events";
export { Config } from "./config";

// --- Identifiers ---

export const GameIdSchema = z.number().int().nonnegative();
export type GameId = z.infer<typeof GameIdSchema>;

export type ChannelId = string;

export interface PlayerId {
  channelId: ChannelId;
  id: string;
}

// --- Schemas (Persisted Definitions) ---

export const GenericAnswersSchema = z.object({
  yes: z.array(z.string()),
  no: z.array(z.string()),
  stop: z.array(z.string()),
});

/** One template per response tag. A partial block is a load-time error. */
export const ResponseTemplatesSchema = z.object({
  greeting: z.string(),
  rephrase: z.string(),
  rules: z.string(),
  answerQuestion: z.string(),
  pleaseRetry: z.string(),
  pleaseRetryLimits: z.string(),
  incorrect: z.string(),
  correct: z.string(),
  gameComplete: z.string(),
  chooseNextTopic: z.string(),
  alreadyAnswered: z.string(),
  quit: z.string(),
});

export const QuestionSchema = z.object({
  text: z.string(),
  answers: z.array(z.string()),
});

export const TopicSchema = z.object({
  name: z.string(),
  key: z.string(),
  questions: z.array(QuestionSchema).min(1, "a topic needs at least one question"),
  bonus: z.number().int().nonnegative(),
});

export const GameDocumentSchema = z.object({
  id: GameIdSchema,
  name: z.string(),
  topics: z.array(TopicSchema).min(1, "a game needs at least one topic"),
  maxAttempt: z.number().int().nonnegative().optional(),
  genericAnswers: GenericAnswersSchema.default({
    yes: [...Config.vocabulary.yes],
    no: [...Config.vocabulary.no],
    stop: [...Config.vocabulary.stop],
  }),
  responses: ResponseTemplatesSchema.default({ ...Config.templates }),
});

export const ChannelSchema = z.object({
  name: z.string(),
  channelId: z.string(),
  token: z.string(),
  gameId: GameIdSchema.optional(),
});

export const ChannelListSchema = z.array(ChannelSchema);

// --- Types (Inferred) ---

export type ResponseTemplates = z.infer<typeof ResponseTemplatesSchema>;
export type GameDocument = z.infer<typeof GameDocumentSchema>;
/** Raw document shape, before defaults are applied. */
export type GameDocumentInput = z.input<typeof GameDocumentSchema>;
export type Channel = z.infer<typeof ChannelSchema>;

// --- Session (Engine Layer) ---

export type TopicId = number;

/** Indices into the Game it was drawn from. Meaningless against any other revision. */
export interface QuestionId {
  topic: TopicId;
  question: number;
}

export interface TopicResult {
  topicId: TopicId;
  score: number;
}

export interface AnswerAttempt {
  questionId: QuestionId;
  attempt: number;
}

export type SessionState =
  | { type: "NEW" }
  | { type: "DECIDING" }
  | { type: "CHOOSING_TOPIC" }
  | ({ type: "ANSWERING" } & AnswerAttempt)
  | { type: "COMPLETE" }
  | { type: "TERMINATED" };

export const SessionStateTypeSchema = z.enum([
  "NEW",
  "DECIDING",
  "CHOOSING_TOPIC",
  "ANSWERING",
  "COMPLETE",
  "TERMINATED",
]) satisfies z.ZodType<SessionStateType>;

export interface GameSession {
  playerId: PlayerId;
  gameId: GameId;
  state: SessionState;
  results: TopicResult[];
  score: number;
}

// --- Inbound ---

export interface PlayerMessage {
  playerId: PlayerId;
  text: string;
}
