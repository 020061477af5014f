/**
 * Game Definition
 *
 * Immutable, loaded-once model of one quiz. Every session of the game shares
 * the same instance, so nothing here mutates after construction.
 *
 * Vocabulary, topic keys and accepted answers are compared verbatim against
 * already-normalized input. Authors must write them in canonical form
 * (lowercase, no punctuation or spaces) or they will never match.
 */
import { GameDocumentSchema } from '@chat-quiz/shared-types';
import type {
  GameDocument,
  GameId,
  QuestionId,
  ResponseTemplates,
  TopicId,
} from '@chat-quiz/shared-types';
import { TemplateFormatter } from '../formatter/template-formatter';

interface QuestionEntry {
  readonly text: string;
  readonly answers: ReadonlySet<string>;
}

interface TopicEntry {
  readonly name: string;
  readonly key: string;
  readonly bonus: number;
  readonly questions: readonly QuestionEntry[];
}

export interface GameDefinitionOptions {
  /** Uniform source in [0, 1). Defaults to Math.random. */
  random?: () => number;
}

export class GameDefinition {
  readonly id: GameId;
  readonly name: string;
  readonly maxAttempt: number | undefined;
  readonly formatter: TemplateFormatter;

  private readonly topics: readonly TopicEntry[];
  private readonly yes: ReadonlySet<string>;
  private readonly no: ReadonlySet<string>;
  private readonly stop: ReadonlySet<string>;
  private readonly random: () => number;

  constructor(document: GameDocument, options: GameDefinitionOptions = {}) {
    this.id = document.id;
    this.name = document.name;
    this.maxAttempt = document.maxAttempt;
    this.formatter = new TemplateFormatter(freezeTemplates(document.responses));
    this.topics = Object.freeze(
      document.topics.map((topic) =>
        Object.freeze({
          name: topic.name,
          key: topic.key,
          bonus: topic.bonus,
          questions: Object.freeze(
            topic.questions.map((q) => Object.freeze({ text: q.text, answers: new Set(q.answers) })),
          ),
        }),
      ),
    );
    this.yes = new Set(document.genericAnswers.yes);
    this.no = new Set(document.genericAnswers.no);
    this.stop = new Set(document.genericAnswers.stop);
    this.random = options.random ?? Math.random;
  }

  isYes(text: string): boolean {
    return this.yes.has(text);
  }

  isNo(text: string): boolean {
    return this.no.has(text);
  }

  isStop(text: string): boolean {
    return this.stop.has(text);
  }

  /**
   * First topic, in declared order, whose key contains the input.
   * Note the direction: "sport" finds key "sports", but "sports quiz" does not.
   */
  findTopic(text: string): TopicId | undefined {
    const index = this.topics.findIndex((topic) => topic.key.includes(text));
    return index === -1 ? undefined : index;
  }

  /** Uniform pick, independent per call. No repeat avoidance. */
  selectQuestion(topicId: TopicId): QuestionId {
    const count = this.topic(topicId).questions.length;
    const question = Math.min(count - 1, Math.floor(this.random() * count));
    return { topic: topicId, question };
  }

  questionText(questionId: QuestionId): string {
    return this.question(questionId).text;
  }

  isCorrectAnswer(questionId: QuestionId, text: string): boolean {
    return this.question(questionId).answers.has(text);
  }

  bonus(topicId: TopicId): number {
    return this.topic(topicId).bonus;
  }

  isComplete(resolvedTopicCount: number): boolean {
    return resolvedTopicCount === this.topics.length;
  }

  topicKeys(): string[] {
    return this.topics.map((topic) => topic.key);
  }

  get topicCount(): number {
    return this.topics.length;
  }

  private topic(topicId: TopicId): TopicEntry {
    const topic = this.topics[topicId];
    if (!topic) {
      throw new RangeError(`Game ${this.id} has no topic ${topicId}`);
    }
    return topic;
  }

  private question(questionId: QuestionId): QuestionEntry {
    const question = this.topic(questionId.topic).questions[questionId.question];
    if (!question) {
      throw new RangeError(
        `Game ${this.id} has no question ${questionId.question} in topic ${questionId.topic}`,
      );
    }
    return question;
  }
}

/** Validates a raw document (defaults applied) and builds its definition. Throws ZodError. */
export function parseGameDefinition(raw: unknown, options: GameDefinitionOptions = {}): GameDefinition {
  return new GameDefinition(GameDocumentSchema.parse(raw), options);
}

function freezeTemplates(templates: ResponseTemplates): Readonly<ResponseTemplates> {
  return Object.freeze({ ...templates });
}
