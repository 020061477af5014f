import type { ResponseMessage, ResponseTemplates } from '@chat-quiz/shared-types';
import type { ResponseTextFormatter } from '../contracts';

/**
 * Renders response events through a game's templates.
 * Placeholders: #NAME, #TOPICS, #QUESTION, #LEFT, #SCORE. Every occurrence
 * is substituted; unknown placeholders are left as written.
 */
export class TemplateFormatter implements ResponseTextFormatter {
  constructor(private readonly templates: Readonly<ResponseTemplates>) {}

  format(message: ResponseMessage): string {
    const t = this.templates;
    switch (message.type) {
      case 'GREETING':
        return fill(t.greeting, '#NAME', message.name);
      case 'REPHRASE':
        return t.rephrase;
      case 'RULES':
        return fill(t.rules, '#TOPICS', message.topics.join(', '));
      case 'ANSWER_QUESTION':
        return fill(t.answerQuestion, '#QUESTION', message.question);
      case 'PLEASE_RETRY':
        return t.pleaseRetry;
      case 'PLEASE_RETRY_LIMITS':
        return fill(t.pleaseRetryLimits, '#LEFT', String(message.left));
      case 'INCORRECT':
        return t.incorrect;
      case 'CORRECT':
        return fill(t.correct, '#SCORE', String(message.score));
      case 'GAME_COMPLETE':
        return fill(t.gameComplete, '#SCORE', String(message.score));
      case 'CHOOSE_NEXT_TOPIC':
        return t.chooseNextTopic;
      case 'ALREADY_ANSWERED':
        return t.alreadyAnswered;
      case 'QUIT':
        return t.quit;
      default:
        return assertNever(message);
    }
  }
}

/** Function replacer: `$&` patterns inside substituted text stay literal. */
function fill(template: string, placeholder: string, value: string): string {
  return template.replaceAll(placeholder, () => value);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled response: ${JSON.stringify(value)}`);
}
