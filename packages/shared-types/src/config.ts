export const Config = {
  vocabulary: {
    yes: ['yes', 'да'],
    no: ['no', 'нет'],
    stop: ['stop', 'стоп'],
  },
  templates: {
    greeting: 'Hello! Today we play #NAME. Want to join?',
    rephrase: "I don't understand",
    rules: 'Choose a topic from: #TOPICS. Answer a question. Get your score when all topics are complete',
    answerQuestion: 'Next question: #QUESTION',
    pleaseRetry: 'That is incorrect. Try again',
    pleaseRetryLimits: 'That is incorrect. Try again. #LEFT attempts left',
    incorrect: 'That is incorrect',
    correct: 'That is correct. Your score: #SCORE',
    gameComplete: 'Game is complete. Your score: #SCORE',
    chooseNextTopic: 'Choose the next topic',
    alreadyAnswered: 'You already answered this topic',
    quit: 'Ok... Goodbye!',
  },
  server: {
    port: 3021,
    dataDir: './deploy/data',
    webhookPath: '/api/webhook',
    healthPath: '/api/health',
    channelsFile: 'channels.json',
    gameFilePrefix: 'game-',
  },
  delivery: {
    graphApiUrl: 'https://graph.facebook.com/v12.0',
    timeoutMs: 10_000,
    maxRetries: 2,
    retryDelayMs: 500,
  },
} as const;
