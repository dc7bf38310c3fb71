// Keep pino quiet under test
process.env.LOG_LEVEL = 'silent';

export {};
