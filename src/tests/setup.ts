import { globalErrorHandler } from '../utils/errorHandler';
import { logger } from '../utils/logger';

process.env.NODE_ENV = 'test';
process.env.TZ = 'UTC';

beforeAll(() => {
  logger.silent = true;
});

afterEach(() => {
  globalErrorHandler.clearErrorCounts();
});
