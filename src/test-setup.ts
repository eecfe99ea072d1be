import { logger, LogLevel } from './logging/index.js';

// Keep test output readable; individual tests lower the level when they assert on logs.
logger.setLevel(LogLevel.ERROR);
