import { configureLogger, LogLevel } from '../lib/logger';

configureLogger({ minLevel: LogLevel.ERROR });
