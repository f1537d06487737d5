import pino from 'pino';
import { CONFIG } from './config';

/**
 * Diagnostic logger. JSON lines go to stderr so they never mix with the
 * result listing on stdout.
 */
const logger = pino(
  { name: 'certscout', level: CONFIG.LOG_LEVEL },
  pino.destination({ dest: 2, sync: true }),
);

export default logger;
