import dotenv from 'dotenv';
import { ConsoleLogger, MissingCredentialError, describeError } from '../../lib/compliance-analyst';
import { startServer } from './server';

dotenv.config();

const logger = new ConsoleLogger('server');

startServer(process.env).catch((error: unknown) => {
  if (error instanceof MissingCredentialError) {
    logger.error(`Startup halted: ${error.message}`);
  } else {
    logger.error(`Failed to start server: ${describeError(error)}`);
  }
  process.exit(1);
});
