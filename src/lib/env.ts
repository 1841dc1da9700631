import dotenv from 'dotenv';
import Logger from './logger';

const ENV_FILENAME = process.env.ENV_FILENAME;

if (ENV_FILENAME) {
  dotenv.config({ path: [ENV_FILENAME, '.env'] });
} else {
  Logger.info({
    at: 'env',
    message: 'No ENV_FILENAME specified, using .env and the variables passed through the environment.',
  });
  dotenv.config();
}
