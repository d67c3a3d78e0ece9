// src/config/config.ts
import dotenv from 'dotenv';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';

dotenv.config();

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

interface Config {
  nodeEnv: string;
  logLevel: string;
  prettyLogs: boolean;
  http: {
    host: string;
    port: number;
  };
  paths: {
    dataDir: string;
  };
}

const config: Config = {
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: process.env.LOG_LEVEL || 'info',
  prettyLogs: process.env.LOG_PRETTY === 'true' || process.env.LOG_PRETTY === '1',
  http: {
    host: process.env.HOST || '127.0.0.1',
    port: parseInt(process.env.PORT || '8000', 10),
  },
  paths: {
    dataDir: process.env.STATUTE_DATA_DIR
      ? resolve(process.env.STATUTE_DATA_DIR)
      : join(__dirname, '../../data'),
  },
};

export default config;
