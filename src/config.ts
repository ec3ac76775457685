import dotenv from 'dotenv';

dotenv.config();

export const config = {
  port: parseInt(process.env.PORT || '8085', 10),
  db: {
    path: process.env.DB_PATH || './data/app.db',
  },
  logLevel: process.env.LOG_LEVEL || 'info',
  // Upper bound for the lock wait, the location check and the language lookup
  ioTimeoutMs: Math.min(parseInt(process.env.IO_TIMEOUT_MS || '5000', 10) || 5000, 5000),
  indexer: {
    apiUrl: process.env.INDEXER_API_URL || '',
    apiKey: process.env.INDEXER_API_KEY || '',
  },
};

if (!config.indexer.apiUrl) {
  console.warn('Warning: INDEXER_API_URL not set, using the built-in language list');
}
