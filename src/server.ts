import { config } from './config';
import { createApp } from './app';
import { searchQueue } from './services/searchQueue';
import { logger } from './services/structuredLogging';

const app = createApp();

// Pausing a show must stop queued searches for it
searchQueue.attach();

const port = config.port;
app.listen(port, () => {
  logger.info('http', `Server running on port ${port}`);
});
