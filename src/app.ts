import express, { NextFunction, Request, Response } from 'express';
import path from 'path';
import fs from 'fs';
import showsRouter from './routes/shows';
import { logger } from './services/structuredLogging';

function readAppVersion(): string {
  try {
    const packageJsonPath = path.join(__dirname, '../package.json');
    const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  } catch (error) {
    console.error('Failed to read app version from package.json:', error);
  }
  return '0.0.0';
}

export function createApp() {
  const app = express();

  app.locals.appVersion = readAppVersion();

  app.set('view engine', 'ejs');
  app.set('views', path.join(__dirname, '../views'));

  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Make appVersion available to all templates via res.locals
  app.use((req, res, next) => {
    res.locals.appVersion = app.locals.appVersion;
    next();
  });

  app.get('/', (req, res) => {
    res.redirect('/shows');
  });

  app.use('/shows', showsRouter);

  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error('http', `Unhandled error on ${req.method} ${req.originalUrl}`, {
      details: { error: err.message },
    });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
