import express from 'express';
import type { Express, NextFunction } from 'express';
import path from 'node:path';

interface FallbackRequest {
  path: string;
}

interface FallbackResponse {
  headersSent: boolean;
  sendFile(filePath: string, callback: (error?: Error) => void): void;
  status(code: number): { json(body: unknown): unknown };
}

/**
 * Checks whether a request path names a file, such as `/app.js`.
 * @param requestPath - URL path of the request.
 * @returns True when the last segment carries an extension.
 */
export const isAssetPath = (requestPath: string): boolean => path.posix.extname(requestPath) !== '';

/**
 * Answers page navigations with index.html and leaves missing assets to the 404 handler.
 * @param publicDir - Directory holding index.html.
 * @returns Route handler.
 */
export const spaFallback =
  (publicDir: string) =>
  (req: FallbackRequest, res: FallbackResponse, next: NextFunction): void => {
    if (isAssetPath(req.path)) {
      next();
      return;
    }
    res.sendFile(path.join(publicDir, 'index.html'), (error) => {
      if (error) {
        console.error(error);
        if (!res.headersSent) {
          res.status(500).json({ message: 'Storefront page is unavailable' });
        }
      }
    });
  };

/**
 * Builds the storefront server.
 * @param publicDir - Directory with index.html, styles.css and the bundled app.js.
 * @returns Express application.
 */
export const createApp = (publicDir: string): Express => {
  const app = express();

  app.use(express.static(publicDir));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('*', spaFallback(publicDir));

  return app;
};
