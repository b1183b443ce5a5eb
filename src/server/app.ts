// src/server/app.ts
import express, { type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import { z } from 'zod';
import { ScrapeError, ErrorCode, describeError } from '../core/errors.js';
import type { Scraper } from '../core/types/index.js';

export const ScrapeRequestSchema = z.object({
  url: z
    .string({ required_error: 'url is required' })
    .refine(value => /^https?:\/\//.test(value), 'URL must start with http:// or https://'),
});

export function createApp(scraper: Scraper): express.Express {
  const app = express();
  app.use(express.json({ limit: '100kb' }));

  app.get('/healthz', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.post('/scrape', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = ScrapeRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ detail: parsed.error.issues[0]?.message ?? 'Invalid request' });
        return;
      }

      const result = await scraper.scrape(parsed.data.url);
      res.json({ result });
    } catch (error) {
      next(error);
    }
  });

  app.use(errorHandler);

  return app;
}

function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof ScrapeError && error.code === ErrorCode.INVALID_URL) {
    res.status(400).json({ detail: error.message });
    return;
  }
  // body-parser marks malformed JSON with a 400 status
  if (error instanceof SyntaxError) {
    res.status(400).json({ detail: 'Malformed JSON body' });
    return;
  }

  console.error(`[ERROR] Unhandled scrape failure: ${describeError(error)}`);
  res.status(500).json({ detail: `Scraping failed: ${describeError(error)}` });
}

export function startServer(
  scraper: Scraper,
  port: number,
  host: string
): Promise<{ server: Server; address: string }> {
  const app = createApp(scraper);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => {
      const info = server.address();
      const address = typeof info === 'object' && info !== null
        ? `http://${host}:${info.port}`
        : String(info);
      resolve({ server, address });
    });
    server.once('error', reject);
  });
}
