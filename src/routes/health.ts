import { Router, type Request, type Response } from 'express';
import { sendSuccess } from '../response';

export interface HealthOptions {
  startedAt: Date;
  now: () => Date;
}

// e.g. 3723500 -> "1h2m3.5s"
export function formatUptime(ms: number): string {
  const totalSeconds = Math.max(0, ms) / 1000;
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = Math.round((totalSeconds % 60) * 1000) / 1000;

  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (hours > 0 || minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${seconds}s`);
  return parts.join('');
}

export function healthRouter({ startedAt, now }: HealthOptions): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const current = now();
    sendSuccess(res, 200, 'Service is healthy', {
      kind: 'health',
      health: {
        timestamp: current.toISOString(),
        uptime: formatUptime(current.getTime() - startedAt.getTime()),
      },
    });
  });

  return router;
}
