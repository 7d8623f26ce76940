import { Request, Response, Router } from 'express';

export const healthRouter = Router();

healthRouter.get('/', (_req: Request, res: Response) => {
  res.status(200).json({ status: 'ok', uptime_s: Math.round(process.uptime()) });
});
