import { Injectable, NestMiddleware } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';

// load balancer health checks hit /api/health every few seconds
export function isHealthCheck(req: Request): boolean {
  return req.originalUrl.endsWith('/health');
}

@Injectable()
export class RequestLoggerMiddleware implements NestMiddleware {
  private readonly morganMiddleware = morgan(
    process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
    { skip: (req: Request) => isHealthCheck(req) },
  );

  use(req: Request, res: Response, next: NextFunction) {
    this.morganMiddleware(req, res, next);
  }
}
