import express, { Express, NextFunction, Request, Response } from 'express';
import * as http from 'http';
import { ContractErrorCode, InvalidArgumentError, errorMessage } from '../errors';
import { ClientIdentity, StaticClientIdentity } from '../identity';
import { ContractHost, InvocationResult } from '../host';
import { logger } from '../logging/structured-logger';

export const CLIENT_ID_HEADER = 'x-client-id';
export const CLIENT_MSP_HEADER = 'x-client-msp';

const STATUS_BY_CODE: Record<ContractErrorCode, number> = {
  INVALID_ARGUMENT: 400,
  UNAUTHORIZED: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  STORAGE: 500,
};

export function statusFor(result: InvocationResult): number {
  return result.ok ? 200 : STATUS_BY_CODE[result.error.code];
}

/**
 * Identity as asserted by the authentication proxy in front of this server.
 */
export function identityFromHeaders(headers: http.IncomingHttpHeaders): ClientIdentity {
  const id = headers[CLIENT_ID_HEADER];
  const msp = headers[CLIENT_MSP_HEADER];
  if (typeof id !== 'string' || id.trim() === '') {
    throw new InvalidArgumentError(`missing ${CLIENT_ID_HEADER} header`);
  }
  return new StaticClientIdentity(id.trim(), typeof msp === 'string' ? msp.trim() : '');
}

export function argsFromBody(body: unknown): string[] {
  if (body === undefined || body === null) return [];
  if (typeof body !== 'object') {
    throw new InvalidArgumentError('body must be { "args": string[] }');
  }
  if (!('args' in body)) return [];

  const args: unknown = body.args;
  if (!Array.isArray(args)) {
    throw new InvalidArgumentError('body must be { "args": string[] }');
  }
  const list: unknown[] = args;
  if (!list.every((a): a is string => typeof a === 'string')) {
    throw new InvalidArgumentError('every argument must be a string');
  }
  return list;
}

export class ApiServer {
  private app: Express;
  private httpServer?: http.Server;

  constructor(private readonly host: ContractHost, private readonly port: number) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  get express(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '256kb' }));
  }

  private setupRoutes(): void {
    this.app.get('/api/health', (_req: Request, res: Response) => {
      res.json({
        status: 'ok',
        keys: this.host.stateSize,
        events: this.host.events.length,
        lastSequence: this.host.events.lastSequence,
      });
    });

    this.app.get('/api/events', (req: Request, res: Response) => {
      const since = Number(req.query.since ?? 0);
      const limit = Number(req.query.limit ?? 100);
      if (!Number.isInteger(since) || since < 0 || !Number.isInteger(limit) || limit < 1 || limit > 1000) {
        res.status(400).json({ success: false, error: 'since must be >= 0 and limit between 1 and 1000' });
        return;
      }
      res.json({ success: true, events: this.host.events.since(since, limit) });
    });

    this.app.post('/api/transactions/:fn', (req: Request, res: Response) => {
      this.handleInvocation(req, res, 'submit');
    });

    this.app.post('/api/queries/:fn', (req: Request, res: Response) => {
      this.handleInvocation(req, res, 'evaluate');
    });

    // express.json() rejects malformed bodies through the error chain
    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      res.status(400).json({ success: false, error: { code: 'INVALID_ARGUMENT', message: errorMessage(err) } });
    });
  }

  private handleInvocation(req: Request, res: Response, mode: 'submit' | 'evaluate'): void {
    let identity: ClientIdentity;
    let args: string[];
    try {
      identity = identityFromHeaders(req.headers);
      args = argsFromBody(req.body);
    } catch (error) {
      res.status(400).json({ success: false, error: { code: 'INVALID_ARGUMENT', message: errorMessage(error) } });
      return;
    }

    const fn = req.params.fn;
    const result = mode === 'submit'
      ? this.host.submit(fn, args, identity)
      : this.host.evaluate(fn, args, identity);

    if (result.ok) {
      res.status(200).json({ success: true, txId: result.txId, result: result.payload, event: result.event });
    } else {
      res.status(statusFor(result)).json({ success: false, txId: result.txId, error: result.error });
    }
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = http.createServer(this.app);
      server.once('error', reject);
      server.listen(this.port, () => {
        logger.info('ApiServer', 'Listening', { port: this.port });
        resolve();
      });
      this.httpServer = server;
    });
  }

  stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return Promise.resolve();
    this.httpServer = undefined;
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
