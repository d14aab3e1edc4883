import http from 'node:http';

export type AuctionHealth = {
  epochId?: string;
  price?: string;
  lastAction?: 'settle' | 'wait' | 'error';
  lastReason?: string;
};

export type HealthStatus = {
  ok: boolean;
  ready: boolean;
  keeper?: string;
  chain_id?: string;
  last_tick?: number;
  warnings?: string[];
  auctions?: Partial<Record<'mining' | 'treasury', AuctionHealth>>;
};

export class HealthServer {
  private readonly port: number;
  private readonly getStatus: () => Promise<HealthStatus> | HealthStatus;
  private readonly getMetrics?: () => string;
  private server?: http.Server;

  constructor(args: {
    port: number;
    getStatus: () => Promise<HealthStatus> | HealthStatus;
    getMetrics?: () => string;
  }) {
    this.port = args.port;
    this.getStatus = args.getStatus;
    this.getMetrics = args.getMetrics;
  }

  /** Bound port; differs from the configured one when that was 0. */
  get boundPort(): number | undefined {
    const addr = this.server?.address();
    return addr != null && typeof addr === 'object' ? addr.port : undefined;
  }

  async start(): Promise<void> {
    if (this.server) return;

    const server = http.createServer((req, res) => {
      this.handle(req, res).catch((err: unknown) => {
        const msg = err instanceof Error ? err.message : String(err);
        res.statusCode = 500;
        res.setHeader('content-type', 'application/json');
        res.end(JSON.stringify({ ok: false, ready: false, warnings: [msg] } satisfies HealthStatus));
      });
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, resolve);
    });
  }

  async stop(): Promise<void> {
    if (!this.server) return;
    const s = this.server;
    this.server = undefined;

    await new Promise<void>((resolve) => s.close(() => resolve()));
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    if (!req.url || req.method !== 'GET') {
      res.statusCode = 404;
      res.end();
      return;
    }

    const url = new URL(req.url, 'http://127.0.0.1');

    if (url.pathname === '/metrics' && this.getMetrics) {
      res.statusCode = 200;
      res.setHeader('content-type', 'text/plain; version=0.0.4');
      res.end(this.getMetrics());
      return;
    }

    if (url.pathname !== '/health') {
      res.statusCode = 404;
      res.end();
      return;
    }

    const status = await this.getStatus();
    res.statusCode = status.ok ? 200 : 503;
    res.setHeader('content-type', 'application/json');
    res.end(JSON.stringify(status));
  }
}
