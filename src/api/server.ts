import { createServer, IncomingMessage, ServerResponse } from 'http';
import { logger } from '../config/logger.js';
import { Metrics } from '../metrics/counter.js';
import { BarAssembler } from '../bar/assembler.js';

/**
 * Read-only status endpoint bound to localhost: health, counters and the
 * bar as last published.
 */
export class StatusServer {
    private server;
    private startedAt = Date.now();

    constructor(
        private port: number,
        private target: string,
        private metrics: Metrics,
        private assembler: BarAssembler,
    ) {
        this.server = createServer(this.handleRequest.bind(this));
    }

    private handleRequest(req: IncomingMessage, res: ServerResponse): void {
        const { method, url } = req;

        if (method === 'GET' && url === '/health') {
            this.handleHealth(res);
        } else if (method === 'GET' && url === '/metrics') {
            this.sendJson(res, 200, {
                ...this.metrics.getCounters(),
                timestamp: new Date().toISOString(),
            });
        } else if (method === 'GET' && url === '/bar') {
            this.sendJson(res, 200, {
                bar: this.assembler.currentBar,
                fragments: Object.fromEntries(this.assembler.fragments()),
            });
        } else {
            this.sendJson(res, 404, { error: 'Not found' });
        }
    }

    private handleHealth(res: ServerResponse): void {
        this.sendJson(res, 200, {
            status: 'ok',
            target: this.target,
            uptime_ms: Date.now() - this.startedAt,
            timestamp: new Date().toISOString(),
        });
    }

    private sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
        res.writeHead(statusCode, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(body));
    }

    /** Resolves with the bound port, which differs from the requested one for port 0. */
    async start(): Promise<number> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(this.port, '127.0.0.1', () => {
                const address = this.server.address();
                const port = address !== null && typeof address === 'object' ? address.port : this.port;
                logger.info({ port }, 'status server started');
                resolve(port);
            });
        });
    }

    async stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.close((err) => {
                if (err) {
                    reject(err);
                    return;
                }
                logger.info('status server stopped');
                resolve();
            });
        });
    }
}
