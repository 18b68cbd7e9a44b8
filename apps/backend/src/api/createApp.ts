import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { z } from 'zod';
import type { TradePipeline } from '../engines/TradePipeline';
import { errorMessage, NotFoundError } from '../errors/pipelineErrors';
import { DEFAULT_SEARCH_LIMIT, type TradeStore } from '../services/TradeStore';
import { logger } from '../utils/logger';

const LAN_FRONTEND_RE = /^http:\/\/\d+\.\d+\.\d+\.\d+:3112$/;

const extractTradeSchema = z.object({
    image_path: z.string().trim().min(1),
    send_notification: z.boolean().default(false),
});

const searchTradesSchema = z.object({
    query: z.string().default(''),
    limit: z.number().int().min(1).max(500).default(DEFAULT_SEARCH_LIMIT),
});

export interface TradeApiDeps {
    pipeline: TradePipeline;
    store: TradeStore;
    allowedOrigins: readonly string[];
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function asyncRoute(handler: AsyncHandler): RequestHandler {
    return (req, res, next) => {
        handler(req, res).catch(next);
    };
}

function badRequest(res: Response, error: z.ZodError): void {
    res.status(400).json({
        success: false,
        error: error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
    });
}

export function createApp(deps: TradeApiDeps): express.Express {
    const app = express();

    app.use(helmet());
    app.use(cors({
        origin: (requestOrigin, callback) => {
            if (!requestOrigin || deps.allowedOrigins.includes(requestOrigin) || LAN_FRONTEND_RE.test(requestOrigin)) {
                callback(null, true);
            } else {
                logger.warn(`[CORS] Blocked origin: ${requestOrigin}`);
                callback(null, false);
            }
        },
        methods: ['GET', 'POST'],
    }));
    app.use(express.json());

    app.get('/health', (_req, res) => {
        res.json({ status: 'healthy', timestamp: new Date().toISOString() });
    });

    app.post('/extract-trade', asyncRoute(async (req, res) => {
        const parsed = extractTradeSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            badRequest(res, parsed.error);
            return;
        }
        const result = await deps.pipeline.process(parsed.data.image_path, parsed.data.send_notification);
        res.json({ success: true, data: result });
    }));

    app.post('/search-trades', asyncRoute(async (req, res) => {
        const parsed = searchTradesSchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            badRequest(res, parsed.error);
            return;
        }
        res.json({ success: true, data: await deps.store.search(parsed.data.query, parsed.data.limit) });
    }));

    app.get('/trading-stats', asyncRoute(async (_req, res) => {
        res.json({ success: true, data: await deps.store.computeStatistics() });
    }));

    app.get('/trade-log', asyncRoute(async (_req, res) => {
        const trades = await deps.store.readAll();
        res.json({ success: true, data: { trades, total: trades.length } });
    }));

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof NotFoundError) {
            res.status(404).json({ success: false, error: error.message });
            return;
        }
        if (error instanceof SyntaxError) {
            res.status(400).json({ success: false, error: 'Malformed JSON body' });
            return;
        }
        logger.error(`[API] ${req.method} ${req.path} failed: ${errorMessage(error)}`);
        res.status(500).json({ success: false, error: `Error processing request: ${errorMessage(error)}` });
    });

    return app;
}
