import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { createV1Router, type V1RouterDeps } from './routes/v1/index.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorMiddleware } from './middleware/error.middleware.js';

export type AppDeps = V1RouterDeps;

export function createApp(deps: AppDeps) {
    const app = express();
    app.use(helmet());
    app.use(compression());
    app.use(cors());

    // Request context & logging (BEFORE body parsing so bad JSON is traced too)
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);
    app.use(express.json({ limit: '1mb' }));

    app.use('/api/v1', createV1Router(deps));

    app.get('/healthz', (_req, res) => res.status(200).send('ok'));

    app.use(errorMiddleware);

    return app;
}
