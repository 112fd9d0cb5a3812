import express from 'express';
import type { Express } from 'express';
import type { ResourceService } from '../../../libs/resource/resourceService.js';
import type { TokenVerifier } from '../../../libs/auth/tokenVerifier.js';
import { createAuthenticateMiddleware } from './middleware/authenticate.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createResourceRouter } from './routes/resourceRoutes.js';
import { createDevLoginRouter } from './routes/devLogin.js';

export interface AppDependencies {
    services: readonly ResourceService[];
    verifier: TokenVerifier;
    enableLogin: boolean;
    /** Passed to Express `trust proxy` so `from_ip` reflects the client behind a proxy. */
    trustProxy?: boolean | number | string;
}

export function createApp(deps: AppDependencies): Express {
    const app = express();
    app.disable('x-powered-by');
    if (deps.trustProxy !== undefined) {
        app.set('trust proxy', deps.trustProxy);
    }

    app.use(express.json({ limit: '1mb' }));

    app.get('/health', (_req, res) => {
        res.status(200).json({ status: 'ok' });
    });

    if (deps.enableLogin) {
        app.use('/dev-login', createDevLoginRouter(deps.verifier));
    }

    app.use('/api', createAuthenticateMiddleware(deps.verifier));
    for (const service of deps.services) {
        app.use(`/api/${service.definition.name}`, createResourceRouter(service));
    }

    app.use(notFoundHandler);
    app.use(errorHandler);
    return app;
}
