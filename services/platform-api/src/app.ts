import express, { type Express } from 'express';
import type { AnsiblePingService } from '../../../libs/ansible/pingService.js';
import { requestContextMiddleware } from '../../../libs/context/requestContext.js';
import { errorHandler } from './errorHandler.js';
import {
    ROUTES,
    dashboardHandler,
    healthHandler,
    loginHandler,
    loginPageHandler,
    pingHandler
} from './routes.js';

export interface AppDependencies {
    pingService: AnsiblePingService;
}

export function createApp(deps: AppDependencies): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(requestContextMiddleware());
    app.use(express.json({ limit: '16kb' }));
    app.use(express.urlencoded({ extended: false, limit: '4kb' }));

    app.get(ROUTES.loginPage, loginPageHandler());
    app.post(ROUTES.login, loginHandler());
    app.get(ROUTES.health, healthHandler());
    app.get(ROUTES.dashboard, dashboardHandler());
    app.post(ROUTES.ping, pingHandler(deps.pingService));

    app.use(errorHandler());

    return app;
}
