import type { Request, Response, NextFunction } from 'express';
import type { AnsiblePingService } from '../../../libs/ansible/pingService.js';
import { scopedLogger } from '../../../libs/logging/logger.js';
import { validate, SchemaValidationError } from '../../../libs/validation/zod-middleware.js';
import { LoginFormSchema, PingRequestSchema } from '../../../libs/validation/schema.js';
import { renderDashboard, renderLogin } from './views.js';

export const ROUTES = {
    login: '/login',
    loginPage: '/',
    health: '/health',
    dashboard: '/app',
    ping: '/api/ansible/ping'
} as const;

export const APP_TITLE = 'Platform API';

// Demo credential check only; there is no session behind it.
const DEMO_USERNAME = 'admin';
const DEMO_PASSWORD = 'admin';

export function loginPageHandler() {
    return (_req: Request, res: Response): void => {
        res.status(200).type('html').send(renderLogin({ loginUrl: ROUTES.login }));
    };
}

export function loginHandler() {
    return (req: Request, res: Response, next: NextFunction): void => {
        try {
            const form = validate(LoginFormSchema, req.body, 'PlatformApi:Login');
            const log = scopedLogger();

            if (form.username === DEMO_USERNAME && form.password === DEMO_PASSWORD) {
                log.info({ event: 'LOGIN_SUCCEEDED', username: form.username });
                res.redirect(302, ROUTES.dashboard);
                return;
            }

            log.warn({ event: 'LOGIN_REJECTED', username: form.username });
            res.status(401).type('html').send(renderLogin({ loginUrl: ROUTES.login, error: 'Invalid credentials' }));
        } catch (err: unknown) {
            if (err instanceof SchemaValidationError) {
                res.status(400).type('html').send(renderLogin({ loginUrl: ROUTES.login, error: 'Username and password are required' }));
                return;
            }
            next(err);
        }
    };
}

export function healthHandler() {
    return (_req: Request, res: Response): void => {
        res.status(200).json({ status: 'ok' });
    };
}

export function dashboardHandler() {
    return (_req: Request, res: Response): void => {
        res.status(200).type('html').send(renderDashboard({
            title: APP_TITLE,
            healthUrl: ROUTES.health,
            endpoints: [ROUTES.loginPage, ROUTES.login, ROUTES.health, ROUTES.ping]
        }));
    };
}

export function pingHandler(service: AnsiblePingService) {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const body = validate(PingRequestSchema, req.body ?? {}, 'PlatformApi:Ping');
            const { statusCode, outcome } = await service.execute(body.hosts);
            res.status(statusCode).json(outcome);
        } catch (err: unknown) {
            next(err);
        }
    };
}
