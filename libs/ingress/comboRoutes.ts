/**
 * Combo instruction ingress.
 *
 * The signer is authenticated upstream (gateway / wallet signature check)
 * and arrives in the x-signer header; this layer only validates its shape.
 */

import crypto from 'crypto';
import express from 'express';
import type { NextFunction, Request, Response, Router } from 'express';
import { ComboHost, InstructionContext } from '../host/host.js';
import { logger } from '../logging/logger.js';
import {
    CloseComboRequestSchema,
    CreateComboRequestSchema,
    IdentitySchema,
    VerifyComboRequestSchema
} from '../validation/schema.js';
import { createValidator } from '../validation/zod-middleware.js';
import { toErrorResponse, UnauthenticatedError } from './errors.js';

const validateCreate = createValidator(CreateComboRequestSchema);
const validateVerify = createValidator(VerifyComboRequestSchema);
const validateClose = createValidator(CloseComboRequestSchema);
const validateIdentity = createValidator(IdentitySchema);

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncRoute) {
    return (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };
}

function readParam(req: Request, name: string): string {
    const value = req.params[name];
    return typeof value === 'string' ? value : '';
}

function instructionContext(req: Request): InstructionContext {
    const signer = req.get('x-signer');
    if (!signer) {
        throw new UnauthenticatedError('Missing x-signer header');
    }
    if (!IdentitySchema.safeParse(signer).success) {
        throw new UnauthenticatedError('x-signer is not a valid identity');
    }
    return {
        requestId: req.get('x-request-id') ?? crypto.randomUUID(),
        signer
    };
}

export function createComboRouter(host: ComboHost): Router {
    const router = express.Router();

    router.post('/combos', route(async (req, res) => {
        const context = instructionContext(req);
        const input = validateCreate(req.body, 'Ingress:CreateCombo');
        const record = await host.createCombo(context, input);
        res.status(201).json(record);
    }));

    router.post('/combos/:address/verifications', route(async (req, res) => {
        const context = instructionContext(req);
        const address = validateIdentity(readParam(req, 'address'), 'Ingress:VerifyCombo:address');
        const { moves } = validateVerify(req.body, 'Ingress:VerifyCombo');
        const record = await host.verifyCombo(context, address, moves);
        res.status(200).json(record);
    }));

    router.post('/combos/:address/close', route(async (req, res) => {
        const context = instructionContext(req);
        const address = validateIdentity(readParam(req, 'address'), 'Ingress:CloseCombo:address');
        const { destination } = validateClose(req.body, 'Ingress:CloseCombo');
        const result = await host.closeCombo(context, address, destination);
        res.status(200).json(result);
    }));

    router.get('/combos/:address', route(async (req, res) => {
        const address = validateIdentity(readParam(req, 'address'), 'Ingress:GetCombo');
        const record = await host.getCombo(address);
        if (!record) {
            res.status(404).json({ error: 'NOT_FOUND', message: `No combo at ${address}` });
            return;
        }
        res.status(200).json(record);
    }));

    router.get('/owners/:owner/combo', route(async (req, res) => {
        const owner = validateIdentity(readParam(req, 'owner'), 'Ingress:GetComboByOwner');
        const record = await host.getComboByOwner(owner);
        if (!record) {
            res.status(404).json({ error: 'NOT_FOUND', message: `No combo for ${owner}` });
            return;
        }
        res.status(200).json(record);
    }));

    router.get('/balances/:identity', route(async (req, res) => {
        const identity = validateIdentity(readParam(req, 'identity'), 'Ingress:GetBalance');
        res.status(200).json({ identity, balance: await host.balanceOf(identity) });
    }));

    return router;
}

export function createComboApp(host: ComboHost): express.Express {
    const app = express();
    app.use(express.json({ limit: '16kb' }));
    app.use(createComboRouter(host));

    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        const { status, body } = toErrorResponse(err, `Ingress:${req.method} ${req.path}`);
        if (status >= 500) {
            logger.error({ status, path: req.path, incidentId: body.incidentId }, 'Request failed');
        } else {
            logger.info({ status, path: req.path, error: body.error }, 'Request rejected');
        }
        res.status(status).json(body);
    });

    return app;
}
