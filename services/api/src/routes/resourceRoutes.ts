import { Router } from 'express';
import type { Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import type { ResourceService } from '../../../../libs/resource/resourceService.js';
import { supports } from '../../../../libs/resource/registry.js';
import { RequestContext } from '../../../../libs/context/requestContext.js';
import { getContextLogger } from '../../../../libs/logging/logger.js';
import { createValidator } from '../../../../libs/validation/zod-middleware.js';
import type { ScrollParams } from '../../../../libs/pagination/queryPlan.js';

const validateBody = createValidator(z.record(z.unknown()));

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 does not await handlers; rejections are forwarded explicitly. */
const handle = (fn: AsyncHandler): RequestHandler => (req, res, next) => {
    fn(req, res).catch(next);
};

/** Repeated query parameters resolve to their first value. */
export function firstQueryValue(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) {
        const first: unknown = value[0];
        return typeof first === 'string' ? first : undefined;
    }
    return undefined;
}

export function readScrollParams(query: Request['query']): ScrollParams {
    return {
        name: firstQueryValue(query.name),
        after_id: firstQueryValue(query.after_id),
        limit: firstQueryValue(query.limit),
        sort_by: firstQueryValue(query.sort_by),
        order: firstQueryValue(query.order)
    };
}

/**
 * Router for one resource, mounted at `/api/<name>`.
 * Only the operations the resource enables are routed.
 */
export function createResourceRouter(service: ResourceService): Router {
    const router = Router();
    const { name } = service.definition;

    if (supports(service.definition, 'create')) {
        router.post('/', handle(async (req, res) => {
            const scope = RequestContext.get();
            const data = validateBody(req.body, `${name}:create`);

            const id = await service.create(data, scope);
            const doc = await service.get(id, scope);

            getContextLogger(scope).info(`create_${name} Success ${scope.breadcrumb.at_time}, ${scope.breadcrumb.correlation_id}`);
            res.status(201).json(doc);
        }));
    }

    if (supports(service.definition, 'read')) {
        router.get('/', handle(async (req, res) => {
            const scope = RequestContext.get();
            const page = await service.list(readScrollParams(req.query), scope);

            getContextLogger(scope).info(`get_${name}s Success ${scope.breadcrumb.at_time}, ${scope.breadcrumb.correlation_id}`);
            res.status(200).json(page);
        }));

        router.get('/:id', handle(async (req, res) => {
            const scope = RequestContext.get();
            const doc = await service.get(req.params.id, scope);

            getContextLogger(scope).info(`get_${name} Success ${scope.breadcrumb.at_time}, ${scope.breadcrumb.correlation_id}`);
            res.status(200).json(doc);
        }));
    }

    if (supports(service.definition, 'update')) {
        router.patch('/:id', handle(async (req, res) => {
            const scope = RequestContext.get();
            const patch = validateBody(req.body, `${name}:update`);
            const doc = await service.update(req.params.id, patch, scope);

            getContextLogger(scope).info(`update_${name} Success ${scope.breadcrumb.at_time}, ${scope.breadcrumb.correlation_id}`);
            res.status(200).json(doc);
        }));
    }

    return router;
}
