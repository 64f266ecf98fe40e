import type { Request, Response } from 'express';
import type { ListResourcesUseCase } from '../../../application/use-cases/ListResourcesUseCase';
import type { AddResourceUseCase } from '../../../application/use-cases/AddResourceUseCase';
import type { RemoveResourceUseCase } from '../../../application/use-cases/RemoveResourceUseCase';
import { HttpErrorHandler } from '../../../infrastructure/http/HttpErrorHandler';
import { RangeResponseBuilder } from '../../../infrastructure/http/RangeResponseBuilder';
import { HTTP_HEADERS, HTTP_STATUS } from '../../../infrastructure/http/HttpConstants';

/**
 * Controller for handling resource-related HTTP requests
 */
export class ResourceController {
    constructor(
        private listResourcesUseCase: ListResourcesUseCase,
        private addResourceUseCase: AddResourceUseCase,
        private removeResourceUseCase: RemoveResourceUseCase,
        private units: string
    ) { }

    /**
     * Handles GET /resources with an optional Range header
     */
    async list(req: Request, res: Response): Promise<void> {
        const result = await this.listResourcesUseCase.execute({ range: req.get(HTTP_HEADERS.RANGE) });

        if (!result.success) {
            RangeResponseBuilder.sendRangeError(res, this.units, result.error, result.contentRange);
            return;
        }

        RangeResponseBuilder.sendRange(res, this.units, result.resources, result.contentRange, result.partial);
    }

    /**
     * Handles POST /resources with a JSON body { name }
     */
    async add(req: Request, res: Response): Promise<void> {
        const body: unknown = req.body;
        const name = typeof body === 'object' && body !== null && 'name' in body ? body.name : undefined;

        const result = await this.addResourceUseCase.execute({ name });

        if (!result.success) {
            HttpErrorHandler.send(res, result.error);
            return;
        }

        res.status(HTTP_STATUS.CREATED).json(result.resource);
    }

    /**
     * Handles DELETE /resources/:id
     */
    async remove(req: Request, res: Response): Promise<void> {
        const result = await this.removeResourceUseCase.execute({ id: req.params.id });

        if (!result.success) {
            HttpErrorHandler.send(res, result.error);
            return;
        }

        res.json({ message: result.message });
    }
}
