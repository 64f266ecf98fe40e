/**
 * Use case for removing a resource from the collection
 */

import type { IResourceRepository, ILogger } from '../../domain/interfaces';
import { type HttpError, HTTP_ERRORS } from '../../domain/value-objects/HttpError';

export interface RemoveResourceRequest {
    id: string;
}

export type RemoveResourceResponse =
    | { success: true; message: string }
    | { success: false; error: HttpError };

export class RemoveResourceUseCase {
    constructor(
        private resourceRepository: IResourceRepository,
        private logger: ILogger
    ) { }

    async execute(request: RemoveResourceRequest): Promise<RemoveResourceResponse> {
        const resource = await this.resourceRepository.get(request.id);
        if (!resource) {
            return {
                success: false,
                error: HTTP_ERRORS.RESOURCE_NOT_FOUND.withDetail({ id: request.id })
            };
        }

        const removed = await this.resourceRepository.remove(request.id);
        if (!removed) {
            return {
                success: false,
                error: HTTP_ERRORS.RESOURCE_NOT_FOUND.withDetail({ id: request.id })
            };
        }

        this.logger.info(`Resource removed: ${resource.name} (${resource.id})`);
        return { success: true, message: 'Resource removed' };
    }
}
