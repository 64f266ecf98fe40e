/**
 * Use case for adding a resource to the collection
 */

import type { IResourceRepository, ILogger } from '../../domain/interfaces';
import type { ResourceEntity } from '../../domain/entities';
import { type HttpError, HTTP_ERRORS } from '../../domain/value-objects/HttpError';

export interface AddResourceRequest {
    name: unknown;
}

export type AddResourceResponse =
    | { success: true; resource: ResourceEntity }
    | { success: false; error: HttpError };

const MAX_NAME_LENGTH = 200;

export class AddResourceUseCase {
    constructor(
        private resourceRepository: IResourceRepository,
        private logger: ILogger
    ) { }

    async execute(request: AddResourceRequest): Promise<AddResourceResponse> {
        const name = typeof request.name === 'string' ? request.name.trim() : '';

        if (!name) {
            return { success: false, error: HTTP_ERRORS.INVALID_RESOURCE };
        }
        if (name.length > MAX_NAME_LENGTH) {
            return {
                success: false,
                error: HTTP_ERRORS.INVALID_RESOURCE.withDetail({ maxLength: MAX_NAME_LENGTH })
            };
        }

        const resource = await this.resourceRepository.add(name);
        this.logger.info(`Resource added: ${resource.name} (${resource.id})`);

        return { success: true, resource };
    }
}
