/**
 * Use case for listing a range of the resource collection
 * Resolves the Range header against the collection size and loads the slice
 */

import type { IResourceRepository, ILogger } from '../../domain/interfaces';
import type { ResourceEntity } from '../../domain/entities';
import { RangeSpec } from '../../domain/value-objects/RangeSpec';
import { type HttpError, fromRangeFailure } from '../../domain/value-objects/HttpError';
import { RangeParser } from '../../infrastructure/http/RangeParser';

export interface ListResourcesRequest {
  range?: string;
}

export type ListResourcesResponse =
  | {
      success: true;
      resources: ResourceEntity[];
      contentRange: string;
      // false when the whole collection is returned
      partial: boolean;
      total: number;
    }
  | {
      success: false;
      error: HttpError;
      // "<units> */<total>" for unsatisfiable ranges
      contentRange?: string;
    };

export interface ListResourcesOptions {
  units: string;
  maxRangeLength: number;
}

type ParsedRangeRequest =
  | { success: true; value: RangeSpec; explicit: boolean }
  | { success: false; error: HttpError };

export class ListResourcesUseCase {
  constructor(
    private resourceRepository: IResourceRepository,
    private logger: ILogger,
    private options: ListResourcesOptions
  ) {}

  async execute(request: ListResourcesRequest): Promise<ListResourcesResponse> {
    const parsed = this.parseRange(request.range);
    if (!parsed.success) {
      this.logger.warn(`Rejected range '${request.range}': ${parsed.error.toString()}`);
      return parsed;
    }
    const total = await this.resourceRepository.count();
    // Without an explicit range an empty collection is simply empty
    const spec = !parsed.explicit && total === 0 ? new RangeSpec(this.options.units) : parsed.value;

    const resolved = spec.setTotal(total);
    if (!resolved.success) {
      this.logger.warn(`Unsatisfiable range '${request.range}' for ${total} resources: ${resolved.message}`);
      return {
        success: false,
        error: fromRangeFailure(resolved.error, resolved.message),
        contentRange: `${this.options.units} */${total}`
      };
    }

    // An empty range has no concrete bounds to render
    if (spec.isEmpty()) {
      return {
        success: true,
        resources: [],
        contentRange: `${this.options.units} */${total}`,
        partial: false,
        total
      };
    }

    // Cap the range at the configured page size
    if (spec.limit() + 1 > this.options.maxRangeLength) {
      const capped = spec.setLast(spec.first + this.options.maxRangeLength - 1);
      if (!capped.success) {
        return { success: false, error: fromRangeFailure(capped.error, capped.message) };
      }
    }

    const resources = await this.resourceRepository.list(spec.offset(), spec.limit() + 1);
    const partial = spec.first > 0 || spec.last < total - 1;

    this.logger.debug(`Listing resources ${spec.first}-${spec.last} of ${total}`);

    return this.formatted(spec, resources, partial);
  }

  /**
   * No Range header, or a unit other than ours, selects the full collection
   */
  private parseRange(range: string | undefined): ParsedRangeRequest {
    if (!range) {
      return { success: true, value: RangeSpec.fullRange(this.options.units), explicit: false };
    }

    const result = RangeParser.parse(range);
    if (!result.success) {
      return { success: false, error: fromRangeFailure(result.error, result.message) };
    }

    if (result.value.units !== this.options.units) {
      this.logger.debug(`Ignoring range with unit '${result.value.units}'`);
      return { success: true, value: RangeSpec.fullRange(this.options.units), explicit: false };
    }

    return { success: true, value: result.value, explicit: true };
  }

  private formatted(spec: RangeSpec, resources: ResourceEntity[], partial: boolean): ListResourcesResponse {
    const contentRange = spec.format();
    if (!contentRange.success) {
      return {
        success: false,
        error: fromRangeFailure(contentRange.error, contentRange.message)
      };
    }
    return {
      success: true,
      resources,
      contentRange: contentRange.value,
      partial,
      total: spec.total
    };
  }
}
