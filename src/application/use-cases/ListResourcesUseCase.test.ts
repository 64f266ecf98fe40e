/**
 * Unit tests for ListResourcesUseCase
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ListResourcesUseCase } from './ListResourcesUseCase';
import type { IResourceRepository, ILogger } from '../../domain/interfaces';
import type { ResourceEntity } from '../../domain/entities';

function resources(offset: number, length: number): ResourceEntity[] {
    return Array.from({ length }, (_, i) => ({
        id: `id-${offset + i}`,
        name: `resource-${offset + i}`,
        createdAt: '2024-01-01T00:00:00.000Z'
    }));
}

describe('ListResourcesUseCase', () => {
    let useCase: ListResourcesUseCase;
    let mockResourceRepository: IResourceRepository;
    let mockLogger: ILogger;

    function withTotal(total: number): void {
        vi.mocked(mockResourceRepository.count).mockResolvedValue(total);
        vi.mocked(mockResourceRepository.list).mockImplementation(async (offset, length) =>
            resources(offset, Math.max(0, Math.min(length, total - offset)))
        );
    }

    beforeEach(() => {
        mockResourceRepository = {
            count: vi.fn(),
            list: vi.fn(),
            add: vi.fn(),
            get: vi.fn(),
            remove: vi.fn()
        };

        mockLogger = {
            log: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            info: vi.fn(),
            debug: vi.fn()
        };

        useCase = new ListResourcesUseCase(mockResourceRepository, mockLogger, {
            units: 'resources',
            maxRangeLength: 50
        });
    });

    it('should return the whole collection without a Range header', async () => {
        withTotal(3);

        const result = await useCase.execute({});

        expect(result).toEqual({
            success: true,
            resources: resources(0, 3),
            contentRange: 'resources 0-2/3',
            partial: false,
            total: 3
        });
        expect(mockResourceRepository.list).toHaveBeenCalledWith(0, 3);
    });

    it('should return a fixed range', async () => {
        withTotal(200);

        const result = await useCase.execute({ range: 'resources=10-19' });

        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.contentRange).toBe('resources 10-19/200');
            expect(result.partial).toBe(true);
            expect(result.resources).toHaveLength(10);
            expect(result.resources[0].name).toBe('resource-10');
        }
        expect(mockResourceRepository.list).toHaveBeenCalledWith(10, 10);
    });

    it('should resolve a suffix range against the total', async () => {
        withTotal(200);

        const result = await useCase.execute({ range: 'resources=-20' });

        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.contentRange).toBe('resources 180-199/200');
        }
        expect(mockResourceRepository.list).toHaveBeenCalledWith(180, 20);
    });

    it('should cap long ranges at the maximum range length', async () => {
        withTotal(300);

        const result = await useCase.execute({ range: 'resources=100-' });

        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.contentRange).toBe('resources 100-149/300');
            expect(result.resources).toHaveLength(50);
        }
    });

    it('should clamp a range that runs past the end', async () => {
        withTotal(25);

        const result = await useCase.execute({ range: 'resources=20-40' });

        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.contentRange).toBe('resources 20-24/25');
            expect(result.partial).toBe(true);
        }
    });

    it('should ignore ranges in another unit', async () => {
        withTotal(3);

        const result = await useCase.execute({ range: 'bytes=0-1' });

        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.contentRange).toBe('resources 0-2/3');
            expect(result.partial).toBe(false);
        }
    });

    it('should reject malformed ranges without touching the repository', async () => {
        const result = await useCase.execute({ range: 'resources=abc' });

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.status).toBe(400);
            expect(result.error.id).toBe('range_invalid');
            expect(result.contentRange).toBeUndefined();
        }
        expect(mockResourceRepository.count).not.toHaveBeenCalled();
    });

    it('should report ranges beyond the collection as unsatisfiable', async () => {
        withTotal(10);

        const result = await useCase.execute({ range: 'resources=10-20' });

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.status).toBe(416);
            expect(result.contentRange).toBe('resources */10');
        }
        expect(mockResourceRepository.list).not.toHaveBeenCalled();
    });

    it('should report explicit ranges over an empty collection as unsatisfiable', async () => {
        withTotal(0);

        const result = await useCase.execute({ range: 'resources=0-' });

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.status).toBe(416);
            expect(result.contentRange).toBe('resources */0');
        }
    });

    it('should return an empty list for an empty collection without a Range header', async () => {
        withTotal(0);

        const result = await useCase.execute({});

        expect(result).toEqual({
            success: true,
            resources: [],
            contentRange: 'resources */0',
            partial: false,
            total: 0
        });
        expect(mockResourceRepository.list).not.toHaveBeenCalled();
    });

    it('should return an empty list for a suffix over an empty collection', async () => {
        withTotal(0);

        const result = await useCase.execute({ range: 'resources=-10' });

        expect(result.success).toBe(true);
        if (result.success) {
            expect(result.resources).toEqual([]);
            expect(result.contentRange).toBe('resources */0');
        }
    });
});
