import { randomUUID } from 'crypto';
import type { ResourceEntity } from '../../domain/entities/Resource';
import type { IResourceRepository } from '../../domain/interfaces/IResourceRepository';
import type { ILogger } from '../../domain/interfaces/ILogger';

/**
 * In-memory implementation of IResourceRepository
 * Keeps resources in insertion order
 */
export class InMemoryResourceRepository implements IResourceRepository {
  private readonly resources: ResourceEntity[] = [];

  constructor(
    private readonly logger: ILogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async count(): Promise<number> {
    return this.resources.length;
  }

  async list(offset: number, length: number): Promise<ResourceEntity[]> {
    return this.resources.slice(offset, offset + length).map((resource) => ({ ...resource }));
  }

  async add(name: string): Promise<ResourceEntity> {
    const resource: ResourceEntity = {
      id: randomUUID(),
      name,
      createdAt: this.now().toISOString()
    };
    this.resources.push(resource);
    this.logger.debug(`Resource added: ${resource.id} (${name})`);
    return { ...resource };
  }

  async get(id: string): Promise<ResourceEntity | null> {
    const resource = this.resources.find((item) => item.id === id);
    return resource ? { ...resource } : null;
  }

  async remove(id: string): Promise<boolean> {
    const index = this.resources.findIndex((item) => item.id === id);
    if (index === -1) {
      return false;
    }
    this.resources.splice(index, 1);
    this.logger.debug(`Resource removed: ${id}`);
    return true;
  }

  /**
   * Adds `count` resources named "resource-<n>", numbered from the current size
   */
  async seed(count: number): Promise<void> {
    const start = this.resources.length;
    for (let i = 0; i < count; i++) {
      await this.add(`resource-${start + i}`);
    }
    this.logger.info(`Seeded ${count} resources`);
  }
}
