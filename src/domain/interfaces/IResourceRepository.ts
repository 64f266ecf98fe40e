/**
 * Repository interface for the resource collection
 * This is a port in Hexagonal Architecture
 */

import type { ResourceEntity } from '../entities/Resource';

export interface IResourceRepository {
  /**
   * Number of resources currently in the collection
   */
  count(): Promise<number>;

  /**
   * Lists resources in insertion order
   * @param offset - Index of the first resource
   * @param length - Maximum number of resources to return
   */
  list(offset: number, length: number): Promise<ResourceEntity[]>;

  /**
   * Adds a resource with the given name
   * @returns The stored entity
   */
  add(name: string): Promise<ResourceEntity>;

  get(id: string): Promise<ResourceEntity | null>;

  /**
   * @returns True if the resource was removed
   */
  remove(id: string): Promise<boolean>;
}
