/**
 * Domain entity representing a single item of the paginated collection
 */
export interface ResourceEntity {
  id: string;
  name: string;
  createdAt: string;
}
