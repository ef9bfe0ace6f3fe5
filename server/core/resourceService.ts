import { eq } from 'drizzle-orm';
import { db, type Executor } from '../db';
import { resources, type ResourceRow } from '../../shared/schema';
import { RESOURCE_STATUSES, type ResourceStatus } from '../../shared/constants/statuses';
import type { Resource } from './bookingService/types';

/**
 * Read access to the resource catalogue. Resources are managed by the
 * surrounding application; the booking and messaging core only looks them up.
 */
export interface ResourceDirectory {
  getResource(resourceId: number): Promise<Resource | null>;
}

function isResourceStatus(value: string): value is ResourceStatus {
  return (RESOURCE_STATUSES as readonly string[]).includes(value);
}

export function toResource(row: ResourceRow): Resource {
  if (!isResourceStatus(row.status)) {
    throw new Error(`[ResourceService] Resource ${row.id} has unknown status "${row.status}"`);
  }
  return {
    id: row.id,
    ownerId: row.ownerId,
    title: row.title,
    requiresApproval: row.requiresApproval,
    status: row.status,
  };
}

export class PgResourceDirectory implements ResourceDirectory {
  constructor(private readonly executor: Executor = db) {}

  async getResource(resourceId: number): Promise<Resource | null> {
    const [row] = await this.executor.select().from(resources).where(eq(resources.id, resourceId));
    return row ? toResource(row) : null;
  }
}
