import { v4 as uuidv4 } from 'uuid';
import type { ResourceEntity, ResourceType } from './entity';

// ============================================================================
// RESOURCE - Depletable ORE / FUEL deposit
// ============================================================================

export function createResource(
  resourceType: ResourceType,
  quantity: number,
  x: number,
  y: number,
  entityId: string = uuidv4()
): ResourceEntity {
  return {
    entityId,
    kind: 'RESOURCE',
    resourceType,
    quantity: Math.max(0, Math.floor(quantity)),
    x: Math.floor(x),
    y: Math.floor(y),
  };
}
