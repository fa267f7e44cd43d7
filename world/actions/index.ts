export type {
  WorldAction,
  ActionKind,
  MoveAction,
  HarvestAction,
  CraftAction,
  PendingAction,
  WorldEvent,
  EntityJoinedEvent,
  EntityLeftEvent,
  EntityMovedEvent,
  ResourceHarvestedEvent,
  ResourceDepletedEvent,
  ItemCraftedEvent,
  ErrorCode,
  Result,
  ResultOk,
  ResultErr,
} from './types';
export { ok, err, ACTION_KINDS } from './types';
export { decodeAction, validateAction, applyAction, processAction } from './pipeline';
export { ActionQueue } from './actionQueue';
