export {
  createStoreCoordinator,
  type StoreCoordinator,
  type StoreCoordinatorDeps,
  type StoreStatus,
  type StoreErrorInfo,
} from "./coordinator.js";
export {
  StoreStateMachine,
  type StoreState,
  type StateTransitionEvent,
  type StateChangeListener,
} from "./state-machine.js";
export { MutationQueue } from "./mutation-queue.js";
export { ChangeChannel, type ChangeChannelOptions } from "./change-channel.js";
