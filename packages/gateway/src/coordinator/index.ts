export { useTaskCoordinator } from './coordinator.ts'
export { deliver, type DeliveryCallbacks } from './deliver.ts'
export {
  DispatchHaltedError,
  type DispatchContext,
  type DispatchHandle,
  type DispatchStatus,
  type TaskCoordinator,
  type TaskCoordinatorOptions,
  type Work,
} from './types.ts'
