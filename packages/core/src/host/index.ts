export { Host, type HostOptions, type ServerOwner } from "./host.js";
export { TaskGroup, type InflightTasks } from "./task-group.js";
export {
  installSignalHandlers,
  type SignalHandlerOptions,
  type SignalSource,
} from "./signals.js";
