export {
  ListenerStateMachine,
  type ListenerState,
  type StateTransitionEvent,
  type StateChangeListener,
} from "./state-machine.js";
