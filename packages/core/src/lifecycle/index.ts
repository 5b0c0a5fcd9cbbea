export {
  StateMachine,
  WATCHER_TRANSITIONS,
  createWatcherStateMachine,
  type TransitionTable,
  type WatcherState,
  type StateTransitionEvent,
  type StateChangeListener,
} from "./state-machine.js";
