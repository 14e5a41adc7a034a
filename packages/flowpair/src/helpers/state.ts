import type { FlowAction, FlowState } from "../types.js";

export function createInitialState(): FlowState {
  return {
    running: true,
    scene: "menu",
    numPairs: 3,
    endpoints: Object.freeze([]),
    menuFocus: null,
  };
}

export function reduceFlowState(state: FlowState, action: FlowAction): FlowState {
  if (action.type === "quit") return { ...state, running: false };
  if (action.type === "open-menu") return { ...state, scene: "menu" };
  if (action.type === "open-config") return { ...state, scene: "config" };
  if (action.type === "open-run") {
    return { ...state, scene: "run", endpoints: Object.freeze(action.endpoints.slice()) };
  }
  if (action.type === "set-pairs") return { ...state, numPairs: action.numPairs };
  if (action.type === "focus-menu") return { ...state, menuFocus: action.index };
  return state;
}
