export type GenerationPhase = "idle" | "geocoding" | "fetching" | "rendering" | "ready" | "error";

export interface WorkflowState {
  phase: GenerationPhase;
  detail: string | null;
}

type WorkflowListener = (state: WorkflowState) => void;

const state: WorkflowState = {
  phase: "idle",
  detail: null
};

const listeners = new Set<WorkflowListener>();

function notify() {
  const snapshot = { ...state };
  listeners.forEach((listener) => listener(snapshot));
}

export function getState(): WorkflowState {
  return { ...state };
}

export function setPhase(phase: GenerationPhase, detail: string | null = null) {
  if (state.phase === phase && state.detail === detail) {
    return;
  }
  state.phase = phase;
  state.detail = detail;
  notify();
}

export function isBusy(phase: GenerationPhase = state.phase): boolean {
  return phase === "geocoding" || phase === "fetching" || phase === "rendering";
}

/** Map data is being resolved; the current scene is about to be replaced. */
export function isFetching(phase: GenerationPhase = state.phase): boolean {
  return phase === "geocoding" || phase === "fetching";
}

export function subscribe(listener: WorkflowListener) {
  listeners.add(listener);
  listener({ ...state });
  return () => {
    listeners.delete(listener);
  };
}
