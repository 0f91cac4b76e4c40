import { createActor } from "xstate";
import type { SyncError } from "../domain/errors";
import type { Result } from "../domain/result";
import type { Connectivity } from "../domain/runtime/connectivity";
import {
  createCoordinatorMachine,
  type CoordinatorContext,
  type CoordinatorPhase,
  type PushFn,
  type RetryPolicy,
} from "../domain/sync/coordinatorMachine";
import {
  DEFAULT_RETRY_BASE_MS,
  DEFAULT_RETRY_MAX_ATTEMPTS,
  DEFAULT_RETRY_MAX_MS,
} from "../utils/constants";
import { formatSyncError } from "../utils/syncError";

export interface CoordinatorState extends CoordinatorContext {
  phase: CoordinatorPhase;
}

export type CoordinatorListener = (state: CoordinatorState) => void;

export interface OfflineCoordinator {
  /** Pushes now when online, otherwise marks a push as owed. */
  startSync(userId: string): void;
  /** Coalesced: a request during a running pass schedules one follow-up. */
  requestSync(): void;
  /** Resolves once any running pass has settled. Idempotent. */
  stopSync(): Promise<void>;
  getState(): CoordinatorState;
  onStateChange(listener: CoordinatorListener): () => void;
}

export interface OfflineCoordinatorOptions {
  engine: { pushLocal: PushFn };
  connectivity: Connectivity;
  retry?: Partial<RetryPolicy>;
}

const PHASES: readonly CoordinatorPhase[] = [
  "stopped",
  "idle",
  "pending",
  "syncing",
];

export function createOfflineCoordinator({
  engine,
  connectivity,
  retry,
}: OfflineCoordinatorOptions): OfflineCoordinator {
  const policy: RetryPolicy = {
    baseMs: retry?.baseMs ?? DEFAULT_RETRY_BASE_MS,
    maxMs: retry?.maxMs ?? DEFAULT_RETRY_MAX_MS,
    maxAttempts: retry?.maxAttempts ?? DEFAULT_RETRY_MAX_ATTEMPTS,
  };
  let inFlight: Promise<Result<number, SyncError>> | null = null;
  let unsubscribeConnectivity: (() => void) | null = null;

  const runPush: PushFn = async (userId) => {
    const pass = engine.pushLocal(userId);
    inFlight = pass;
    try {
      const result = await pass;
      if (!result.ok) {
        console.warn(`Sync: ${formatSyncError(result.error)}:`, result.error.message);
      }
      return result;
    } finally {
      if (inFlight === pass) inFlight = null;
    }
  };

  const actor = createActor(createCoordinatorMachine(runPush, policy));
  actor.start();

  const getState = (): CoordinatorState => {
    const snapshot = actor.getSnapshot();
    const phase = PHASES.find((name) => snapshot.matches(name)) ?? "stopped";
    return { phase, ...snapshot.context };
  };

  const detachConnectivity = () => {
    unsubscribeConnectivity?.();
    unsubscribeConnectivity = null;
  };

  return {
    startSync(userId) {
      const current = getState();
      if (current.phase !== "stopped") {
        if (current.userId === userId) {
          actor.send({ type: "SYNC_REQUESTED" });
          return;
        }
        actor.send({ type: "STOP" });
      }
      detachConnectivity();
      unsubscribeConnectivity = connectivity.subscribe((online) => {
        actor.send({ type: "CONNECTIVITY_CHANGED", online });
      });
      actor.send({ type: "START", userId, online: connectivity.isOnline() });
    },

    requestSync() {
      actor.send({ type: "SYNC_REQUESTED" });
    },

    async stopSync() {
      detachConnectivity();
      actor.send({ type: "STOP" });
      const running = inFlight;
      if (!running) return;
      try {
        await running;
      } catch (error) {
        console.error("Sync: pass failed while stopping:", error);
      }
    },

    getState,

    onStateChange(listener) {
      const subscription = actor.subscribe(() => listener(getState()));
      return () => subscription.unsubscribe();
    },
  };
}
