import { assign, fromPromise, setup } from "xstate";
import type { SyncError } from "../errors";
import { err, type Result } from "../result";

export type CoordinatorPhase = "stopped" | "idle" | "pending" | "syncing";

export interface CoordinatorContext {
  userId: string | null;
  /** A push is owed and has not completed yet. */
  pendingSync: boolean;
  online: boolean;
  /** Consecutive failed passes since the last success or connectivity change. */
  attempt: number;
  /** A sync was requested while a pass was running. */
  rerun: boolean;
}

export type CoordinatorEvent =
  | { type: "START"; userId: string; online: boolean }
  | { type: "STOP" }
  | { type: "CONNECTIVITY_CHANGED"; online: boolean }
  | { type: "SYNC_REQUESTED" };

export interface RetryPolicy {
  baseMs: number;
  maxMs: number;
  /** Failed passes after which retries stop until the next transition or request. */
  maxAttempts: number;
}

export type PushFn = (userId: string) => Promise<Result<number, SyncError>>;

export function retryDelayMs(policy: RetryPolicy, attempt: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.maxMs, policy.baseMs * 2 ** exponent);
}

export const initialCoordinatorContext: CoordinatorContext = {
  userId: null,
  pendingSync: false,
  online: false,
  attempt: 0,
  rerun: false,
};

export function createCoordinatorMachine(push: PushFn, retry: RetryPolicy) {
  return setup({
    types: {
      context: {} as CoordinatorContext,
      events: {} as CoordinatorEvent,
    },
    actors: {
      pushLocal: fromPromise<Result<number, SyncError>, { userId: string | null }>(
        async ({ input }): Promise<Result<number, SyncError>> => {
          if (input.userId === null) {
            return err({ type: "Unknown", message: "No active user." });
          }
          return push(input.userId);
        },
      ),
    },
    guards: {
      canSyncNow: ({ context }) =>
        context.online && context.userId !== null && context.attempt === 0,
      canRetry: ({ context }) =>
        context.online &&
        context.userId !== null &&
        context.attempt > 0 &&
        context.attempt < retry.maxAttempts,
      needsFollowUp: ({ context }) => context.rerun || context.pendingSync,
    },
    delays: {
      retryDelay: ({ context }) => retryDelayMs(retry, context.attempt),
    },
  }).createMachine({
    id: "offlineCoordinator",
    initial: "stopped",
    context: initialCoordinatorContext,
    on: {
      STOP: {
        target: ".stopped",
        actions: assign({ ...initialCoordinatorContext }),
      },
    },
    states: {
      stopped: {
        on: {
          START: {
            target: "pending",
            actions: assign(({ event }) => ({
              userId: event.userId,
              online: event.online,
              pendingSync: true,
              attempt: 0,
              rerun: false,
            })),
          },
        },
      },
      idle: {
        on: {
          SYNC_REQUESTED: {
            target: "pending",
            actions: assign({ attempt: 0 }),
          },
          CONNECTIVITY_CHANGED: [
            {
              guard: ({ event }) => !event.online,
              target: "pending",
              actions: assign({ online: false, attempt: 0 }),
            },
            {
              actions: assign({ online: true }),
            },
          ],
        },
      },
      pending: {
        entry: assign({ pendingSync: true }),
        always: {
          guard: "canSyncNow",
          target: "syncing",
        },
        after: {
          retryDelay: {
            guard: "canRetry",
            target: "syncing",
          },
        },
        on: {
          SYNC_REQUESTED: {
            actions: assign({ attempt: 0 }),
          },
          CONNECTIVITY_CHANGED: {
            actions: assign(({ event }) => ({
              online: event.online,
              attempt: 0,
            })),
          },
        },
      },
      syncing: {
        entry: assign({ pendingSync: false, rerun: false }),
        invoke: {
          src: "pushLocal",
          input: ({ context }) => ({ userId: context.userId }),
          onDone: [
            {
              guard: ({ event }) => !event.output.ok,
              target: "pending",
              actions: assign(({ context }) => ({
                attempt: context.attempt + 1,
              })),
            },
            {
              guard: "needsFollowUp",
              target: "pending",
              actions: assign({ attempt: 0 }),
            },
            {
              target: "idle",
              actions: assign({ attempt: 0 }),
            },
          ],
          onError: {
            target: "pending",
            actions: assign(({ context }) => ({
              attempt: context.attempt + 1,
            })),
          },
        },
        on: {
          SYNC_REQUESTED: {
            actions: assign({ rerun: true }),
          },
          CONNECTIVITY_CHANGED: {
            actions: assign(({ context, event }) => ({
              online: event.online,
              pendingSync: context.pendingSync || !event.online,
            })),
          },
        },
      },
    },
  });
}
