import { setup, assign } from "xstate";

export type FeedState = "DISCONNECTED" | "CONNECTING" | "CONNECTED" | "DEGRADED";

interface FeedContext {
  /** Consecutive failed connection attempts since the last successful open. */
  failedAttempts: number;
  maxAttempts: number;
  urlIndex: number;
  urlCount: number;
}

type FeedEvent =
  | { type: "CONNECT" }
  | { type: "OPENED" }
  | { type: "FAILED" }
  | { type: "DISCONNECT" }
  | { type: "RESET" };

export interface FeedInput {
  maxAttempts: number;
  urlCount: number;
}

/**
 * Connection lifecycle of the market-data socket. The feed performs the I/O;
 * this machine decides which URL comes next and when to give up.
 */
export const feedMachine = setup({
  types: {
    context: {} as FeedContext,
    events: {} as FeedEvent,
    input: {} as FeedInput,
  },
  guards: {
    attemptsExhausted: ({ context }) => context.failedAttempts + 1 >= context.maxAttempts,
  },
  actions: {
    countFailure: assign({
      failedAttempts: ({ context }) => context.failedAttempts + 1,
    }),
    rotateUrl: assign({
      urlIndex: ({ context }) => (context.urlIndex + 1) % context.urlCount,
    }),
    resetAttempts: assign({
      failedAttempts: 0,
    }),
  },
}).createMachine({
  id: "feed",
  initial: "DISCONNECTED",
  context: ({ input }) => ({
    failedAttempts: 0,
    maxAttempts: input.maxAttempts,
    urlIndex: 0,
    urlCount: Math.max(1, input.urlCount),
  }),
  states: {
    DISCONNECTED: {
      on: {
        CONNECT: { target: "CONNECTING", actions: "resetAttempts" },
      },
    },
    CONNECTING: {
      on: {
        OPENED: { target: "CONNECTED", actions: "resetAttempts" },
        FAILED: [
          { guard: "attemptsExhausted", target: "DEGRADED", actions: "countFailure" },
          { actions: ["countFailure", "rotateUrl"] },
        ],
        DISCONNECT: { target: "DISCONNECTED" },
      },
    },
    CONNECTED: {
      on: {
        // a dropped session is not a failed attempt
        FAILED: { target: "CONNECTING", actions: "rotateUrl" },
        DISCONNECT: { target: "DISCONNECTED" },
      },
    },
    DEGRADED: {
      on: {
        RESET: { target: "CONNECTING", actions: ["resetAttempts", "rotateUrl"] },
        DISCONNECT: { target: "DISCONNECTED" },
      },
    },
  },
});
