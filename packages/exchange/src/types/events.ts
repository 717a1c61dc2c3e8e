import { z } from "zod";

export const EventType = [
  "cycle_completed",
  "signal_generated",
  "evaluation_failed",
  "risk_check_failed",
  "risk_advisory",
  "order_placed",
  "order_filled",
  "order_cancelled",
  "order_rejected",
  "position_opened",
  "position_transition",
  "position_closed",
  "close_failed",
  "instance_started",
  "instance_stopped",
  "instance_restarted",
  "instance_disabled",
  "feed_degraded",
  "daemon_started",
  "daemon_stopped",
  "error",
] as const;

export type EventType = (typeof EventType)[number];

export const EngineEventSchema = z.object({
  type: z.enum(EventType),
  timestamp: z.string(),
  data: z.record(z.unknown()),
});

export type EngineEvent = z.infer<typeof EngineEventSchema>;
