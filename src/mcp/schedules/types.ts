export const SCHEDULE_TYPES = ["once", "cron", "interval"] as const;

export type ScheduleType = (typeof SCHEDULE_TYPES)[number];

export type ScheduleSpec =
  | { kind: "once" }
  | { kind: "cron"; expression: string }
  | { kind: "interval"; every: string };

export type Reminder = {
  id: number;
  agentId: string;
  message: string;
  scheduleType: ScheduleType;
  scheduleValue: string;
  nextRun: Date | null;
  active: boolean;
  maxRepetitions: number | null;
  repetitionCount: number;
  lastRun: Date | null;
  createdAt: Date;
};

export type NewReminder = Pick<Reminder, "agentId" | "message" | "scheduleType" | "scheduleValue" | "nextRun" | "maxRepetitions">;

/** Fields the executor and cancellation are allowed to touch. */
export type ReminderPatch = Partial<Pick<Reminder, "nextRun" | "active" | "repetitionCount" | "lastRun">>;

export type DeliveredOutcome = {
  id: number;
  agent_id: string;
  delivered: true;
  next_run: string | null;
  repetition_count: number;
  max_repetitions: number | null;
  completed: boolean;
};

export type FailedOutcome = {
  id: number;
  agent_id: string;
  delivered: false;
  error: string;
  next_run: string | null;
};

export type ExecutionOutcome = DeliveredOutcome | FailedOutcome;

export type ScheduleView = {
  id: number;
  agent_id: string;
  prompt_text: string;
  schedule_type: ScheduleType;
  schedule_value: string;
  next_run: string | null;
  active: boolean;
  created_at: string;
  last_run: string | null;
  max_repetitions: number | null;
  repetition_count: number;
};

export type StoreStats = {
  total_reminders: number;
  active_reminders: number;
  inactive_reminders: number;
  oldest_reminder: string | null;
  newest_reminder: string | null;
  database_file: string;
  database_size_bytes: number;
  database_size_mb: number;
};

export interface PromptDelivery {
  deliver(agentId: string, text: string): Promise<boolean>;
}

export interface AgentDirectory {
  agentExists(agentId: string): Promise<boolean>;
}

export type AgentSummary = {
  id: string;
  name: string;
  created_at: string | null;
  last_updated: string | null;
};

export type ConnectionCheck =
  | { status: "success"; message: string; agent_count: number }
  | { status: "error"; message: string };

export interface AgentCatalog extends AgentDirectory {
  listAgents(): Promise<AgentSummary[]>;
  testConnection(): Promise<ConnectionCheck>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export function toScheduleView(r: Reminder): ScheduleView {
  return {
    id: r.id,
    agent_id: r.agentId,
    prompt_text: r.message,
    schedule_type: r.scheduleType,
    schedule_value: r.scheduleValue,
    next_run: r.nextRun ? r.nextRun.toISOString() : null,
    active: r.active,
    created_at: r.createdAt.toISOString(),
    last_run: r.lastRun ? r.lastRun.toISOString() : null,
    max_repetitions: r.maxRepetitions,
    repetition_count: r.repetitionCount
  };
}
