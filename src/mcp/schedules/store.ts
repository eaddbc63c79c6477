import path from "node:path";
import Database from "better-sqlite3";
import { ScheduleError, StorageError } from "../../errors.js";
import { logger } from "../../logger.js";
import { ensureDir, fileSizeOrZero } from "../../utils/fs.js";
import { parseScheduleType } from "./recurrence.js";
import { systemClock, type Clock, type NewReminder, type Reminder, type ReminderPatch, type StoreStats } from "./types.js";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS schedules (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  agent_id TEXT NOT NULL,
  prompt_text TEXT NOT NULL,
  schedule_type TEXT NOT NULL CHECK (schedule_type IN ('once', 'cron', 'interval')),
  schedule_value TEXT NOT NULL,
  next_run TEXT,
  active INTEGER NOT NULL DEFAULT 1 CHECK (active IN (0, 1)),
  max_repetitions INTEGER CHECK (max_repetitions IS NULL OR max_repetitions > 0),
  repetition_count INTEGER NOT NULL DEFAULT 0 CHECK (repetition_count >= 0),
  last_run TEXT,
  created_at TEXT NOT NULL,
  CHECK (max_repetitions IS NULL OR repetition_count <= max_repetitions)
);
CREATE INDEX IF NOT EXISTS idx_schedules_due ON schedules (next_run, active);
CREATE INDEX IF NOT EXISTS idx_schedules_agent_active ON schedules (agent_id, active);
CREATE INDEX IF NOT EXISTS idx_schedules_created_at ON schedules (created_at);
`;

type ScheduleRow = {
  id: number;
  agent_id: string;
  prompt_text: string;
  schedule_type: string;
  schedule_value: string;
  next_run: string | null;
  active: number;
  max_repetitions: number | null;
  repetition_count: number;
  last_run: string | null;
  created_at: string;
};

type SqlValue = string | number | null;

// Fixed-width UTC text, so the due query can compare strings.
function toDbTime(d: Date | null): string | null {
  return d ? d.toISOString() : null;
}

function fromDbTime(s: string | null): Date | null {
  return s ? new Date(s) : null;
}

function toReminder(row: ScheduleRow): Reminder {
  return {
    id: row.id,
    agentId: row.agent_id,
    message: row.prompt_text,
    scheduleType: parseScheduleType(row.schedule_type),
    scheduleValue: row.schedule_value,
    nextRun: fromDbTime(row.next_run),
    active: row.active === 1,
    maxRepetitions: row.max_repetitions,
    repetitionCount: row.repetition_count,
    lastRun: fromDbTime(row.last_run),
    createdAt: fromDbTime(row.created_at) ?? new Date(0)
  };
}

export type ListOptions = {
  agentId?: string;
  activeOnly?: boolean;
  limit?: number;
};

export class ScheduleStore {
  private readonly clock: Clock;
  readonly file: string;

  constructor(
    private readonly db: Database.Database,
    opts: { clock?: Clock } = {}
  ) {
    this.clock = opts.clock ?? systemClock;
    this.file = db.name;
    this.guard("migrate", () => db.exec(SCHEMA));
  }

  static open(file: string, opts: { clock?: Clock } = {}): ScheduleStore {
    let db: Database.Database;
    try {
      if (file !== ":memory:") ensureDir(path.dirname(file));
      db = new Database(file);
      db.pragma("journal_mode = WAL");
      db.pragma("busy_timeout = 5000");
    } catch (err) {
      throw new StorageError("open", err);
    }
    logger.debug({ file }, "Schedule store opened");
    return new ScheduleStore(db, opts);
  }

  create(fields: NewReminder): number {
    return this.guard("create", () => {
      const info = this.db
        .prepare<Record<string, SqlValue>>(
          `INSERT INTO schedules (agent_id, prompt_text, schedule_type, schedule_value, next_run, active, max_repetitions, repetition_count, created_at)
           VALUES (@agent_id, @prompt_text, @schedule_type, @schedule_value, @next_run, 1, @max_repetitions, 0, @created_at)`
        )
        .run({
          agent_id: fields.agentId,
          prompt_text: fields.message,
          schedule_type: fields.scheduleType,
          schedule_value: fields.scheduleValue,
          next_run: toDbTime(fields.nextRun),
          max_repetitions: fields.maxRepetitions,
          created_at: toDbTime(this.clock())
        });
      return Number(info.lastInsertRowid);
    });
  }

  list(opts: ListOptions = {}): Reminder[] {
    const where: string[] = [];
    const params: SqlValue[] = [];
    if (opts.agentId) {
      where.push("agent_id = ?");
      params.push(opts.agentId);
    }
    if (opts.activeOnly ?? true) where.push("active = 1");
    const limit = opts.limit && opts.limit > 0 ? ` LIMIT ${Math.floor(opts.limit)}` : "";
    const sql =
      `SELECT * FROM schedules${where.length ? ` WHERE ${where.join(" AND ")}` : ""}` +
      ` ORDER BY next_run IS NULL, next_run ASC, id ASC${limit}`;
    return this.guard("list", () => this.db.prepare<SqlValue[], ScheduleRow>(sql).all(...params).map(toReminder));
  }

  get(id: number): Reminder | null {
    return this.guard("get", () => {
      const row = this.db.prepare<[number], ScheduleRow>("SELECT * FROM schedules WHERE id = ?").get(id);
      return row ? toReminder(row) : null;
    });
  }

  update(id: number, patch: ReminderPatch): boolean {
    const sets: string[] = [];
    const params: Record<string, SqlValue> = { id };
    if (patch.nextRun !== undefined) {
      sets.push("next_run = @next_run");
      params.next_run = toDbTime(patch.nextRun);
    }
    if (patch.active !== undefined) {
      sets.push("active = @active");
      params.active = patch.active ? 1 : 0;
    }
    if (patch.repetitionCount !== undefined) {
      sets.push("repetition_count = @repetition_count");
      params.repetition_count = patch.repetitionCount;
    }
    if (patch.lastRun !== undefined) {
      sets.push("last_run = @last_run");
      params.last_run = toDbTime(patch.lastRun);
    }

    return this.guard("update", () => {
      if (!sets.length) {
        return this.db.prepare<[number], { id: number }>("SELECT id FROM schedules WHERE id = ?").get(id) !== undefined;
      }
      const apply = this.db.transaction(() =>
        this.db.prepare<Record<string, SqlValue>>(`UPDATE schedules SET ${sets.join(", ")} WHERE id = @id`).run(params)
      );
      return apply().changes > 0;
    });
  }

  cancel(id: number): boolean {
    return this.update(id, { active: false });
  }

  due(now: Date): Reminder[] {
    return this.guard("due", () =>
      this.db
        .prepare<[string], ScheduleRow>(
          "SELECT * FROM schedules WHERE active = 1 AND next_run IS NOT NULL AND next_run <= ? ORDER BY next_run ASC, id ASC"
        )
        .all(now.toISOString())
        .map(toReminder)
    );
  }

  /** Deletes inactive reminders created more than `olderThanDays` ago. */
  purgeInactive(olderThanDays = 30): number {
    const cutoff = new Date(this.clock().getTime() - olderThanDays * 86_400_000);
    return this.guard("purge", () => {
      const info = this.db.prepare<[string]>("DELETE FROM schedules WHERE active = 0 AND created_at < ?").run(cutoff.toISOString());
      return info.changes;
    });
  }

  stats(): StoreStats {
    return this.guard("stats", () => {
      const row = this.db
        .prepare<[], { total: number; active: number | null; oldest: string | null; newest: string | null }>(
          "SELECT COUNT(*) AS total, SUM(active) AS active, MIN(created_at) AS oldest, MAX(created_at) AS newest FROM schedules"
        )
        .get();
      const total = row?.total ?? 0;
      const active = row?.active ?? 0;
      const size = this.file === ":memory:" ? 0 : fileSizeOrZero(this.file);
      return {
        total_reminders: total,
        active_reminders: active,
        inactive_reminders: total - active,
        oldest_reminder: row?.oldest ?? null,
        newest_reminder: row?.newest ?? null,
        database_file: this.file,
        database_size_bytes: size,
        database_size_mb: Math.round((size / 1024 / 1024) * 100) / 100
      };
    });
  }

  close(): void {
    this.db.close();
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof ScheduleError || err instanceof StorageError) throw err;
      logger.error({ err, operation }, "Schedule store operation failed");
      throw new StorageError(operation, err);
    }
  }
}
