export interface SchedulerStatus {
  taskName: string;
  lastRunAt: Date | null;
  lastResult: 'success' | 'error' | 'pending' | 'disabled';
  lastError?: string;
  intervalMs: number;
  nextRunAt: Date | null;
  runCount: number;
  lastDurationMs: number | null;
  isEnabled: boolean;
}

export class SchedulerTracker {
  private schedulers: Map<string, SchedulerStatus> = new Map();

  constructor(private readonly now: () => Date = () => new Date()) {}

  registerScheduler(name: string, intervalMs: number): void {
    this.schedulers.set(name, {
      taskName: name,
      lastRunAt: null,
      lastResult: 'pending',
      intervalMs,
      nextRunAt: new Date(this.now().getTime() + intervalMs),
      runCount: 0,
      lastDurationMs: null,
      isEnabled: true,
    });
  }

  recordRun(name: string, success: boolean, error?: string, durationMs?: number): void {
    const now = this.now();
    const existing = this.schedulers.get(name);
    if (!existing) {
      this.schedulers.set(name, {
        taskName: name,
        lastRunAt: now,
        lastResult: success ? 'success' : 'error',
        lastError: error,
        intervalMs: 0,
        nextRunAt: null,
        runCount: 1,
        lastDurationMs: durationMs ?? null,
        isEnabled: true,
      });
      return;
    }

    existing.lastRunAt = now;
    existing.lastResult = success ? 'success' : 'error';
    existing.lastError = error;
    existing.runCount += 1;
    existing.lastDurationMs = durationMs ?? null;
    if (existing.intervalMs > 0) {
      existing.nextRunAt = new Date(now.getTime() + existing.intervalMs);
    }
  }

  recordSkipped(name: string): void {
    const existing = this.schedulers.get(name);
    if (existing) {
      existing.lastResult = 'disabled';
      existing.isEnabled = false;
    }
  }

  getSchedulerStatuses(): SchedulerStatus[] {
    return Array.from(this.schedulers.values()).sort((a, b) => a.taskName.localeCompare(b.taskName));
  }
}

export const schedulerTracker = new SchedulerTracker();
