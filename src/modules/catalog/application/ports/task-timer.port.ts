export interface ScheduledTask {
  cancel(): void;
}

export interface TaskTimerPort {
  /** Runs `task` once after `delayMs`. */
  schedule(delayMs: number, task: () => void): ScheduledTask;
}
