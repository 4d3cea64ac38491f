export interface SchedulerStats {
  running: boolean;
  concurrency: number;
  inFlight: number;
  dispatched: number;
  completed: number;
  retried: number;
  poisoned: number;
  skipped: number;
}
