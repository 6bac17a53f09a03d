import { Injectable } from '@nestjs/common';
import type { ScheduledTask, TaskTimerPort } from '@/modules/catalog/application/ports/task-timer.port';

@Injectable()
export class NodeTaskTimer implements TaskTimerPort {
  schedule(delayMs: number, task: () => void): ScheduledTask {
    const handle = setTimeout(task, delayMs);
    // A pending refresh must not keep the process alive on shutdown.
    handle.unref();

    return {
      cancel: () => clearTimeout(handle),
    };
  }
}
