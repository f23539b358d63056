import { WmError } from "../errors.js";
import type { Lock } from "./lock.js";
import type { Task } from "./task.js";

/** FIFO of tasks; every access happens inside the owning lock. */
export class TaskQueue {
  private readonly lock: Lock;
  private tasks: Task[] = [];

  constructor(lock: Lock) {
    this.lock = lock;
  }

  addTask(task: Task): void {
    this.lock.withLock(() => {
      this.tasks.push(task);
    });
  }

  hasTasks(): boolean {
    return this.lock.withLock(() => this.tasks.length > 0);
  }

  get size(): number {
    return this.lock.withLock(() => this.tasks.length);
  }

  getNextTask(): Task {
    return this.lock.withLock(() => {
      const next = this.tasks.shift();
      if (!next) throw new WmError("WM_INVALID_STATE", "getNextTask on an empty queue");
      return next;
    });
  }

  /** Take the next task, or null when empty, in one critical section. */
  takeNext(): Task | null {
    return this.lock.withLock(() => this.tasks.shift() ?? null);
  }

  clear(): void {
    this.lock.withLock(() => {
      this.tasks = [];
    });
  }
}
