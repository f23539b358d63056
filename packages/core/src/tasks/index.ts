export { Lock } from "./lock.js";
export { Task, type TaskArgs } from "./task.js";
export { TaskQueue } from "./taskQueue.js";
