// src/core/task/types.ts

export type TaskID = string | number;

export interface TaskHandle {
  indexName: string;
  taskID: TaskID;
}

export type TaskStatus = 'published' | 'notPublished';

export interface TaskPollerOptions {
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
}
