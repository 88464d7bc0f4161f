export const STATUSES = ["pending", "in_progress", "completed", "cancelled"] as const;
export type Status = (typeof STATUSES)[number];

export const PRIORITIES = ["low", "medium", "high"] as const;
export type Priority = (typeof PRIORITIES)[number];

export const DEFAULT_STATUS: Status = "pending";
export const DEFAULT_PRIORITY: Priority = "medium";

export interface Task {
  id: number;
  title: string;
  description: string | null;
  status: Status;
  priority: Priority;
  due_date: string | null;
  assigned_to: string | null;
  created_at: string;
  updated_at: string | null;
}

export interface CreateTaskInput {
  title: string;
  description?: string | null;
  priority?: Priority;
  due_date?: string | null;
  assigned_to?: string | null;
}

/** Fields left undefined are not touched; null clears a nullable column. */
export interface UpdateTaskInput {
  title?: string;
  description?: string | null;
  status?: Status;
  priority?: Priority;
  due_date?: string | null;
  assigned_to?: string | null;
}

export interface ListFilters {
  status?: Status;
  priority?: Priority;
  limit?: number;
  offset?: number;
}

export interface TaskPage {
  tasks: Task[];
  total: number;
  skip: number;
  limit: number;
}
