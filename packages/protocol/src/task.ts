import { z } from 'zod';
import { parseWith, type PayloadParseResult } from './payload.js';

export const TASK_TITLE_MAX_LENGTH = 200;
export const TASK_DESCRIPTION_MAX_LENGTH = 1000;

/** A task as it crosses the wire. Timestamps are ISO 8601 strings. */
export interface Task {
  id: string;
  /** Identity that created the task; never changes afterwards */
  ownerId: string;
  title: string;
  description: string | null;
  completed: boolean;
  createdAt: string;
  updatedAt: string;
}

/** Request body for creating a new task */
export interface CreateTaskRequest {
  title: string;
  description?: string | null;
}

/** Request body for updating an existing task; absent keys stay unchanged */
export interface UpdateTaskRequest {
  title?: string;
  description?: string | null;
  completed?: boolean;
}

/** Response for task list endpoint */
export interface TaskListResponse {
  tasks: Task[];
  total: number;
}

export interface TaskListQuery {
  completed?: boolean;
}

const titleSchema = z
  .string({ invalid_type_error: 'must be a string', required_error: 'is required' })
  .trim()
  .min(1, 'must not be empty')
  .max(TASK_TITLE_MAX_LENGTH, `must be at most ${TASK_TITLE_MAX_LENGTH} characters`);

// Blank descriptions are stored as null.
const descriptionSchema = z
  .string({ invalid_type_error: 'must be a string' })
  .trim()
  .max(TASK_DESCRIPTION_MAX_LENGTH, `must be at most ${TASK_DESCRIPTION_MAX_LENGTH} characters`)
  .nullable()
  .transform((value) => (value ? value : null));

export const createTaskRequestSchema = z
  .object({
    title: titleSchema,
    description: descriptionSchema.optional(),
  })
  .strict();

export const updateTaskRequestSchema = z
  .object({
    title: titleSchema.optional(),
    description: descriptionSchema.optional(),
    completed: z.boolean({ invalid_type_error: 'must be a boolean' }).optional(),
  })
  .strict();

const booleanQueryValue = z.enum(['true', 'false'], {
  errorMap: () => ({ message: 'must be "true" or "false"' }),
});

const statusQueryValue = z.enum(['pending', 'completed'], {
  errorMap: () => ({ message: 'must be "pending" or "completed"' }),
});

/**
 * Query string of the list endpoint. `completed=true|false` is the primary
 * filter; `status=pending|completed` is accepted as an alias. Both may be
 * given only when they agree.
 */
export const taskListQuerySchema = z
  .object({
    completed: booleanQueryValue.optional(),
    status: statusQueryValue.optional(),
  })
  .passthrough()
  .superRefine((query, ctx) => {
    if (query.completed !== undefined && query.status !== undefined) {
      const fromStatus = query.status === 'completed';
      if ((query.completed === 'true') !== fromStatus) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['status'],
          message: 'conflicts with completed',
        });
      }
    }
  })
  .transform((query): TaskListQuery => {
    if (query.completed !== undefined) {
      return { completed: query.completed === 'true' };
    }
    if (query.status !== undefined) {
      return { completed: query.status === 'completed' };
    }
    return {};
  });

export const parseCreateTaskRequest = (raw: unknown): PayloadParseResult<CreateTaskRequest> =>
  parseWith(createTaskRequestSchema, raw);

export const parseUpdateTaskRequest = (raw: unknown): PayloadParseResult<UpdateTaskRequest> =>
  parseWith(updateTaskRequestSchema, raw);

export const parseTaskListQuery = (raw: unknown): PayloadParseResult<TaskListQuery> =>
  parseWith(taskListQuerySchema, raw ?? {});
