// Constants, helpers and Zod schemas for everything the HTTP layer accepts.
// Each route parses its input through one of these before touching the DB.

import { z } from "zod";
import { STATUSES, PRIORITIES } from "./tasks/types.js";
import type { CreateTaskInput, UpdateTaskInput, Status, Priority } from "./tasks/types.js";
import { ValidationError, type ValidationIssue } from "./errors.js";

const DUE_DATE_REGEX =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,6})?)?(Z|[+-](\d{2}):(\d{2}))?)?$/;

export const MAX_TITLE_LENGTH = 200;
export const MAX_DESCRIPTION_LENGTH = 1000;
export const MAX_ASSIGNEE_LENGTH = 100;

/** Length in characters (code points), the way SQLite's length() counts TEXT. */
function charLength(value: string): number {
  return [...value].length;
}

export function sanitizeTitle(title: string): string {
  return title.replace(/[\r\n]+/g, " ").trim();
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parses a due date into a UTC ISO string. Date-only values are read as UTC
 * midnight; date-times without an offset as local time, like `Date.parse`.
 * Fields out of range (Feb 30, hour 24) are rejected rather than rolled over.
 */
export function normalizeDueDate(value: string): string | null {
  const match = DUE_DATE_REGEX.exec(value);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour = "0", minute = "0", second = "0", , offH = "0", offM = "0"] =
    match;
  const y = Number(year);
  const m = Number(month);
  if (m < 1 || m > 12 || Number(day) < 1 || Number(day) > daysInMonth(y, m)) {
    return null;
  }
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
    return null;
  }
  if (Number(offH) > 23 || Number(offM) > 59) {
    return null;
  }
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    return null;
  }
  return new Date(ms).toISOString();
}

const StatusEnum = z.enum(STATUSES);
const PriorityEnum = z.enum(PRIORITIES);

const titleSchema = z
  .string({ required_error: "Title is required.", invalid_type_error: "Title must be a string." })
  .transform(sanitizeTitle)
  .pipe(
    z
      .string()
      .min(1, "Title cannot be empty or whitespace only.")
      .refine(
        (v) => charLength(v) <= MAX_TITLE_LENGTH,
        `Title exceeds maximum length of ${MAX_TITLE_LENGTH} characters.`,
      ),
  );

const descriptionSchema = z
  .string()
  .refine(
    (v) => charLength(v) <= MAX_DESCRIPTION_LENGTH,
    `Description exceeds maximum length of ${MAX_DESCRIPTION_LENGTH} characters.`,
  )
  .nullable()
  .optional();

const assignedToSchema = z
  .string()
  .refine(
    (v) => charLength(v) <= MAX_ASSIGNEE_LENGTH,
    `assigned_to exceeds maximum length of ${MAX_ASSIGNEE_LENGTH} characters.`,
  )
  .nullable()
  .optional();

const dueDateSchema = z
  .string()
  .transform((value, ctx) => {
    const normalized = normalizeDueDate(value);
    if (normalized === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "Invalid date format. Expected YYYY-MM-DD or an ISO 8601 date-time " +
          "such as YYYY-MM-DDTHH:MM:SSZ.",
      });
      return z.NEVER;
    }
    if (Date.parse(normalized) <= Date.now()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Due date must be in the future." });
      return z.NEVER;
    }
    return normalized;
  })
  .nullable()
  .optional();

// Unknown keys are stripped, so `status` never reaches a new task.
const taskCreateSchema = z.object({
  title: titleSchema,
  description: descriptionSchema,
  priority: PriorityEnum.optional(),
  due_date: dueDateSchema,
  assigned_to: assignedToSchema,
});

const taskUpdateSchema = z.object({
  title: titleSchema.optional(),
  description: descriptionSchema,
  status: StatusEnum.optional(),
  priority: PriorityEnum.optional(),
  due_date: dueDateSchema,
  assigned_to: assignedToSchema,
});

export interface PageLimits {
  defaultLimit: number;
  maxLimit: number;
}

export function pageSchema({ defaultLimit, maxLimit }: PageLimits) {
  return z.object({
    skip: z.coerce
      .number()
      .int("skip must be an integer.")
      .min(0, "skip must be >= 0.")
      .max(Number.MAX_SAFE_INTEGER, "skip is too large.")
      .default(0),
    limit: z.coerce
      .number()
      .int("limit must be an integer.")
      .min(1, "limit must be >= 1.")
      .max(maxLimit, `limit must be <= ${maxLimit}.`)
      .default(defaultLimit),
  });
}

export function listQuerySchema(limits: PageLimits) {
  return pageSchema(limits).extend({
    status: StatusEnum.optional(),
    priority: PriorityEnum.optional(),
  });
}

const taskIdSchema = z
  .string()
  .regex(/^-?\d+$/, "Task id must be an integer.")
  .transform((raw, ctx) => {
    const id = Number(raw);
    if (!Number.isSafeInteger(id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Task id is too large." });
      return z.NEVER;
    }
    return id;
  });

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "body",
    message: issue.message,
  }));
}

/** Parses `data` or throws a ValidationError whose fields are prefixed with `scope`. */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  scope?: string,
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = toIssues(result.error);
    throw new ValidationError(
      scope
        ? issues.map((i) => ({ ...i, field: i.field === "body" ? scope : `${scope}.${i.field}` }))
        : issues,
    );
  }
  return result.data;
}

export function parseCreateInput(body: unknown): CreateTaskInput {
  return parseOrThrow(taskCreateSchema, body);
}

export function parseUpdateInput(body: unknown): UpdateTaskInput {
  return parseOrThrow(taskUpdateSchema, body);
}

export function parseTaskId(raw: string): number {
  return parseOrThrow(taskIdSchema, raw, "id");
}

export function parseStatus(raw: string): Status {
  return parseOrThrow(StatusEnum, raw, "status");
}

export function parsePriority(raw: string): Priority {
  return parseOrThrow(PriorityEnum, raw, "priority");
}
