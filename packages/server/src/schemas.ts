/**
 * Zod schemas for tool arguments
 *
 * Shapes only: token, date, estimate and priority semantics are checked by
 * the adapter so the CLI and the tools report the same messages.
 */

import { z } from "zod";

const TitleSchema = z.string();

const TaskIdSchema = z.string().trim().min(1, "must not be empty");

const DaySchema = z.string();

// Priority arrives as a number or a numeric string depending on the client
export const PrioritySchema = z.union([z.number(), z.string()]);

const OptionalFields = {
  parentId: z.string().optional(),
  dueDate: z.string().optional(),
  priority: PrioritySchema.optional(),
};

export const ListTasksInputSchema = z.object({});

export const CreateTaskInputSchema = z.object({
  title: TitleSchema,
  ...OptionalFields,
  timeEstimate: z.string().optional(),
});

export const CreateContainerInputSchema = z.object({
  title: TitleSchema,
  ...OptionalFields,
});

export const UpdateTaskInputSchema = z.object({
  taskId: TaskIdSchema,
  title: z.string().optional(),
  ...OptionalFields,
  timeEstimate: z.string().optional(),
});

export const ScheduleTaskInputSchema = z.object({
  taskId: TaskIdSchema,
  day: DaySchema,
});

export const GetDayTasksInputSchema = z.object({
  day: DaySchema,
});

export type CreateTaskInput = z.infer<typeof CreateTaskInputSchema>;
export type CreateContainerInput = z.infer<typeof CreateContainerInputSchema>;
export type UpdateTaskInput = z.infer<typeof UpdateTaskInputSchema>;
export type ScheduleTaskInput = z.infer<typeof ScheduleTaskInputSchema>;
export type GetDayTasksInput = z.infer<typeof GetDayTasksInputSchema>;

/**
 * One line per issue, `path: message`
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join(", ");
}
