import z from "zod";
import { Err, Ok, type Result } from "@/utils/result";

export const MIN_TASK_TITLE_LENGTH = 3;
export const MAX_TASK_TITLE_LENGTH = 200;
export const MAX_TASK_DESCRIPTION_LENGTH = 5000;

// Latin and Cyrillic letters, digits, ASCII space, tab, newline, form feed,
// carriage return and . , ! ? -
const TASK_TITLE_PATTERN = /^[A-Za-z0-9А-Яа-я \t\n\f\r.,!?-]+$/;

/** Length in Unicode code points, not UTF-16 units */
export const countCodePoints = (value: string) => [...value].length;

const taskTitleSchema = z.string().superRefine((title, ctx) => {
  if (title === "") {
    ctx.addIssue({ code: "custom", message: "task title cannot be empty" });
    return;
  }

  const length = countCodePoints(title);
  if (length < MIN_TASK_TITLE_LENGTH) {
    ctx.addIssue({
      code: "custom",
      message: `task title must be at least ${MIN_TASK_TITLE_LENGTH} characters`,
    });
    return;
  }

  if (length > MAX_TASK_TITLE_LENGTH) {
    ctx.addIssue({
      code: "custom",
      message: `task title cannot be longer than ${MAX_TASK_TITLE_LENGTH} characters`,
    });
    return;
  }

  if (!TASK_TITLE_PATTERN.test(title)) {
    ctx.addIssue({
      code: "custom",
      message: "task title contains invalid characters",
    });
  }
});

const taskDescriptionSchema = z.string().superRefine((description, ctx) => {
  if (countCodePoints(description) > MAX_TASK_DESCRIPTION_LENGTH) {
    ctx.addIssue({
      code: "custom",
      message: `task description cannot be longer than ${MAX_TASK_DESCRIPTION_LENGTH} characters`,
    });
  }
});

const firstIssue = (error: z.ZodError) =>
  error.issues[0]?.message ?? "invalid value";

/** Returns the title unchanged, or the first rule it breaks */
export function checkTaskTitle(title: string): Result<string, string> {
  const parsed = taskTitleSchema.safeParse(title);
  return parsed.success ? Ok(parsed.data) : Err(firstIssue(parsed.error));
}

/** Returns the description unchanged, or why it was rejected. Empty is allowed. */
export function checkTaskDescription(
  description: string
): Result<string, string> {
  const parsed = taskDescriptionSchema.safeParse(description);
  return parsed.success ? Ok(parsed.data) : Err(firstIssue(parsed.error));
}
