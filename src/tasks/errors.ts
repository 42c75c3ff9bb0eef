export const TASK_NOT_FOUND = "task not found";
export const INVALID_TASK_ID = "invalid task ID";

/** Prefix for every title/description rule violation */
export const validationMessage = (detail: string) =>
  `validation error: ${detail}`;
