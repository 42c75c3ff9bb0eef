import type { Clock } from "./types";

/**
 * Issues task IDs derived from the clock in milliseconds. IDs never repeat
 * within one generator: if the clock has not moved past the last ID, the
 * next one is last + 1.
 */
export function createIdGenerator(now: Clock = () => new Date()) {
  let lastId = -1;

  return (): number => {
    const candidate = now().getTime();
    lastId = candidate > lastId ? candidate : lastId + 1;
    return lastId;
  };
}
