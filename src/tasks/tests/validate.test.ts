import { describe, expect, it } from "vitest";
import {
  checkTaskDescription,
  checkTaskTitle,
  countCodePoints,
} from "../validate";

describe("checkTaskTitle", () => {
  it("should reject an empty title", () => {
    const result = checkTaskTitle("");
    expect(result.isErr && result.error).toBe("task title cannot be empty");
  });

  it("should reject a title shorter than 3 characters", () => {
    const result = checkTaskTitle("ab");
    expect(result.isErr && result.error).toBe(
      "task title must be at least 3 characters"
    );
  });

  it("should accept the length boundaries 3 and 200", () => {
    expect(checkTaskTitle("abc").isOk).toBe(true);
    expect(checkTaskTitle("a".repeat(200)).isOk).toBe(true);
  });

  it("should reject a title of 201 characters", () => {
    const result = checkTaskTitle("a".repeat(201));
    expect(result.isErr && result.error).toBe(
      "task title cannot be longer than 200 characters"
    );
  });

  it("should count Cyrillic letters as single characters", () => {
    // 200 Cyrillic letters are 400 bytes in UTF-8 but still within the limit
    expect(checkTaskTitle("я".repeat(200)).isOk).toBe(true);
    expect(checkTaskTitle("Купить хлеб").isOk).toBe(true);
  });

  it("should accept digits, whitespace and the allowed punctuation", () => {
    expect(checkTaskTitle("Call Bob, at 5pm - really?! Ok.").isOk).toBe(true);
  });

  it.each(["Pay @ once", "Fix #12", "Use_snake", "Quote 'me'", "Café run"])(
    "should reject unsupported characters in %j",
    (title) => {
      const result = checkTaskTitle(title);
      expect(result.isErr && result.error).toBe(
        "task title contains invalid characters"
      );
    }
  );

  it.each(["abc\u00a0def", "abc\u3000def", "abc\ufeffdef", "abc\u000bdef"])(
    "should reject whitespace outside space, tab, newline, form feed and carriage return in %j",
    (title) => {
      const result = checkTaskTitle(title);
      expect(result.isErr && result.error).toBe(
        "task title contains invalid characters"
      );
    }
  );

  it("should accept tab, newline, form feed and carriage return", () => {
    expect(checkTaskTitle("Plan\tweek\nahead\f\r").isOk).toBe(true);
  });

  it("should check length before characters", () => {
    const result = checkTaskTitle("@@");
    expect(result.isErr && result.error).toBe(
      "task title must be at least 3 characters"
    );
  });
});

describe("checkTaskDescription", () => {
  it("should accept an empty description", () => {
    expect(checkTaskDescription("").isOk).toBe(true);
  });

  it("should accept exactly 5000 characters", () => {
    expect(checkTaskDescription("d".repeat(5000)).isOk).toBe(true);
  });

  it("should reject 5001 characters", () => {
    const result = checkTaskDescription("d".repeat(5001));
    expect(result.isErr && result.error).toBe(
      "task description cannot be longer than 5000 characters"
    );
  });

  it("should allow any characters", () => {
    expect(checkTaskDescription("@#$%^&* <b>markup</b>").isOk).toBe(true);
  });
});

describe("countCodePoints", () => {
  it("should count astral characters once", () => {
    expect(countCodePoints("ok😀")).toBe(3);
    expect("ok😀".length).toBe(4);
  });
});
