import { describe, it, expect } from "vitest";
import { intentHintForMode, isOrientationQuery, parseIntentReply } from "./intent.js";

describe("parseIntentReply", () => {
  it("reads a JSON object, fenced or not", () => {
    expect(parseIntentReply('```json\n{"intent": "Locate"}\n```')).toBe("location");
    expect(parseIntentReply('{"intent": "prioritization", "confidence": 0.9}')).toBe("prioritization");
  });

  it("accepts a bare intent word with trailing punctuation", () => {
    expect(parseIntentReply("overview.")).toBe("overview");
    expect(parseIntentReply("  `patch` ")).toBe("patch");
  });

  it("returns null for unknown intents", () => {
    expect(parseIntentReply("banana")).toBeNull();
    expect(parseIntentReply('{"intent": "refactor"}')).toBeNull();
  });
});

describe("isOrientationQuery", () => {
  it("recognises questions about the repository as a whole", () => {
    expect(isOrientationQuery("What does this repo do?")).toBe(true);
    expect(isOrientationQuery("Give me a high-level overview")).toBe(true);
    expect(isOrientationQuery("Where is login handled?")).toBe(false);
  });
});

describe("intentHintForMode", () => {
  it("maps answer modes to intents", () => {
    expect(intentHintForMode("locate")).toBe("location");
    expect(intentHintForMode("explain")).toBe("overview");
    expect(intentHintForMode(undefined)).toBeNull();
  });
});
