import * as p from "@clack/prompts";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  candidateOption,
  createPickerDisplay,
  createPreviewDisplay,
  interpretKey,
  QUIT,
  renderPicker,
  type ChooseCandidate,
} from "./display.js";

vi.mock("@clack/prompts", () => ({
  note: vi.fn(),
  select: vi.fn(),
  isCancel: vi.fn(() => false),
}));

function createTestNotifier() {
  return {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    cancel: vi.fn(),
    debug: vi.fn(),
  };
}

beforeEach(() => {
  vi.mocked(p.note).mockClear();
});

describe("candidateOption", () => {
  it("labels a candidate by its subject and counts the body lines", () => {
    const option = candidateOption("feat: X\nDetails here\nMore", 0);

    expect(option.value).toBe(0);
    expect(option.label).toContain("1. ");
    expect(option.label).toContain("feat: X");
    expect(option.hint).toBe("(+2 lines)");
  });

  it("has no hint for a subject-only candidate", () => {
    expect(candidateOption("fix: y", 2).hint).toBeUndefined();
  });
});

describe("interpretKey", () => {
  const key = (...bytes: number[]) => Uint8Array.from(bytes);

  it("moves the highlight with the arrow keys, wrapping at both ends", () => {
    expect(interpretKey(key(0x1b, 0x5b, 0x42), 0, 3, 2)).toEqual({ kind: "move", index: 1 });
    expect(interpretKey(key(0x1b, 0x5b, 0x42), 2, 3, 2)).toEqual({ kind: "move", index: 0 });
    expect(interpretKey(key(0x1b, 0x5b, 0x41), 0, 3, 2)).toEqual({ kind: "move", index: 2 });
  });

  it("chooses the highlighted row on Enter", () => {
    expect(interpretKey(key(0x0d), 1, 3, 2)).toEqual({ kind: "choose", value: 1 });
  });

  it("quits on q and Ctrl+C", () => {
    expect(interpretKey(key(0x71), 0, 3, 2)).toEqual({ kind: "choose", value: QUIT });
    expect(interpretKey(key(0x03), 0, 3, 2)).toEqual({ kind: "choose", value: QUIT });
  });

  it("maps number shortcuts to rows up to the shortcut count", () => {
    expect(interpretKey(key(0x31), 1, 3, 2)).toEqual({ kind: "choose", value: 0 });
    expect(interpretKey(key(0x32), 0, 3, 2)).toEqual({ kind: "choose", value: 1 });
    expect(interpretKey(key(0x33), 0, 3, 2)).toEqual({ kind: "ignore" });
    expect(interpretKey(key(0x30), 0, 3, 2)).toEqual({ kind: "ignore" });
  });

  it("ignores other keys", () => {
    expect(interpretKey(key(0x78), 0, 3, 2)).toEqual({ kind: "ignore" });
    expect(interpretKey(key(0x1b, 0x5b, 0x43), 0, 3, 2)).toEqual({ kind: "ignore" });
  });
});

describe("renderPicker", () => {
  it("draws a title, one row per option and the key help", () => {
    const options = [candidateOption("feat: X", 0), candidateOption("fix: y\nbody", 1)];

    const lines = renderPicker(options, 1, 2);

    expect(lines).toHaveLength(6);
    expect(lines[0]).toContain("Choose a commit message:");
    expect(lines[2]).toContain("feat: X");
    expect(lines[2]).not.toContain("❯");
    expect(lines[3]).toContain("❯");
    expect(lines[3]).toContain("(+1 line)");
    expect(lines[5]).toContain("shortcuts (1-2, q)");
  });
});

describe("createPreviewDisplay", () => {
  it("shows the candidates in one note", async () => {
    await createPreviewDisplay().show(["feat: X\nBody", "fix: y"]);

    expect(p.note).toHaveBeenCalledWith("feat: X\nBody\nfix: y", "Commit message");
  });
});

describe("createPickerDisplay", () => {
  it("hands the chosen candidate to onSelect", async () => {
    const onSelect = vi.fn(async (_candidate: string) => {});
    const choose = vi.fn<ChooseCandidate>(async () => 1);
    const display = createPickerDisplay({ notifier: createTestNotifier(), onSelect, choose });

    await display.show(["feat: X", "fix: y\nbecause"]);

    expect(choose).toHaveBeenCalledWith(["feat: X", "fix: y\nbecause"]);
    expect(onSelect).toHaveBeenCalledWith("fix: y\nbecause");
  });

  it("does nothing but report when the user quits", async () => {
    const notifier = createTestNotifier();
    const onSelect = vi.fn(async (_candidate: string) => {});
    const choose = vi.fn<ChooseCandidate>(async () => null);

    await createPickerDisplay({ notifier, onSelect, choose }).show(["feat: X"]);

    expect(onSelect).not.toHaveBeenCalled();
    expect(notifier.cancel).toHaveBeenCalledWith("Cancelled");
  });
});
