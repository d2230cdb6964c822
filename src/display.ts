import * as p from "@clack/prompts";
import pc from "picocolors";
import type { Notifier } from "./notify.js";

export interface CandidateDisplay {
  show(candidates: readonly string[]): Promise<void>;
}

// Candidate index, or QUIT
type Choice = number;

export const QUIT = -1;

export interface SelectOption {
  value: Choice;
  label: string;
  hint?: string;
}

// Resolves to the chosen index, or null when the user quits
export type ChooseCandidate = (
  candidates: readonly string[]
) => Promise<number | null>;

export function candidateOption(candidate: string, index: number): SelectOption {
  const [subject, ...body] = candidate.split("\n");
  const hint =
    body.length > 0
      ? `(+${body.length} line${body.length === 1 ? "" : "s"})`
      : undefined;
  return { value: index, label: `${index + 1}. ${pc.bold(subject)}`, hint };
}

const QUIT_OPTION: SelectOption = {
  value: QUIT,
  label: pc.red("✕ Quit without committing"),
  hint: "(q)",
};

// "choose" carries a row index, or QUIT
export type KeyAction =
  | { kind: "move"; index: number }
  | { kind: "choose"; value: Choice }
  | { kind: "ignore" };

const ESC = 0x1b;
const CSI = 0x5b;
const ARROW_UP = 0x41;
const ARROW_DOWN = 0x42;
const ENTER = 0x0d;
const CTRL_C = 0x03;

/** Maps one keypress to what the picker does next; `index` is the highlighted row. */
export function interpretKey(
  key: Uint8Array,
  index: number,
  total: number,
  shortcutCount: number
): KeyAction {
  if (key[0] === ESC && key[1] === CSI) {
    if (key[2] === ARROW_UP) return { kind: "move", index: (index - 1 + total) % total };
    if (key[2] === ARROW_DOWN) return { kind: "move", index: (index + 1) % total };
    return { kind: "ignore" };
  }
  if (key[0] === ENTER) return { kind: "choose", value: index };
  if (key[0] === CTRL_C) return { kind: "choose", value: QUIT };

  const text = Buffer.from(key).toString();
  if (text === "q") return { kind: "choose", value: QUIT };
  if (/^[1-9]$/.test(text) && Number(text) <= shortcutCount) {
    return { kind: "choose", value: Number(text) - 1 };
  }
  return { kind: "ignore" };
}

export function renderPicker(
  options: readonly SelectOption[],
  index: number,
  shortcutCount: number
): string[] {
  const rows = options.map((option, i) => {
    const hint = option.hint ? ` ${pc.dim(option.hint)}` : "";
    return i === index
      ? `${pc.cyan("❯")} ${pc.cyan(option.label)}${hint}`
      : `  ${pc.dim(option.label)}${hint}`;
  });
  return [
    `${pc.cyan("◇")} ${pc.bold("Choose a commit message:")}`,
    "",
    ...rows,
    "",
    pc.dim(`  Use ↑/↓, Enter, or shortcuts (1-${shortcutCount}, q)`),
  ];
}

// Raw-mode picker; rows index into `options`, the last of which is QUIT.
export async function selectWithShortcuts(
  options: SelectOption[],
  shortcutCount: number
): Promise<Choice> {
  const { stdin, stdout } = process;
  let index = 0;
  let drawn = 0;

  const clear = () => {
    if (drawn > 0) stdout.write(`\x1b[${drawn}A\x1b[J`);
  };
  const draw = () => {
    clear();
    const lines = renderPicker(options, index, shortcutCount);
    stdout.write(lines.join("\n") + "\n");
    drawn = lines.length;
  };

  return new Promise((resolve) => {
    const onKey = (key: Buffer) => {
      const action = interpretKey(key, index, options.length, shortcutCount);
      if (action.kind === "move") {
        index = action.index;
        draw();
      } else if (action.kind === "choose") {
        clear();
        stdin.setRawMode(false);
        stdin.removeListener("data", onKey);
        stdin.pause();
        resolve(action.value === QUIT ? QUIT : options[action.value].value);
      }
    };

    stdin.setRawMode(true);
    stdin.resume();
    stdin.on("data", onKey);
    draw();
  });
}

export async function chooseCandidate(
  candidates: readonly string[]
): Promise<number | null> {
  const options = [...candidates.map(candidateOption), QUIT_OPTION];

  // Raw mode needs a terminal; piped input gets the plain clack select.
  if (!process.stdin.isTTY) {
    const choice = await p.select<Choice>({
      message: "Choose a commit message:",
      options,
    });
    if (p.isCancel(choice) || choice === QUIT) return null;
    return choice;
  }

  const choice = await selectWithShortcuts(options, Math.min(candidates.length, 9));
  return choice === QUIT ? null : choice;
}

/** Read-only presentation: the candidates in one note, nothing to pick. */
export function createPreviewDisplay(): CandidateDisplay {
  return {
    async show(candidates) {
      p.note(candidates.join("\n"), "Commit message");
    },
  };
}

export interface PickerDisplayOptions {
  notifier: Notifier;
  onSelect: (candidate: string) => Promise<void>;
  choose?: ChooseCandidate;
}

export function createPickerDisplay({
  notifier,
  onSelect,
  choose = chooseCandidate,
}: PickerDisplayOptions): CandidateDisplay {
  return {
    async show(candidates) {
      p.note(candidates.join("\n\n"), "Generated commit message");

      const index = await choose(candidates);
      if (index === null) {
        notifier.cancel("Cancelled");
        return;
      }
      await onSelect(candidates[index]);
    },
  };
}
