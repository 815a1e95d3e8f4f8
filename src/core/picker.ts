import { dedupeSelections } from "./baselines.js";
import type { BaselineSelection, TrackedItem } from "./baselines.js";

/**
 * - `browsing`: the whole catalog is listed.
 * - `filtered`: a search narrowed the list.
 * - `selecting`: a baseline is being entered for each picked title.
 * - `confirming`: the picks and their baselines await a yes/no.
 * - `complete`: terminal; `picked` is the result.
 */
export type PickerPhase = "browsing" | "filtered" | "selecting" | "confirming" | "complete";

export interface PickerState {
  phase: PickerPhase;
  catalog: TrackedItem[];
  visible: TrackedItem[];
  query: string;
  picked: BaselineSelection[];
  /** Index into `picked` while selecting. */
  cursor: number;
  message: string | null;
}

export const PICKER_PAGE_LIMIT = 50;

export const PICKER_HELP =
  "Enter search text, 'all', 'done', 'clear', or numbers like '1,3-6'.";

const PICK_LIST = /^[0-9,\-\s]+$/;

export function initialPickerState(catalog: TrackedItem[]): PickerState {
  return {
    phase: "browsing",
    catalog,
    visible: catalog,
    query: "",
    picked: [],
    cursor: 0,
    message: null
  };
}

/**
 * Expands `"1,3-6"` into 1-based indices within `1..limit`. Ranges may be
 * written backwards and are clamped before expansion; parts that are not
 * numbers are skipped.
 */
export function parsePickList(text: string, limit: number): number[] {
  const picks: number[] = [];
  for (const rawPart of text.split(",")) {
    const part = rawPart.trim();
    if (!part) {
      continue;
    }
    if (part.includes("-")) {
      const [startText = "", endText = ""] = part.split("-", 2);
      const start = Number.parseInt(startText.trim(), 10);
      const end = Number.parseInt(endText.trim(), 10);
      if (Number.isNaN(start) || Number.isNaN(end)) {
        continue;
      }
      const low = Math.max(Math.min(start, end), 1);
      const high = Math.min(Math.max(start, end), limit);
      for (let value = low; value <= high; value++) {
        picks.push(value);
      }
      continue;
    }
    const value = Number.parseInt(part, 10);
    if (!Number.isNaN(value) && value >= 1 && value <= limit) {
      picks.push(value);
    }
  }
  return picks;
}

function toSelection(item: TrackedItem): BaselineSelection {
  return { identifier: item.identifier, displayName: item.displayName, minVersion: "" };
}

function finishPicking(state: PickerState, picked: BaselineSelection[]): PickerState {
  const unique = dedupeSelections(picked);
  if (unique.length === 0) {
    return { ...state, phase: "complete", picked: [], cursor: 0, message: "No titles selected." };
  }
  return { ...state, phase: "selecting", picked: unique, cursor: 0, message: null };
}

function transitionListing(state: PickerState, input: string): PickerState {
  const command = input.toLowerCase();

  if (!input) {
    return { ...state, message: null };
  }
  if (command === "?" || command === "help") {
    return { ...state, message: PICKER_HELP };
  }
  if (command === "done") {
    return finishPicking(state, state.picked);
  }
  if (command === "all") {
    return finishPicking(state, [...state.picked, ...state.visible.map(toSelection)]);
  }
  if (command === "clear") {
    return { ...state, phase: "browsing", visible: state.catalog, query: "", message: null };
  }
  if (PICK_LIST.test(input)) {
    const added = parsePickList(input, state.visible.length).flatMap((index) => {
        const item = state.visible[index - 1];
        return item ? [toSelection(item)] : [];
      });
    return {
      ...state,
      picked: [...state.picked, ...added],
      message: `Added ${added.length} selections.`
    };
  }

  const visible = state.catalog.filter((item) => item.displayName.toLowerCase().includes(command));
  return { ...state, phase: "filtered", visible, query: input, message: null };
}

/** Pure transition: the next state for one line of user input. */
export function transitionPicker(state: PickerState, rawInput: string): PickerState {
  const input = rawInput.trim();

  switch (state.phase) {
    case "browsing":
    case "filtered":
      return transitionListing(state, input);

    case "selecting": {
      const picked = state.picked.map((selection, index) =>
        index === state.cursor ? { ...selection, minVersion: input } : selection
      );
      const cursor = state.cursor + 1;
      return {
        ...state,
        picked,
        cursor,
        phase: cursor >= picked.length ? "confirming" : "selecting",
        message: null
      };
    }

    case "confirming": {
      const answer = input.toLowerCase();
      if (answer === "" || answer === "y" || answer === "yes") {
        return { ...state, phase: "complete", message: null };
      }
      if (answer === "n" || answer === "no") {
        return { ...state, phase: "selecting", cursor: 0, message: "Re-enter baselines." };
      }
      return { ...state, message: "Answer y or n." };
    }

    case "complete":
      return state;
  }
}

export function pickerPrompt(state: PickerState): string {
  switch (state.phase) {
    case "browsing":
    case "filtered":
      return "Search / numbers / command: ";
    case "selecting":
      return `Baseline for '${state.picked[state.cursor]?.displayName ?? ""}': `;
    case "confirming":
      return "Use these baselines? [Y/n]: ";
    case "complete":
      return "";
  }
}

/** Lines to print before the next prompt. */
export function renderPicker(state: PickerState): string[] {
  const lines: string[] = [];
  if (state.message) {
    lines.push(state.message);
  }

  switch (state.phase) {
    case "browsing":
    case "filtered": {
      const heading =
        state.phase === "filtered"
          ? `--- ${state.visible.length} titles matching '${state.query}' ---`
          : `--- ${state.visible.length} titles ---`;
      lines.push(heading);
      state.visible.slice(0, PICKER_PAGE_LIMIT).forEach((item, index) => {
        lines.push(`${String(index + 1).padStart(3)}. ${item.displayName}`);
      });
      if (state.visible.length > PICKER_PAGE_LIMIT) {
        lines.push(`... (${state.visible.length - PICKER_PAGE_LIMIT} more; refine search)`);
      }
      lines.push(`Selected so far: ${dedupeSelections(state.picked).length}`);
      break;
    }
    case "selecting":
      if (state.cursor === 0) {
        lines.push("Enter minimum version for each (press Enter to skip).");
      }
      break;
    case "confirming":
      for (const selection of state.picked) {
        lines.push(`  ${selection.displayName}: ${selection.minVersion ? `>= ${selection.minVersion}` : "(none)"}`);
      }
      break;
    case "complete":
      break;
  }
  return lines;
}
