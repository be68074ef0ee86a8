import {
  OutOfRangeError,
  pickAssignment,
  totalPicks,
  type PickAssignment
} from "@pickroom/shared";
import type { DraftConfiguration } from "../data/repositories/draftRepository/types.js";

export { OutOfRangeError };

/** Who owns `overallPick`; throws `OutOfRangeError` past the last pick. */
export function computePickAssignment(
  config: DraftConfiguration,
  overallPick: number
): PickAssignment {
  return pickAssignment(config, overallPick);
}

export function draftTotalPicks(config: DraftConfiguration): number {
  return totalPicks(config);
}

export function isFinalPick(config: DraftConfiguration, overallPick: number): boolean {
  return overallPick >= totalPicks(config);
}
