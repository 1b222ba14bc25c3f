import { ValidationError } from "@mindease/shared";
import type { RandomSource } from "../types/index.js";

export const defaultRandom: RandomSource = Math.random;

/**
 * Uniform choice from a non-empty list.
 */
export function pickOne<T>(items: readonly T[], random: RandomSource): T {
  const index = Math.min(
    Math.floor(random() * items.length),
    items.length - 1,
  );
  const item = items[index];
  if (item === undefined) {
    throw new ValidationError("Cannot pick from an empty list", {
      code: "EMPTY_CHOICE",
    });
  }
  return item;
}
