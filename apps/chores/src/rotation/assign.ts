/**
 * Stateless weekly rotation. Chore i goes to roomie (i + week) mod |roomies|,
 * so every chore moves one roomie along each week and the split between
 * roomies never differs by more than one chore.
 */
import type { Assignment, Chore, Roomie } from "../types.js";

export class NoRoomiesError extends Error {
  constructor() {
    super("No roomies to assign chores to");
    this.name = "NoRoomiesError";
  }
}

/** Non-negative modulo; week numbers before the rotation start are negative. */
export function rotationIndex(
  choreIndex: number,
  week: number,
  roomieCount: number,
): number {
  return (((choreIndex + week) % roomieCount) + roomieCount) % roomieCount;
}

export function assignRoomies(
  chores: readonly Chore[],
  roomies: readonly Roomie[],
  week: number,
): Assignment[] {
  if (chores.length === 0) return [];
  if (roomies.length === 0) throw new NoRoomiesError();
  return chores.map((chore, i) => ({
    chore,
    roomie: roomies[rotationIndex(i, week, roomies.length)],
  }));
}
