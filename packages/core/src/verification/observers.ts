/**
 * The three orthogonal observers are descriptive labels attached to
 * verification checks. They select no behaviour.
 */
export interface ObserverLabel {
  id: "void" | "something" | "depth";
  title: string;
  plane: string;
  verifies: string;
}

export const OBSERVERS: readonly ObserverLabel[] = Object.freeze([
  { id: "void", title: "Observer 1 (void)", plane: "x-y", verifies: "nothing is left over" },
  { id: "something", title: "Observer 2 (something)", plane: "y-z", verifies: "everything is accounted for" },
  { id: "depth", title: "Observer 3 (depth)", plane: "z-x", verifies: "the error stack balances" }
]);
