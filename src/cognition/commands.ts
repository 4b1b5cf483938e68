export type Command =
  | { readonly kind: "reflect" }
  | { readonly kind: "dream" }
  | { readonly kind: "add_goal"; readonly text: string }
  | { readonly kind: "recall"; readonly topic: string };

const REFLECT = /^\s*reflect\s*[.!?]*\s*$/i;
const DREAM = /^\s*dream\s*[.!?]*\s*$/i;
const ADD_GOAL = /^\s*add goal\s*:\s*(.+?)\s*$/i;
const RECALL = /^\s*what do you know about\s+(.+?)\s*[?.!]*\s*$/i;

/** Recognises the fixed free-text commands. Anything else is conversation. */
export function parseCommand(input: string): Command | null {
  if (REFLECT.test(input)) return { kind: "reflect" };
  if (DREAM.test(input)) return { kind: "dream" };

  const goal = ADD_GOAL.exec(input)?.[1]?.trim();
  if (goal) return { kind: "add_goal", text: goal };

  const topic = RECALL.exec(input)?.[1]?.trim();
  if (topic) return { kind: "recall", topic };

  return null;
}
