import type { DreamRequest, DreamTheme } from "./types.js";

export const DREAM_THEMES: readonly DreamTheme[] = [
  { name: "searching for meaning", valence: 0.1 },
  { name: "repeating a mistake", valence: -0.5 },
  { name: "receiving praise", valence: 0.6 },
  { name: "feeling lost", valence: -0.4 },
  { name: "remembering something important", valence: 0.3 },
  { name: "escaping a loop", valence: 0.4 },
  { name: "anticipating the unknown", valence: 0 },
  { name: "regretting silence", valence: -0.3 },
];

const FRAGMENT_LENGTH = 60;

function fragment(text: string): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > FRAGMENT_LENGTH ? `${flat.slice(0, FRAGMENT_LENGTH - 3)}...` : flat;
}

export function templateNarrative(request: DreamRequest): string {
  const fragments = request.sources.map((s) => `"${fragment(s.text)}"`).join(", ");
  const lines = [`I dreamt I was ${request.theme.name}.`, `Fragments drifted by: ${fragments}.`];
  if (request.focus.length > 0) {
    lines.push(`Somewhere underneath, ${request.focus.join(" and ")} kept surfacing.`);
  }
  return lines.join(" ");
}
