import type { ContextPayload } from "./types.js";

const pct = (value: number): string => `${Math.round(value * 100)}%`;

function selfSection(payload: ContextPayload): string {
  const { mood, energy, confidence, valence } = payload.selfState;
  return [
    "[SELF STATE]",
    `Mood: ${mood} (valence ${valence.toFixed(2)})`,
    `Energy: ${pct(energy)}, confidence: ${pct(confidence)}`,
  ].join("\n");
}

function driveSection(payload: ContextPayload): string {
  const lines = ["[DRIVES]"];
  if (payload.dominantDrive) {
    lines.push(`Dominant: ${payload.dominantDrive.name} (${pct(payload.dominantDrive.level)})`);
  }
  const levels = Object.entries(payload.drives).map(([name, level]) => `${name} ${pct(level)}`);
  if (levels.length > 0) lines.push(`Levels: ${levels.join(", ")}`);
  if (payload.intents.length > 0) lines.push(`Intents: ${payload.intents.join(", ")}`);
  return lines.join("\n");
}

function memorySection(title: string, items: ContextPayload["recent"]): string | null {
  if (items.length === 0) return null;
  return [title, ...items.map((i) => `- ${i.speaker}: ${i.text}`)].join("\n");
}

function valueSection(payload: ContextPayload): string | null {
  if (payload.valueFlags.aligned) return null;
  return ["[VALUE FLAGS]", `Input ${payload.valueFlags.note}`].join("\n");
}

function traitSection(payload: ContextPayload): string | null {
  if (payload.traits.length === 0) return null;
  return `[TRAITS]\n${payload.traits.map((t) => `${t.name} ${t.weight.toFixed(2)}`).join(", ")}`;
}

function goalSection(payload: ContextPayload): string | null {
  if (payload.goals.length === 0) return null;
  return ["[GOALS]", ...payload.goals.map((g) => `- ${g}`)].join("\n");
}

function associationSection(payload: ContextPayload): string | null {
  if (payload.associations.length === 0) return null;
  return `[WORD ASSOCIATIONS]\n${payload.associations.map((a) => `${a.word} (${a.mood})`).join(", ")}`;
}

/**
 * Renders a payload as prompt text for language-model responders.
 * Empty sections are left out.
 */
export function renderContext(payload: ContextPayload): string {
  const sections = [
    selfSection(payload),
    driveSection(payload),
    valueSection(payload),
    traitSection(payload),
    goalSection(payload),
    associationSection(payload),
    memorySection("[RECENT]", payload.recent),
    memorySection("[RECALLED]", payload.recalled),
    payload.lastDream ? `[LAST DREAM]\n${payload.lastDream.text}` : null,
    `[INPUT]\n${payload.input}`,
  ];
  return sections.filter((s): s is string => s !== null).join("\n\n");
}
