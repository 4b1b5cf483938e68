import type { Writable } from "node:stream";

const BANNER = `
  ┌─┐┌─┐┌┐┌┌┬┐┌─┐┬─┐
  ├─┘│ ││││ ││├┤ ├┬┘
  ┴  └─┘┘└┘─┴┘└─┘┴└─
`;

const TAGLINES = [
  "Thinking between the turns.",
  "Remembers, forgets, dreams.",
  "A mind in small steps.",
  "Moods included.",
];

export function printBanner(version: string, out: Writable, random: () => number = Math.random): void {
  const tagline = TAGLINES[Math.floor(random() * TAGLINES.length)] ?? TAGLINES[0];
  out.write(`${BANNER}\n`);
  out.write(`  v${version} · ${tagline}\n\n`);
}
