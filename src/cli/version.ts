import { readFileSync } from "node:fs";
import { z } from "zod";

const pkgSchema = z.object({ version: z.string() });

export function packageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf-8"));
  return pkgSchema.parse(raw).version;
}
