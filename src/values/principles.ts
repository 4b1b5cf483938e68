import type { PrincipleDefinition } from "../config/types.js";
import type { ValuePrinciple } from "./types.js";

const MASK = "[withheld]";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function keywordPattern(keywords: readonly string[]): RegExp {
  const alternatives = keywords.map((k) => escapeRegExp(k.toLowerCase()));
  return new RegExp(`(?<![\\p{L}\\p{N}])(?:${alternatives.join("|")})(?![\\p{L}\\p{N}])`, "giu");
}

/**
 * Principle violated by any of its keywords appearing as a whole word or
 * phrase. Reshaping masks the offending terms.
 */
export function keywordPrinciple(def: PrincipleDefinition): ValuePrinciple {
  const pattern = keywordPattern(def.keywords);
  return {
    name: def.name,
    priority: def.priority,
    severity: def.severity,
    alignmentRule: (content) => {
      pattern.lastIndex = 0;
      return !pattern.test(content);
    },
    reshape: (content) => content.replace(pattern, MASK),
  };
}
