/**
 * uis help - language reference
 *
 * A topic answers to its name, a unique prefix of it, or any term it
 * documents: `uis help floor`, `uis help Canvas` and `uis help E_DIV_ZERO`
 * open the stdlib, objects and limits topics.
 */
import { getStdlibFns } from "@uiscript/std";
import { QUICKREF, TOPICS, TOPIC_LIST } from "./help-content.js";

export { QUICKREF };

const TERMS: ReadonlyArray<[string, readonly string[]]> = [
  ["syntax", ["var", "if", "else", "while", "return", "operators", "precedence", "comments", "blocks"]],
  ["values", ["number", "string", "boolean", "null", "handle", "truthiness", "coercion", "types"]],
  ["objects", ["canvas", "sound", "soundinstance", "colors", "colours"]],
  ["limits", ["errors", "config"]],
];

/** Lower-cased term -> topic. */
function buildIndex(): Map<string, string> {
  const index = new Map<string, string>();
  for (const topic of TOPIC_LIST) index.set(topic, topic);
  for (const [topic, terms] of TERMS) {
    for (const term of terms) index.set(term, topic);
  }
  for (const name of getStdlibFns().keys()) index.set(name.toLowerCase(), "stdlib");
  for (const code of TOPICS.limits.match(/\bE_[A-Z_]+\b/g) ?? []) index.set(code.toLowerCase(), "limits");
  return index;
}

const index = buildIndex();

function resolveTopic(query: string): string | null {
  const normalized = query.toLowerCase().trim();
  const direct = index.get(normalized);
  if (direct) return direct;

  const matches = TOPIC_LIST.filter((t) => t.startsWith(normalized));
  return matches.length === 1 ? matches[0] : null;
}

export function runHelp(topic?: string): number {
  if (!topic) {
    console.log(QUICKREF);
    return 0;
  }

  const resolved = resolveTopic(topic);
  if (resolved) {
    console.log(TOPICS[resolved]);
    return 0;
  }

  console.error(`Unknown help topic: "${topic}"`);
  console.error(`Topics: ${TOPIC_LIST.join(", ")}`);
  console.error("A function, object or error code also works, e.g. 'uis help floor'.");
  return 1;
}
