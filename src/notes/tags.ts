import { dedupe, normalizeTag } from "./text.js";

export const MAX_TAGS = 12;

interface TagRule {
  tags: string[];
  pattern: RegExp;
}

// Matched against lowercased text. Order breaks ties between rules that
// first match at the same offset.
const TAG_RULES: TagRule[] = [
  // languages
  { tags: ["python"], pattern: /\bpython\d?\b|\btraceback\b|\.py\b/ },
  { tags: ["typescript"], pattern: /\btypescript\b|\btsc\b|\.tsx?\b/ },
  { tags: ["javascript"], pattern: /\bjavascript\b|\bnode\.js\b|\bnpm\b|\.m?js\b/ },
  { tags: ["rust"], pattern: /\brust\b|\brustc\b|\bcargo\b|\.rs\b/ },
  { tags: ["go"], pattern: /\bgolang\b|\bgo (?:build|test|run|mod)\b|\.go\b/ },
  { tags: ["java"], pattern: /\bjava\b|\bjvm\b|\.java\b/ },
  { tags: ["cpp"], pattern: /c\+\+|\bg\+\+|\.(?:cpp|cc|hpp)\b/ },
  { tags: ["c"], pattern: /\bgcc\b|\bclang\b|\.[ch]:\d+/ },
  { tags: ["shell"], pattern: /\bbash\b|\bzsh\b|\.sh\b/ },
  // error keywords
  { tags: ["error"], pattern: /\berror\b/ },
  { tags: ["warning"], pattern: /\bwarning\b/ },
  { tags: ["exception"], pattern: /\bexception\b/ },
  { tags: ["fatal"], pattern: /\bfatal\b/ },
  { tags: ["segfault"], pattern: /\bsegfault\b|segmentation fault/ },
  { tags: ["timeout"], pattern: /\btimed?\s?out\b/ },
  { tags: ["c99", "implicit-declaration"], pattern: /implicit declaration/ },
  { tags: ["redefinition"], pattern: /\bredefinition\b/ },
  // topics
  { tags: ["build"], pattern: /\bbuilds?\b|\bcompil(?:e|ed|er|ation)\b/ },
  { tags: ["linker"], pattern: /\blinker\b|undefined reference/ },
  { tags: ["test"], pattern: /\btests?\b|\bassertion\b/ },
  { tags: ["dependency"], pattern: /\bdependenc(?:y|ies)\b|module not found/ },
  { tags: ["git"], pattern: /\bgit\b|merge conflict|\brebase\b/ },
  { tags: ["docker"], pattern: /\bdocker\b|\bcontainer\b/ },
  { tags: ["database"], pattern: /\bdatabase\b|\bsql\b|\bpostgres(?:ql)?\b|\bmysql\b|\bsqlite\b/ },
  { tags: ["network"], pattern: /\bnetwork\b|connection (?:refused|reset)\b|\bdns\b/ },
  { tags: ["memory"], pattern: /\bmemory\b|\boom\b|\bleak\b/ },
  { tags: ["performance"], pattern: /\bperformance\b|\blatency\b|\bslow\b/ },
  { tags: ["deploy"], pattern: /\bdeploy(?:ed|ment|s)?\b/ },
  { tags: ["auth"], pattern: /\bauth(?:entication|orization)?\b|permission denied|\bunauthorized\b/ },
];

/** Vocabulary tags found in the text, ordered by where they first occur. */
export function detectTags(text: string): string[] {
  const lower = text.toLowerCase();
  const hits: Array<{ tag: string; index: number; order: number }> = [];

  TAG_RULES.forEach((rule, order) => {
    const match = rule.pattern.exec(lower);
    if (match) {
      for (const tag of rule.tags) {
        hits.push({ tag, index: match.index, order });
      }
    }
  });

  hits.sort((a, b) => a.index - b.index || a.order - b.order);
  return dedupe(hits.map((hit) => hit.tag));
}

export function buildTags(text: string, metaTags: string[] = [], maxTags: number = MAX_TAGS): string[] {
  const limit = Math.min(maxTags, MAX_TAGS);
  const normalized = [...metaTags, ...detectTags(text)]
    .map(normalizeTag)
    .filter((tag) => tag.length > 0);
  return dedupe(normalized).slice(0, limit);
}
