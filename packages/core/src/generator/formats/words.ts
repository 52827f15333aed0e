import { readFileSync } from 'node:fs';

export interface WordLists {
  firstNames: readonly string[];
  lastNames: readonly string[];
  hostWords: readonly string[];
  tlds: readonly string[];
  pathWords: readonly string[];
  lorem: readonly string[];
}

const LIST_KEYS = [
  'firstNames',
  'lastNames',
  'hostWords',
  'tlds',
  'pathWords',
  'lorem',
] as const satisfies readonly (keyof WordLists)[];

function stringList(source: unknown, key: string): string[] {
  if (
    source === null ||
    typeof source !== 'object' ||
    !(key in source)
  ) {
    throw new Error(`words.json is missing the ${key} list`);
  }
  const list: unknown = Reflect.get(source, key);
  if (
    !Array.isArray(list) ||
    list.length === 0 ||
    !list.every((w: unknown) => typeof w === 'string')
  ) {
    throw new Error(`words.json ${key} must be a non-empty list of strings`);
  }
  return list.filter((w: unknown): w is string => typeof w === 'string');
}

function loadWordLists(): WordLists {
  const url = new URL('../../../data/words.json', import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(url, 'utf8'));
  const [firstNames, lastNames, hostWords, tlds, pathWords, lorem] =
    LIST_KEYS.map((key) => stringList(parsed, key));
  return { firstNames, lastNames, hostWords, tlds, pathWords, lorem };
}

let cached: WordLists | undefined;

/** Word lists bundled in data/words.json, read once. */
export function wordLists(): WordLists {
  cached ??= loadWordLists();
  return cached;
}
