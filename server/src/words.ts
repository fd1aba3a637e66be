import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const WORDS_FILE = fileURLToPath(new URL('../data/words.json', import.meta.url));

function loadWordPool(): readonly string[] {
  const parsed: unknown = JSON.parse(readFileSync(WORDS_FILE, 'utf8'));
  if (!Array.isArray(parsed) || !parsed.every((w): w is string => typeof w === 'string')) {
    throw new Error(`${WORDS_FILE} must contain a JSON array of strings.`);
  }
  return Object.freeze(parsed.map((w) => w.trim().toUpperCase()).filter(Boolean));
}

export const WORD_POOL = loadWordPool();
