/**
 * Reserved-word list for the target language
 */

import { readFileSync } from 'fs';
import { FileIOError } from '../../utils/errors.js';

// data/ sits at the package root, three levels above both src/lib/naming and dist/lib/naming
const CSHARP_KEYWORDS_URL = new URL('../../../data/csharp-keywords.json', import.meta.url);

let cached: readonly string[] | undefined;

/**
 * Load the C# keyword list shipped with the package
 */
export function loadCSharpKeywords(): readonly string[] {
  if (cached) {
    return cached;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(CSHARP_KEYWORDS_URL, 'utf-8'));
  } catch (error) {
    throw new FileIOError(`Failed to read reserved-word list: ${CSHARP_KEYWORDS_URL.pathname}`, undefined, {
      cause: error,
    });
  }

  if (!Array.isArray(parsed) || !parsed.every((word): word is string => typeof word === 'string')) {
    throw new FileIOError('Reserved-word list must be a JSON array of strings', {
      path: CSHARP_KEYWORDS_URL.pathname,
    });
  }

  cached = Object.freeze([...parsed]);
  return cached;
}
