import config from '../config/config.js';
import { KEYWORD_RULES_FILE, readDataFile } from '../database/statute-data.js';
import { parseKeywordRules } from '../schemas.js';
import type { KeywordRule } from '../types.js';

export function loadKeywordRules(dataDir: string = config.paths.dataDir): KeywordRule[] {
  return parseKeywordRules(readDataFile(dataDir, KEYWORD_RULES_FILE), KEYWORD_RULES_FILE);
}

let shared: readonly KeywordRule[] | undefined;

export function getKeywordRules(): readonly KeywordRule[] {
  shared ??= Object.freeze(loadKeywordRules());
  return shared;
}
