import path from 'path';
import { compareStrings } from '../../common/paths';
import type { TagProvider, WeightedTag } from '../../types/providers';
import {
  COMMON_DIRECTORY_NAMES,
  KEYWORD_TAGS,
  categoryForExtension,
  tokenizeContent,
  tokenizeName,
} from './tagDictionary';

const FILE_NAME_WEIGHT = 1;
const DIRECTORY_WEIGHT = 0.5;
const CATEGORY_WEIGHT = 0.5;
const MAX_KEYWORD_HITS = 3;

const unique = (values: string[]) => [...new Set(values)];

/**
 * Offline tagger: file-name and folder tokens, the extension's category, and
 * keyword hits in the text content. Never fails, so it doubles as the fallback
 * behind a model-backed provider.
 */
export class DictionaryTagProvider implements TagProvider {
  readonly name = 'dictionary';

  async tag(filePath: string, content: string): Promise<WeightedTag[]> {
    const weights = new Map<string, number>();
    const add = (tag: string, weight: number) => weights.set(tag, (weights.get(tag) ?? 0) + weight);

    const segments = filePath.split(/[\\/]+/).filter(Boolean);
    const fileName = segments.pop() ?? '';
    const parsed = path.posix.parse(fileName);

    unique(tokenizeName(parsed.name)).forEach((token) => {
      add(token, FILE_NAME_WEIGHT);
      const keywordTag = KEYWORD_TAGS.get(token);
      if (keywordTag) {
        add(keywordTag, FILE_NAME_WEIGHT);
      }
    });

    segments
      .filter((segment) => !COMMON_DIRECTORY_NAMES.has(segment.toLowerCase()))
      .forEach((segment) => {
        unique(tokenizeName(segment))
          .filter((token) => !COMMON_DIRECTORY_NAMES.has(token))
          .forEach((token) => add(token, DIRECTORY_WEIGHT));
      });

    const category = categoryForExtension(parsed.ext.slice(1));
    if (category) {
      add(category, CATEGORY_WEIGHT);
    }

    const keywordHits = new Map<string, number>();
    tokenizeContent(content).forEach((word) => {
      if (KEYWORD_TAGS.has(word)) {
        keywordHits.set(word, (keywordHits.get(word) ?? 0) + 1);
      }
    });
    keywordHits.forEach((count, word) => {
      const keywordTag = KEYWORD_TAGS.get(word);
      if (keywordTag) {
        add(keywordTag, Math.min(count, MAX_KEYWORD_HITS));
      }
    });

    return [...weights.entries()]
      .map(([tag, weight]) => ({ tag, weight }))
      .sort((a, b) => b.weight - a.weight || compareStrings(a.tag, b.tag));
  }
}
